/**
 * Initial Placement Sampler — collision-free random start frame.
 *
 * Rejection sampling against a nearest-neighbour index: every entity (ball
 * included) ends up at least PLACEMENT.minSeparation from every other one.
 * Order: ball, blue robots by id, yellow robots by id.
 */

import type { Frame, FieldGeometry, SpatialIndex, Vec2, RobotState } from '../engine/types';
import { createRobot } from '../engine/robot';
import { KdTree } from '../engine/kdtree';
import type { Rng } from './rng';
import { uniform } from './rng';
import { PlacementError } from './errors';
import { PLACEMENT } from './env-config';

export interface PlacementOptions {
  nRobotsBlue: number;
  nRobotsYellow: number;
  rng: Rng;
  /** Draws allowed per robot before giving up */
  maxAttempts?: number;
  minSeparation?: number;
  createIndex?: () => SpatialIndex;
}

/**
 * Sample a legal initial frame. All velocities are zero.
 *
 * @throws PlacementError when a robot cannot be placed within maxAttempts draws
 */
export function samplePlacement(field: FieldGeometry, options: PlacementOptions): Frame {
  const { rng, nRobotsBlue, nRobotsYellow } = options;
  const maxAttempts = options.maxAttempts ?? PLACEMENT.maxAttempts;
  const minSeparation = options.minSeparation ?? PLACEMENT.minSeparation;
  const index = options.createIndex ? options.createIndex() : new KdTree();

  const halfLength = field.length / 2;
  const halfWidth = field.width / 2;
  const margin = PLACEMENT.margin;

  const drawPoint = (): Vec2 => ({
    x: uniform(rng, -halfLength + margin, halfLength - margin),
    y: uniform(rng, -halfWidth + margin, halfWidth - margin),
  });
  const drawTheta = (): number => uniform(rng, 0, 360);

  const ball = drawPoint();
  index.insert(ball);

  const placeRobot = (id: number, yellow: boolean): RobotState => {
    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      const pos = drawPoint();
      const nearest = index.nearest(pos);
      if (nearest === null || nearest.distance >= minSeparation) {
        index.insert(pos);
        return createRobot(id, yellow, pos.x, pos.y, drawTheta());
      }
    }
    const side = yellow ? 'yellow' : 'blue';
    throw new PlacementError(
      `could not place ${side} robot ${id} at least ${minSeparation} from others in ${maxAttempts} attempts`,
    );
  };

  const robotsBlue: RobotState[] = [];
  for (let i = 0; i < nRobotsBlue; i++) robotsBlue.push(placeRobot(i, false));

  const robotsYellow: RobotState[] = [];
  for (let i = 0; i < nRobotsYellow; i++) robotsYellow.push(placeRobot(i, true));

  return {
    ball: { x: ball.x, y: ball.y, vx: 0, vy: 0 },
    robotsBlue,
    robotsYellow,
  };
}
