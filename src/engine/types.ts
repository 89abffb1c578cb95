/**
 * Engine Type Contracts
 *
 * All interfaces shared by the physics step, the placement sampler and the
 * RL layer. Every type here is an immutable snapshot -- a physics step
 * produces a new Frame, it never edits the previous one.
 */

/** 2D vector as a plain readonly object. Pure functions operate on this. */
export interface Vec2 {
  readonly x: number;
  readonly y: number;
}

/** Normalized left/right wheel command, each component in [-1, 1]. */
export type Action = readonly [left: number, right: number];

/** Ball state at a single control step. */
export interface BallState {
  readonly x: number;
  readonly y: number;
  readonly vx: number;
  readonly vy: number;
}

/** Robot state at a single control step. */
export interface RobotState {
  readonly id: number;
  /** false = blue team (learning side), true = yellow team */
  readonly yellow: boolean;
  readonly x: number;
  readonly y: number;
  /** Heading in degrees, [0, 360). 0 = +x, 90 = +y */
  readonly theta: number;
  /** World-frame linear velocity */
  readonly vx: number;
  readonly vy: number;
  /** Angular velocity in degrees per second */
  readonly vTheta: number;
}

/**
 * Full snapshot of the field at one control step.
 * Robot arrays are ordered by id.
 */
export interface Frame {
  readonly ball: BallState;
  readonly robotsBlue: readonly RobotState[];
  readonly robotsYellow: readonly RobotState[];
}

/** Physical actuator instruction for one robot. */
export interface RobotCommand {
  readonly id: number;
  readonly yellow: boolean;
  /** Left wheel angular speed in rad/s */
  readonly vWheel0: number;
  /** Right wheel angular speed in rad/s */
  readonly vWheel1: number;
}

/**
 * Fixed field and robot geometry for an episode.
 * Lengths in metres, goal mouth centred on y = 0 at both ends.
 */
export interface FieldGeometry {
  readonly length: number;
  readonly width: number;
  readonly goalWidth: number;
  readonly goalDepth: number;
  readonly penaltyLength: number;
  readonly robotRadius: number;
  readonly wheelRadius: number;
  /** Distance between the two wheels */
  readonly axisLength: number;
  readonly motorMaxRpm: number;
  readonly ballRadius: number;
}

/**
 * Physics engine boundary. Given the current frame and one command per
 * robot, advance one control interval and return the next frame.
 * Implementations throw on malformed command lists.
 */
export interface PhysicsEngine {
  step(frame: Frame, commands: readonly RobotCommand[], field: FieldGeometry): Frame;
}

/** Nearest-neighbour query result. */
export interface NearestResult {
  point: Vec2;
  distance: number;
}

/** Minimum-distance query service used while sampling placements. */
export interface SpatialIndex {
  insert(point: Vec2): void;
  /** Nearest stored point, or null while the index is empty. */
  nearest(point: Vec2): NearestResult | null;
}
