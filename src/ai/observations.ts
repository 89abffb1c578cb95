/**
 * Observation Vector Builder — flat normalized vector for the agent.
 *
 * Layout:
 *   [0..3]              ball x, y, vx, vy
 *   4 + 7i .. 10 + 7i   blue robot i: x, y, sin(theta), cos(theta), vx, vy, vTheta
 *   then 5 per yellow   yellow robot j: x, y, vx, vy, vTheta
 *
 * Yellow robots carry no heading terms. Values are NOT clipped: the declared
 * bound (OBS.normBounds) is soft and may be exceeded transiently.
 */

import type { Frame, FieldGeometry } from '../engine/types';
import { maxWheelSpeed } from '../engine/constants';
import { degToRad, radToDeg } from '../engine/vec2';
import { OBS } from './env-config';

/** Values per entity in the observation vector. */
export const OBS_LAYOUT = {
  ball: 4,
  blueRobot: 7,
  yellowRobot: 5,
} as const;

export function observationSize(nRobotsBlue: number, nRobotsYellow: number): number {
  return OBS_LAYOUT.ball + OBS_LAYOUT.blueRobot * nRobotsBlue + OBS_LAYOUT.yellowRobot * nRobotsYellow;
}

export interface ObservationScales {
  /** Position divisor, metres */
  position: number;
  /** Linear velocity divisor, m/s */
  velocity: number;
  /** Angular velocity divisor, deg/s */
  angular: number;
}

/**
 * Normalization divisors for a field.
 * position: farthest reachable coordinate (half-width, or half-length plus the penalty area)
 * velocity: max rim speed
 * angular:  spin rate at max rim speed on OBS.spinRadius
 */
export function observationScales(field: FieldGeometry): ObservationScales {
  const maxV = maxWheelSpeed(field);
  return {
    position: Math.max(field.width / 2, field.length / 2 + field.penaltyLength),
    velocity: maxV,
    angular: radToDeg(maxV / OBS.spinRadius),
  };
}

/**
 * Build the observation vector for a frame.
 * Length is observationSize(frame.robotsBlue.length, frame.robotsYellow.length).
 */
export function buildObservation(frame: Frame, scales: ObservationScales): number[] {
  const { ball, robotsBlue, robotsYellow } = frame;
  const obs = new Array<number>(observationSize(robotsBlue.length, robotsYellow.length));
  let k = 0;

  obs[k++] = ball.x / scales.position;
  obs[k++] = ball.y / scales.position;
  obs[k++] = ball.vx / scales.velocity;
  obs[k++] = ball.vy / scales.velocity;

  for (const robot of robotsBlue) {
    const heading = degToRad(robot.theta);
    obs[k++] = robot.x / scales.position;
    obs[k++] = robot.y / scales.position;
    obs[k++] = Math.sin(heading);
    obs[k++] = Math.cos(heading);
    obs[k++] = robot.vx / scales.velocity;
    obs[k++] = robot.vy / scales.velocity;
    obs[k++] = robot.vTheta / scales.angular;
  }

  for (const robot of robotsYellow) {
    obs[k++] = robot.x / scales.position;
    obs[k++] = robot.y / scales.position;
    obs[k++] = robot.vx / scales.velocity;
    obs[k++] = robot.vy / scales.velocity;
    obs[k++] = robot.vTheta / scales.angular;
  }

  return obs;
}
