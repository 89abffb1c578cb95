/**
 * Robot Kinematics — Differential Drive
 *
 * Pure functions advancing a two-wheeled robot given wheel angular speeds.
 * No wheel slip, no motor dynamics: the commanded wheel speeds take effect
 * immediately. Heading is integrated at the mid-point of the interval.
 */

import type { RobotState, RobotCommand, FieldGeometry } from './types';
import { degToRad, radToDeg, wrapDegrees } from './vec2';

// ──────────────────────────────────────────────────────────
// createRobot
// ──────────────────────────────────────────────────────────

/** Create a robot at rest at the given pose. */
export function createRobot(
  id: number,
  yellow: boolean,
  x: number,
  y: number,
  theta: number,
): RobotState {
  return { id, yellow, x, y, theta: wrapDegrees(theta), vx: 0, vy: 0, vTheta: 0 };
}

// ──────────────────────────────────────────────────────────
// stepRobot
// ──────────────────────────────────────────────────────────

/**
 * Advance one robot by dt seconds under a wheel command.
 *
 * Linear speed  = r * (wL + wR) / 2
 * Angular speed = r * (wR - wL) / axisLength   (positive = counter-clockwise)
 *
 * The robot is kept inside the field walls; a clamped axis loses its
 * velocity component.
 */
export function stepRobot(
  robot: RobotState,
  command: RobotCommand,
  field: FieldGeometry,
  dt: number,
): RobotState {
  const r = field.wheelRadius;
  const v = (r * (command.vWheel0 + command.vWheel1)) / 2;
  const omega = (r * (command.vWheel1 - command.vWheel0)) / field.axisLength;
  const omegaDeg = radToDeg(omega);

  const midHeading = degToRad(robot.theta + (omegaDeg * dt) / 2);
  let x = robot.x + v * Math.cos(midHeading) * dt;
  let y = robot.y + v * Math.sin(midHeading) * dt;

  const theta = wrapDegrees(robot.theta + omegaDeg * dt);
  // A stopped robot reports +0, never -0, whatever its heading
  let vx = v === 0 ? 0 : v * Math.cos(degToRad(theta));
  let vy = v === 0 ? 0 : v * Math.sin(degToRad(theta));

  const maxX = field.length / 2 - field.robotRadius;
  const maxY = field.width / 2 - field.robotRadius;
  if (Math.abs(x) > maxX) {
    x = Math.sign(x) * maxX;
    vx = 0;
  }
  if (Math.abs(y) > maxY) {
    y = Math.sign(y) * maxY;
    vy = 0;
  }

  return { ...robot, x, y, theta, vx, vy, vTheta: omegaDeg };
}
