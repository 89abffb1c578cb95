/**
 * Contact Resolution — ball vs walls, ball vs robots, robot vs robot
 *
 * Robots and the ball are circles. Robots are treated as infinite mass when
 * they hit the ball, so only the ball's velocity changes. Robot overlaps are
 * split evenly without touching velocities.
 *
 * The end walls are open across the goal mouth (|y| < goalWidth / 2); a ball
 * that passes the goal line is held inside the goal box. A ball past the goal
 * line outside the mouth is put back on the end wall.
 */

import type { BallState, RobotState, FieldGeometry, Vec2 } from './types';
import { vec2, sub, add, scale, dot, normalize, length as vecLength, fromDegrees } from './vec2';
import { BALL } from './constants';

// ──────────────────────────────────────────────────────────
// resolveBallWalls
// ──────────────────────────────────────────────────────────

/**
 * Keep the ball inside the field (or inside a goal box once it has crossed
 * the goal line), reflecting the velocity component into the wall.
 */
export function resolveBallWalls(ball: BallState, field: FieldGeometry): BallState {
  const halfLength = field.length / 2;
  const halfWidth = field.width / 2;
  const halfGoal = field.goalWidth / 2;
  const br = field.ballRadius;
  const e = BALL.wallRestitution;

  let { x, y, vx, vy } = ball;

  if (Math.abs(x) > halfLength && Math.abs(y) < halfGoal) {
    // Inside a goal box: side posts and back net
    const maxY = halfGoal - br;
    if (Math.abs(y) > maxY) {
      y = Math.sign(y) * maxY;
      vy = -vy * e;
    }
    const maxX = halfLength + field.goalDepth - br;
    if (Math.abs(x) > maxX) {
      x = Math.sign(x) * maxX;
      vx = -vx * e;
    }
    return { x, y, vx, vy };
  }

  const maxY = halfWidth - br;
  if (Math.abs(y) > maxY) {
    y = Math.sign(y) * maxY;
    vy = -vy * e;
  }

  const maxX = halfLength - br;
  if (Math.abs(x) > maxX && Math.abs(y) >= halfGoal) {
    x = Math.sign(x) * maxX;
    vx = -vx * e;
  }

  return { x, y, vx, vy };
}

// ──────────────────────────────────────────────────────────
// resolveBallRobot
// ──────────────────────────────────────────────────────────

/**
 * Push the ball out of a robot and bounce it off the robot's moving body.
 * Returns the ball unchanged when the two do not overlap.
 */
export function resolveBallRobot(
  ball: BallState,
  robot: RobotState,
  field: FieldGeometry,
): BallState {
  const contactDist = field.robotRadius + field.ballRadius;
  const offset = sub(vec2(ball.x, ball.y), vec2(robot.x, robot.y));
  const dist = vecLength(offset);
  if (dist >= contactDist) return ball;

  // Coincident centres: push out along the robot's heading
  const normal = dist < 1e-10 ? fromDegrees(robot.theta) : normalize(offset);
  const position = add(vec2(robot.x, robot.y), scale(normal, contactDist));

  let velocity: Vec2 = vec2(ball.vx, ball.vy);
  const relative = sub(velocity, vec2(robot.vx, robot.vy));
  const vn = dot(relative, normal);
  if (vn < 0) {
    velocity = sub(velocity, scale(normal, (1 + BALL.robotRestitution) * vn));
  }

  return { x: position.x, y: position.y, vx: velocity.x, vy: velocity.y };
}

// ──────────────────────────────────────────────────────────
// separateRobots
// ──────────────────────────────────────────────────────────

/**
 * Split any overlap between two robots evenly along the line between them.
 * Returns the pair unchanged when they do not overlap.
 */
export function separateRobots(
  a: RobotState,
  b: RobotState,
  field: FieldGeometry,
): [RobotState, RobotState] {
  const minDist = 2 * field.robotRadius;
  const offset = sub(vec2(b.x, b.y), vec2(a.x, a.y));
  const dist = vecLength(offset);
  if (dist >= minDist) return [a, b];

  const normal = dist < 1e-10 ? vec2(1, 0) : normalize(offset);
  const push = (minDist - dist) / 2;

  return [
    { ...a, x: a.x - normal.x * push, y: a.y - normal.y * push },
    { ...b, x: b.x + normal.x * push, y: b.y + normal.y * push },
  ];
}
