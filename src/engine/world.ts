/**
 * World Step Function — default physics engine
 *
 * Wires robot kinematics and contact resolution into a single pure step:
 * (frame, commands) -> next frame, covering one control interval DT.
 *
 * Step sequence per sub-step:
 *   1. Advance every robot under its wheel command
 *   2. Separate overlapping robots
 *   3. Move and damp the ball
 *   4. Resolve ball vs walls / goal boxes
 *   5. Resolve ball vs each robot
 *   6. Resolve ball vs walls again
 *
 * No Math.random, no Date.now — the same inputs always give the same frame.
 */

import type { Frame, RobotCommand, RobotState, BallState, FieldGeometry, PhysicsEngine } from './types';
import { stepRobot } from './robot';
import { resolveBallWalls, resolveBallRobot, separateRobots } from './collision';
import { DT, SUBSTEPS, BALL } from './constants';

// ──────────────────────────────────────────────────────────
// matchCommands
// ──────────────────────────────────────────────────────────

/**
 * Pair every robot in the frame with exactly one command.
 * Throws when the list is the wrong length or names an unknown/duplicate robot.
 */
export function matchCommands(
  frame: Frame,
  commands: readonly RobotCommand[],
): { blue: RobotCommand[]; yellow: RobotCommand[] } {
  const expected = frame.robotsBlue.length + frame.robotsYellow.length;
  if (commands.length !== expected) {
    throw new Error(`expected ${expected} commands, got ${commands.length}`);
  }

  const blue = new Array<RobotCommand | undefined>(frame.robotsBlue.length);
  const yellow = new Array<RobotCommand | undefined>(frame.robotsYellow.length);

  for (const command of commands) {
    const team = command.yellow ? yellow : blue;
    const robots = command.yellow ? frame.robotsYellow : frame.robotsBlue;
    const index = robots.findIndex((r) => r.id === command.id);
    const side = command.yellow ? 'yellow' : 'blue';
    if (index < 0) {
      throw new Error(`command for unknown ${side} robot ${command.id}`);
    }
    if (team[index]) {
      throw new Error(`duplicate command for ${side} robot ${command.id}`);
    }
    team[index] = command;
  }

  // Length check + no duplicates means every slot is filled
  return { blue: blue.filter(isCommand), yellow: yellow.filter(isCommand) };
}

function isCommand(value: RobotCommand | undefined): value is RobotCommand {
  return value !== undefined;
}

// ──────────────────────────────────────────────────────────
// stepWorld
// ──────────────────────────────────────────────────────────

/**
 * Advance the field by one control interval.
 *
 * @param frame    - Current frame (never modified)
 * @param commands - One command per robot, any order
 * @param field    - Field geometry
 * @returns The frame DT seconds later
 */
export function stepWorld(
  frame: Frame,
  commands: readonly RobotCommand[],
  field: FieldGeometry,
): Frame {
  const matched = matchCommands(frame, commands);
  const dt = DT / SUBSTEPS;

  let blue = frame.robotsBlue;
  let yellow = frame.robotsYellow;
  let ball = frame.ball;

  for (let s = 0; s < SUBSTEPS; s++) {
    blue = blue.map((robot, i) => stepRobot(robot, matched.blue[i], field, dt));
    yellow = yellow.map((robot, i) => stepRobot(robot, matched.yellow[i], field, dt));

    [blue, yellow] = separateAll(blue, yellow, field);

    ball = moveBall(ball, dt);
    ball = resolveBallWalls(ball, field);
    for (const robot of blue) ball = resolveBallRobot(ball, robot, field);
    for (const robot of yellow) ball = resolveBallRobot(ball, robot, field);
    // A robot contact can push the ball through a wall
    ball = resolveBallWalls(ball, field);
  }

  return { ball, robotsBlue: blue, robotsYellow: yellow };
}

/** Default engine used by the environment unless one is injected. */
export const defaultPhysics: PhysicsEngine = { step: stepWorld };

// --- Internal helpers ---

function moveBall(ball: BallState, dt: number): BallState {
  const keep = Math.max(0, 1 - BALL.damping * dt);
  let vx = ball.vx * keep;
  let vy = ball.vy * keep;
  if (Math.sqrt(vx * vx + vy * vy) < BALL.restSpeed) {
    vx = 0;
    vy = 0;
  }
  return { x: ball.x + ball.vx * dt, y: ball.y + ball.vy * dt, vx, vy };
}

function separateAll(
  blue: readonly RobotState[],
  yellow: readonly RobotState[],
  field: FieldGeometry,
): [RobotState[], RobotState[]] {
  const all = [...blue, ...yellow];
  for (let i = 0; i < all.length; i++) {
    for (let j = i + 1; j < all.length; j++) {
      [all[i], all[j]] = separateRobots(all[i], all[j], field);
    }
  }
  return [all.slice(0, blue.length), all.slice(blue.length)];
}
