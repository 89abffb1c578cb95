/**
 * World Step Integration Tests
 *
 * Tests the default physics step: command matching, stillness under zero
 * commands, ball damping, goal-line crossing, purity and determinism.
 */

import { describe, it, expect } from 'vitest';
import { stepWorld, matchCommands } from '../../src/engine/world';
import { createRobot } from '../../src/engine/robot';
import { FIELD, BALL, DT, SUBSTEPS } from '../../src/engine/constants';
import { goalComponent } from '../../src/ai/reward';
import type { Frame, RobotCommand, BallState } from '../../src/engine/types';

// ──────────────────────────────────────────────────────────
// Helpers
// ──────────────────────────────────────────────────────────

/** 2v1 frame with robots far from the ball. */
function makeFrame(ball: BallState = { x: 0, y: 0, vx: 0, vy: 0 }): Frame {
  return {
    ball,
    robotsBlue: [createRobot(0, false, -0.5, 0.4, 0), createRobot(1, false, -0.5, -0.4, 90)],
    robotsYellow: [createRobot(0, true, 0.3, 0.5, 180)],
  };
}

function idle(frame: Frame): RobotCommand[] {
  return [
    ...frame.robotsBlue.map((r) => ({ id: r.id, yellow: false, vWheel0: 0, vWheel1: 0 })),
    ...frame.robotsYellow.map((r) => ({ id: r.id, yellow: true, vWheel0: 0, vWheel1: 0 })),
  ];
}

// ──────────────────────────────────────────────────────────
// matchCommands
// ──────────────────────────────────────────────────────────

describe('matchCommands', () => {
  it('accepts commands in any order', () => {
    const frame = makeFrame();
    const commands = idle(frame).reverse();
    const matched = matchCommands(frame, commands);
    expect(matched.blue.map((c) => c.id)).toEqual([0, 1]);
    expect(matched.yellow.map((c) => c.id)).toEqual([0]);
  });

  it('rejects the wrong number of commands', () => {
    const frame = makeFrame();
    expect(() => matchCommands(frame, idle(frame).slice(1))).toThrow('expected 3 commands, got 2');
  });

  it('rejects a command for an unknown robot', () => {
    const frame = makeFrame();
    const commands = idle(frame);
    commands[2] = { id: 5, yellow: true, vWheel0: 0, vWheel1: 0 };
    expect(() => matchCommands(frame, commands)).toThrow('command for unknown yellow robot 5');
  });

  it('rejects duplicate commands', () => {
    const frame = makeFrame();
    const commands = idle(frame);
    commands[1] = { id: 0, yellow: false, vWheel0: 0, vWheel1: 0 };
    expect(() => matchCommands(frame, commands)).toThrow('duplicate command for blue robot 0');
  });
});

// ──────────────────────────────────────────────────────────
// stepWorld
// ──────────────────────────────────────────────────────────

describe('stepWorld', () => {
  it('a resting field with zero commands stays exactly still', () => {
    const frame = makeFrame();
    const next = stepWorld(frame, idle(frame), FIELD);
    expect(next).toEqual(frame);
  });

  it('a rolling ball moves and slows down', () => {
    const frame = makeFrame({ x: 0, y: 0, vx: 0.5, vy: 0 });
    const next = stepWorld(frame, idle(frame), FIELD);

    const dt = DT / SUBSTEPS;
    const keep = 1 - BALL.damping * dt;
    let expectedX = 0;
    let v = 0.5;
    for (let s = 0; s < SUBSTEPS; s++) {
      expectedX += v * dt;
      v *= keep;
    }
    expect(next.ball.x).toBeCloseTo(expectedX, 12);
    expect(next.ball.vx).toBeCloseTo(v, 12);
    expect(next.ball.y).toBe(0);
  });

  it('a fast ball near the goal line crosses into the goal', () => {
    const frame = makeFrame({ x: 0.74, y: 0, vx: 2, vy: 0 });
    const next = stepWorld(frame, idle(frame), FIELD);
    expect(next.ball.x).toBeGreaterThan(FIELD.length / 2);
  });

  it('a robot pinning the ball in a corner cannot push it past the end line', () => {
    const frame: Frame = {
      ball: { x: 0.725, y: 0.4, vx: 0, vy: 0 },
      robotsBlue: [createRobot(0, false, 0.69, 0.4, 0)],
      robotsYellow: [],
    };
    const commands: RobotCommand[] = [{ id: 0, yellow: false, vWheel0: 40, vWheel1: 40 }];
    const next = stepWorld(frame, commands, FIELD);
    expect(next.ball.x).toBeCloseTo(FIELD.length / 2 - FIELD.ballRadius, 12);
    expect(next.ball.y).toBeCloseTo(0.4, 12);
    expect(goalComponent(next, FIELD)).toBe(0);
  });

  it('driving commands move the commanded robot only', () => {
    const frame = makeFrame();
    const commands = idle(frame);
    commands[0] = { id: 0, yellow: false, vWheel0: 20, vWheel1: 20 };
    const next = stepWorld(frame, commands, FIELD);
    expect(next.robotsBlue[0].x).toBeGreaterThan(frame.robotsBlue[0].x);
    expect(next.robotsBlue[0].vx).toBeCloseTo(0.026 * 20, 12);
    expect(next.robotsBlue[1]).toEqual(frame.robotsBlue[1]);
    expect(next.robotsYellow[0]).toEqual(frame.robotsYellow[0]);
  });

  it('does not mutate the input frame', () => {
    const frame = makeFrame({ x: 0, y: 0, vx: 0.5, vy: 0.2 });
    const snapshot = JSON.parse(JSON.stringify(frame));
    stepWorld(frame, idle(frame), FIELD);
    expect(frame).toEqual(snapshot);
  });

  it('identical inputs give identical frames', () => {
    const frame = makeFrame({ x: 0.1, y: -0.1, vx: 0.4, vy: 0.3 });
    const commands = idle(frame);
    commands[0] = { id: 0, yellow: false, vWheel0: 12, vWheel1: 30 };
    expect(stepWorld(frame, commands, FIELD)).toEqual(stepWorld(frame, commands, FIELD));
  });
});
