/**
 * Reward Decomposition — per-step reward components from consecutive frames.
 *
 * Pure function: takes the previous frame (null right after reset), the
 * current frame, and the last command sent to the learner. No frame is
 * retained between calls.
 */

import type { Frame, FieldGeometry, RobotCommand } from '../engine/types';
import { vec2, sub, dot, normalize, distance } from '../engine/vec2';
import { REWARD } from './env-config';

/** [move, ballGrad, energy, goal]. Position is part of the contract. */
export type RewardVector = readonly [move: number, ballGrad: number, energy: number, goal: number];

export const REWARD_COMPONENTS = ['move', 'ballGrad', 'energy', 'goal'] as const;

export interface RewardScales {
  move: number;
  grad: number;
  energy: number;
}

export const DEFAULT_REWARD_SCALES: RewardScales = {
  move: REWARD.moveScale,
  grad: REWARD.gradScale,
  energy: REWARD.energyScale,
};

export interface RewardResult {
  components: RewardVector;
  /** True iff a goal was scored this step */
  done: boolean;
}

/**
 * +1 when the ball is past the opponent's goal line (+x), -1 past our own, else 0.
 */
export function goalComponent(frame: Frame, field: FieldGeometry): number {
  const halfLength = field.length / 2;
  if (frame.ball.x > halfLength) return 1;
  if (frame.ball.x < -halfLength) return -1;
  return 0;
}

/**
 * Cosine-style alignment between the learner's velocity and the direction
 * robot -> ball, divided by the move scale. Zero when robot and ball coincide.
 */
export function moveToBall(frame: Frame, scale: number): number {
  const robot = frame.robotsBlue[0];
  const toBall = normalize(sub(vec2(frame.ball.x, frame.ball.y), vec2(robot.x, robot.y)));
  return dot(toBall, vec2(robot.vx, robot.vy)) / scale;
}

/**
 * Change in ball distance to the opponent's goal mouth (halfLength, 0),
 * positive when the ball got closer.
 */
export function ballPotentialGradient(
  prev: Frame,
  curr: Frame,
  field: FieldGeometry,
  scale: number,
): number {
  const goal = vec2(field.length / 2, 0);
  const prevDist = distance(goal, vec2(prev.ball.x, prev.ball.y));
  const currDist = distance(goal, vec2(curr.ball.x, curr.ball.y));
  return (prevDist - currDist) / scale;
}

/** Negative summed absolute wheel speeds of the learner's last command. */
export function energyPenalty(command: RobotCommand, scale: number): number {
  const effort = Math.abs(command.vWheel0) + Math.abs(command.vWheel1);
  // Idle wheels give +0, not -0
  return effort === 0 ? 0 : -effort / scale;
}

/**
 * Compute the reward components for one step.
 *
 * A goal short-circuits the other three terms (all zero on a terminal frame).
 * Move and gradient need a previous frame and are zero without one.
 *
 * @param prev           Frame from the previous step, null on the first step after reset
 * @param curr           Frame produced by this step
 * @param learnerCommand Command sent to blue robot 0 this step
 * @param field          Field geometry
 * @param scales         Component divisors
 */
export function computeRewardComponents(
  prev: Frame | null,
  curr: Frame,
  learnerCommand: RobotCommand,
  field: FieldGeometry,
  scales: RewardScales = DEFAULT_REWARD_SCALES,
): RewardResult {
  const goal = goalComponent(curr, field);
  if (goal !== 0) {
    return { components: [0, 0, 0, goal], done: true };
  }

  const move = prev ? moveToBall(curr, scales.move) : 0;
  const ballGrad = prev ? ballPotentialGradient(prev, curr, field, scales.grad) : 0;
  const energy = energyPenalty(learnerCommand, scales.energy);

  return { components: [move, ballGrad, energy, 0], done: false };
}
