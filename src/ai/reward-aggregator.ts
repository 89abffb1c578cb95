/**
 * Reward Aggregation — stratified vs legacy reward, and per-episode totals.
 *
 * The mode is picked once when the aggregator is created. Episode totals
 * always sum the unweighted components, and the legacy-equivalent scalar is
 * tracked in both modes.
 */

import type { RewardVector } from './reward';
import type { RewardMode } from './env-config';
import { REWARD } from './env-config';

interface RewardByMode {
  stratified: RewardVector;
  legacy: number;
}

/** Step reward type for a mode: the component vector or a scalar. */
export type RewardFor<M extends RewardMode> = RewardByMode[M];

export interface RewardAggregator<M extends RewardMode> {
  readonly mode: M;
  aggregate(components: RewardVector): RewardFor<M>;
}

/** Weighted sum of the component vector. */
export function legacyReward(
  components: RewardVector,
  weights: readonly number[] = REWARD.legacyWeights,
): number {
  let total = 0;
  for (let i = 0; i < components.length; i++) {
    total += components[i] * weights[i];
  }
  return total;
}

const STRATEGIES: { [K in RewardMode]: (components: RewardVector) => RewardByMode[K] } = {
  stratified: (components) => components,
  legacy: (components) => legacyReward(components),
};

export function createRewardAggregator<M extends RewardMode>(mode: M): RewardAggregator<M> {
  const strategy = STRATEGIES[mode];
  return {
    mode,
    aggregate: (components) => strategy(components),
  };
}

// ──────────────────────────────────────────────────────────
// Episode accumulator
// ──────────────────────────────────────────────────────────

/** Running per-episode totals. */
export interface EpisodeAccumulator {
  readonly move: number;
  readonly ballGrad: number;
  readonly energy: number;
  readonly goal: number;
  /** Running legacy-equivalent (weighted) total */
  readonly original: number;
  readonly goalsBlue: number;
  readonly goalsYellow: number;
}

export function createAccumulator(): EpisodeAccumulator {
  return { move: 0, ballGrad: 0, energy: 0, goal: 0, original: 0, goalsBlue: 0, goalsYellow: 0 };
}

/** Goal indicators derived from the sign of the goal component. */
export function goalFlags(components: RewardVector): { goalBlue: 0 | 1; goalYellow: 0 | 1 } {
  const goal = components[3];
  return {
    goalBlue: goal > 0 ? 1 : 0,
    goalYellow: goal < 0 ? 1 : 0,
  };
}

/**
 * Add one step to the totals. A null accumulator starts from zero, so the
 * first reward of an episode creates it.
 */
export function accumulate(acc: EpisodeAccumulator | null, components: RewardVector): EpisodeAccumulator {
  const base = acc ?? createAccumulator();
  const [move, ballGrad, energy, goal] = components;
  const { goalBlue, goalYellow } = goalFlags(components);
  return {
    move: base.move + move,
    ballGrad: base.ballGrad + ballGrad,
    energy: base.energy + energy,
    goal: base.goal + goal,
    original: base.original + legacyReward(components),
    goalsBlue: base.goalsBlue + goalBlue,
    goalsYellow: base.goalsYellow + goalYellow,
  };
}
