import { describe, it, expect } from 'vitest';
import {
  accumulate,
  createAccumulator,
  createRewardAggregator,
  goalFlags,
  legacyReward,
} from '../../src/ai/reward-aggregator';
import type { RewardVector } from '../../src/ai/reward';

describe('legacyReward', () => {
  it('weights the components 0.66 / 0.32 / 0.0053 / 0.008', () => {
    expect(legacyReward([0.01, 0.2, -0.001, 0])).toBeCloseTo(0.0066 + 0.064 - 0.0000053, 12);
  });

  it('a goal alone is worth 0.008', () => {
    expect(legacyReward([0, 0, 0, 1])).toBeCloseTo(0.008, 15);
    expect(legacyReward([0, 0, 0, -1])).toBeCloseTo(-0.008, 15);
  });

  it('accepts custom weights', () => {
    expect(legacyReward([1, 2, 3, 4], [1, 1, 1, 1])).toBe(10);
  });
});

describe('createRewardAggregator', () => {
  const components: RewardVector = [0.01, 0.2, -0.001, 0];

  it('stratified returns the component vector itself', () => {
    const aggregator = createRewardAggregator('stratified');
    expect(aggregator.mode).toBe('stratified');
    expect(aggregator.aggregate(components)).toBe(components);
  });

  it('legacy returns the weighted scalar', () => {
    const aggregator = createRewardAggregator('legacy');
    expect(aggregator.mode).toBe('legacy');
    expect(aggregator.aggregate(components)).toBe(legacyReward(components));
  });
});

describe('goalFlags', () => {
  it('maps the goal sign to blue / yellow flags', () => {
    expect(goalFlags([0, 0, 0, 1])).toEqual({ goalBlue: 1, goalYellow: 0 });
    expect(goalFlags([0, 0, 0, -1])).toEqual({ goalBlue: 0, goalYellow: 1 });
    expect(goalFlags([0.1, 0.1, -0.1, 0])).toEqual({ goalBlue: 0, goalYellow: 0 });
  });
});

describe('accumulate', () => {
  it('starts from zero when there is no accumulator yet', () => {
    const acc = accumulate(null, [0.01, 0.2, -0.001, 0]);
    expect(acc.move).toBe(0.01);
    expect(acc.ballGrad).toBe(0.2);
    expect(acc.energy).toBe(-0.001);
    expect(acc.goal).toBe(0);
    expect(acc.original).toBe(legacyReward([0.01, 0.2, -0.001, 0]));
    expect(acc.goalsBlue).toBe(0);
    expect(acc.goalsYellow).toBe(0);
  });

  it('sums unweighted components and the legacy total over steps', () => {
    const steps: RewardVector[] = [
      [0.01, 0.2, -0.001, 0],
      [0.02, -0.1, -0.002, 0],
      [0, 0, 0, 1],
    ];
    let acc = createAccumulator();
    for (const s of steps) acc = accumulate(acc, s);

    expect(acc.move).toBeCloseTo(0.03, 12);
    expect(acc.ballGrad).toBeCloseTo(0.1, 12);
    expect(acc.energy).toBeCloseTo(-0.003, 12);
    expect(acc.goal).toBe(1);
    expect(acc.original).toBeCloseTo(steps.reduce((sum, s) => sum + legacyReward(s), 0), 12);
    expect(acc.goalsBlue).toBe(1);
    expect(acc.goalsYellow).toBe(0);
  });

  it('does not modify the previous accumulator', () => {
    const before = accumulate(null, [0.01, 0, 0, 0]);
    const after = accumulate(before, [0.01, 0, 0, -1]);
    expect(before.move).toBe(0.01);
    expect(before.goalsYellow).toBe(0);
    expect(after.move).toBe(0.02);
    expect(after.goalsYellow).toBe(1);
  });
});
