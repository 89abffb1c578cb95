/**
 * Environment Configuration — types, constants, and defaults.
 *
 * All magic numbers for actuator mapping, placement sampling, observation
 * normalization and reward computation live here. Engine-side only.
 */

import type { FieldGeometry } from '../engine/types';
import { FIELD } from '../engine/constants';

/** Observation normalization constants. */
export const OBS = {
  /** Declared symmetric bound of every observation value. Soft: values are not clipped. */
  normBounds: 1.25,
  /** Robot radius + wheel thickness, used to turn max wheel speed into max spin rate */
  spinRadius: 0.04,
} as const;

/** Actuator mapping constants. */
export const ACTUATOR = {
  /** Linear wheel speeds (m/s) with magnitude below this are sent as exactly 0 */
  deadZone: 0.05,
} as const;

/** Initial placement sampling constants. */
export const PLACEMENT = {
  /** Minimum distance between any two placed entities */
  minSeparation: 0.1,
  /** Keep-out margin from the field walls */
  margin: 0.1,
  /** Draws allowed per entity before placement fails */
  maxAttempts: 1000,
} as const;

/** Number of reward components. Order: move, ballGrad, energy, goal. */
export const NUM_REWARDS = 4;

/** Reward decomposition constants. */
export const REWARD = {
  /** Divisor of the move-to-ball cosine term */
  moveScale: 120,
  /** Divisor of the ball-potential gradient */
  gradScale: 0.75,
  /** Divisor of the summed absolute wheel speeds (rad/s) */
  energyScale: 40000,
  /** Weights folding the component vector into the legacy scalar. Sum to ~1. */
  legacyWeights: [0.66, 0.32, 0.0053, 0.008],
  /** Nominal per-component lower bounds, for stratified consumers */
  min: [0.0, 0.0, -2.0, 0.0],
  /** Nominal per-component upper bounds, for stratified consumers */
  max: [0.5, 1.0, -1.0, 1.0],
} as const;

/**
 * stratified: the step reward is the raw component vector.
 * legacy: the step reward is the weighted scalar.
 */
export type RewardMode = 'stratified' | 'legacy';

export interface EnvConfig<M extends RewardMode = RewardMode> {
  mode: M;
  nRobotsBlue: number;
  nRobotsYellow: number;
  field: FieldGeometry;
  /** Steps before the episode is truncated */
  maxSteps: number;
  /** Seed for placement and noise actors. null = nondeterministic. */
  seed: string | number | null;
  placementMaxAttempts: number;
}

export const DEFAULT_ENV_CONFIG = {
  mode: 'stratified',
  nRobotsBlue: 3,
  nRobotsYellow: 3,
  field: FIELD,
  maxSteps: 1200,
  seed: null,
  placementMaxAttempts: PLACEMENT.maxAttempts,
} as const satisfies EnvConfig;
