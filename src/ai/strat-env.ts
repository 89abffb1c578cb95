/**
 * StratEnv — episode controller wrapping physics + the RL layer.
 *
 * Adapts the soccer field into an episode-based RL interface. Samples the
 * start frame, maps actions to wheel commands (learner + noise actors),
 * advances the physics engine, encodes observations, decomposes and
 * aggregates rewards, and decides termination.
 *
 * One instance = one in-flight episode. Nothing is shared between instances.
 */

import type {
  Action,
  Frame,
  FieldGeometry,
  PhysicsEngine,
  RobotCommand,
  SpatialIndex,
} from '../engine/types';
import { defaultPhysics } from '../engine/world';
import { DT, maxWheelSpeed } from '../engine/constants';
import { KdTree } from '../engine/kdtree';
import type { ActuatorParams } from './actuator';
import { actionToWheelSpeeds, validateAction } from './actuator';
import type { ActorSlot, NoiseSource } from './noise';
import { NoiseActorPool, OrnsteinUhlenbeckAction } from './noise';
import type { ObservationScales } from './observations';
import { buildObservation, observationScales, observationSize } from './observations';
import { samplePlacement } from './placement';
import type { RewardVector } from './reward';
import { computeRewardComponents } from './reward';
import type { EpisodeAccumulator, RewardAggregator, RewardFor } from './reward-aggregator';
import { accumulate, createRewardAggregator, goalFlags } from './reward-aggregator';
import type { Rng } from './rng';
import { createRng } from './rng';
import type { EnvConfig, RewardMode } from './env-config';
import { DEFAULT_ENV_CONFIG, NUM_REWARDS, OBS, REWARD } from './env-config';
import { EnvUsageError } from './errors';

/** Replaceable collaborators. Defaults: built-in physics, k-d tree, OU noise. */
export interface EnvDeps {
  physics?: PhysicsEngine;
  createIndex?: () => SpatialIndex;
  createNoise?: (slot: ActorSlot, rng: Rng, dt: number) => NoiseSource;
}

export type EpisodePhase = 'uninitialized' | 'running' | 'done';

export interface BoxSpace {
  shape: readonly number[];
  low: number | readonly number[];
  high: number | readonly number[];
}

export interface EnvSpaces {
  observation: BoxSpace;
  action: BoxSpace;
  /** Per-component reward bounds; null in legacy mode (scalar reward) */
  reward: BoxSpace | null;
}

export interface StepInfo {
  /** This step's unweighted components */
  components: RewardVector;
  /** Running episode totals of each component */
  rewardMove: number;
  rewardBallGrad: number;
  rewardEnergy: number;
  rewardGoal: number;
  /** Running legacy-equivalent total */
  originalReward: number;
  goalBlue: 0 | 1;
  goalYellow: 0 | 1;
  stepCount: number;
}

export interface ResetResult {
  observation: number[];
  info: { stepCount: number };
}

export interface StepResult<M extends RewardMode> {
  observation: number[];
  reward: RewardFor<M>;
  /** A goal was scored */
  done: boolean;
  /** The step limit was reached without a goal */
  truncated: boolean;
  info: StepInfo;
}

type Episode =
  | { phase: 'uninitialized' }
  | {
      phase: 'running' | 'done';
      frame: Frame;
      /** Frame produced by the previous step; null until the first step */
      lastFrame: Frame | null;
      /** Commands sent on the previous step; learner first */
      sentCommands: readonly RobotCommand[] | null;
      accumulator: EpisodeAccumulator | null;
      stepCount: number;
    };

export type StratEnvConfig<M extends RewardMode> = Partial<EnvConfig<M>> & { mode: M };

export class StratEnv<M extends RewardMode = RewardMode> {
  readonly config: EnvConfig<M>;
  private readonly physics: PhysicsEngine;
  private readonly createIndex: () => SpatialIndex;
  private readonly aggregator: RewardAggregator<M>;
  private readonly actors: NoiseActorPool;
  private readonly placementRng: Rng;
  private readonly scales: ObservationScales;
  private readonly actuator: ActuatorParams;
  private episode: Episode = { phase: 'uninitialized' };

  constructor(config: StratEnvConfig<M>, deps: EnvDeps = {}) {
    const merged: EnvConfig<M> = { ...DEFAULT_ENV_CONFIG, ...config };
    validateConfig(merged);
    this.config = merged;

    this.physics = deps.physics ?? defaultPhysics;
    this.createIndex = deps.createIndex ?? (() => new KdTree());
    this.aggregator = createRewardAggregator(merged.mode);
    this.scales = observationScales(merged.field);
    this.actuator = { maxV: maxWheelSpeed(merged.field), wheelRadius: merged.field.wheelRadius };
    this.placementRng = createRng(merged.seed, 'placement');

    const createNoise =
      deps.createNoise ?? ((_slot: ActorSlot, rng: Rng, dt: number) => new OrnsteinUhlenbeckAction(rng, { dt }));
    this.actors = new NoiseActorPool(merged.nRobotsBlue, merged.nRobotsYellow, (slot) =>
      createNoise(slot, createRng(merged.seed, `noise:${slot.yellow ? 'yellow' : 'blue'}:${slot.id}`), DT),
    );
  }

  get phase(): EpisodePhase {
    return this.episode.phase;
  }

  get field(): FieldGeometry {
    return this.config.field;
  }

  /** Declared observation, action and (stratified) reward spaces. */
  get spaces(): EnvSpaces {
    const { nRobotsBlue, nRobotsYellow, mode } = this.config;
    return {
      observation: {
        shape: [observationSize(nRobotsBlue, nRobotsYellow)],
        low: -OBS.normBounds,
        high: OBS.normBounds,
      },
      action: { shape: [2], low: -1, high: 1 },
      reward: mode === 'stratified' ? { shape: [NUM_REWARDS], low: REWARD.min, high: REWARD.max } : null,
    };
  }

  reset(): ResetResult {
    this.actors.reset();

    const frame = samplePlacement(this.config.field, {
      nRobotsBlue: this.config.nRobotsBlue,
      nRobotsYellow: this.config.nRobotsYellow,
      rng: this.placementRng,
      maxAttempts: this.config.placementMaxAttempts,
      createIndex: this.createIndex,
    });

    this.episode = {
      phase: 'running',
      frame,
      lastFrame: null,
      sentCommands: null,
      accumulator: null,
      stepCount: 0,
    };

    return {
      observation: buildObservation(frame, this.scales),
      info: { stepCount: 0 },
    };
  }

  step(action: Action): StepResult<M> {
    const episode = this.episode;
    if (episode.phase === 'uninitialized') {
      throw new EnvUsageError('step() called before reset()');
    }
    if (episode.phase === 'done') {
      throw new EnvUsageError('step() called after the episode ended; call reset()');
    }

    // Reject bad input before anything is mutated
    const learnerAction = validateAction(action);
    const commands = this.buildCommands(learnerAction);

    let frame: Frame;
    try {
      frame = this.physics.step(episode.frame, commands, this.config.field);
    } catch (err) {
      // Noise actors have already advanced; the episode cannot continue
      this.episode = { ...episode, phase: 'done' };
      throw err;
    }

    const { components, done } = computeRewardComponents(
      episode.lastFrame,
      frame,
      commands[0],
      this.config.field,
    );
    const reward = this.aggregator.aggregate(components);
    const accumulator = accumulate(episode.accumulator, components);
    const stepCount = episode.stepCount + 1;
    const truncated = !done && stepCount >= this.config.maxSteps;

    this.episode = {
      phase: done || truncated ? 'done' : 'running',
      frame,
      lastFrame: frame,
      sentCommands: commands,
      accumulator,
      stepCount,
    };

    return {
      observation: buildObservation(frame, this.scales),
      reward,
      done,
      truncated,
      info: {
        components,
        rewardMove: accumulator.move,
        rewardBallGrad: accumulator.ballGrad,
        rewardEnergy: accumulator.energy,
        rewardGoal: accumulator.goal,
        originalReward: accumulator.original,
        ...goalFlags(components),
        stepCount,
      },
    };
  }

  /** Current frame, or null before the first reset. */
  getFrame(): Frame | null {
    return this.episode.phase === 'uninitialized' ? null : this.episode.frame;
  }

  /** Commands sent on the last step, learner first. Null right after reset. */
  getSentCommands(): readonly RobotCommand[] | null {
    return this.episode.phase === 'uninitialized' ? null : this.episode.sentCommands;
  }

  /** Episode totals, or null until the first step of an episode. */
  getAccumulator(): EpisodeAccumulator | null {
    return this.episode.phase === 'uninitialized' ? null : this.episode.accumulator;
  }

  // --- Internal helpers ---

  /** Learner (blue 0) first, then noise actors in pool order. */
  private buildCommands(learnerAction: Action): RobotCommand[] {
    const commands: RobotCommand[] = [this.toCommand(0, false, learnerAction)];
    this.actors.slots.forEach((slot, i) => {
      commands.push(this.toCommand(slot.id, slot.yellow, this.actors.sample(i)));
    });
    return commands;
  }

  private toCommand(id: number, yellow: boolean, action: Action): RobotCommand {
    const { left, right } = actionToWheelSpeeds(action, this.actuator);
    return { id, yellow, vWheel0: left, vWheel1: right };
  }
}

function validateConfig(config: EnvConfig): void {
  const { nRobotsBlue, nRobotsYellow, maxSteps, placementMaxAttempts } = config;
  if (!Number.isInteger(nRobotsBlue) || nRobotsBlue < 1) {
    throw new Error(`nRobotsBlue must be an integer >= 1 (the learner is blue 0), got ${nRobotsBlue}`);
  }
  if (!Number.isInteger(nRobotsYellow) || nRobotsYellow < 0) {
    throw new Error(`nRobotsYellow must be an integer >= 0, got ${nRobotsYellow}`);
  }
  if (!Number.isInteger(maxSteps) || maxSteps < 1) {
    throw new Error(`maxSteps must be an integer >= 1, got ${maxSteps}`);
  }
  if (!Number.isInteger(placementMaxAttempts) || placementMaxAttempts < 1) {
    throw new Error(`placementMaxAttempts must be an integer >= 1, got ${placementMaxAttempts}`);
  }
}
