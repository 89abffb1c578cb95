export { StratEnv } from './ai/strat-env';
export type {
  BoxSpace,
  EnvDeps,
  EnvSpaces,
  EpisodePhase,
  ResetResult,
  StepInfo,
  StepResult,
  StratEnvConfig,
} from './ai/strat-env';
export { ENVIRONMENTS, createEnv, findEnvironment } from './envs/registry';
export type { EnvInfo } from './envs/registry';
export { DEFAULT_ENV_CONFIG, REWARD, OBS, ACTUATOR, PLACEMENT, NUM_REWARDS } from './ai/env-config';
export type { EnvConfig, RewardMode } from './ai/env-config';
export { EnvUsageError, ActionError, PlacementError } from './ai/errors';
export { computeRewardComponents, REWARD_COMPONENTS } from './ai/reward';
export type { RewardVector, RewardScales } from './ai/reward';
export { legacyReward, createRewardAggregator } from './ai/reward-aggregator';
export type { EpisodeAccumulator, RewardFor } from './ai/reward-aggregator';
export { buildObservation, observationScales, observationSize } from './ai/observations';
export { actionToWheelSpeeds } from './ai/actuator';
export { samplePlacement } from './ai/placement';
export { NoiseActorPool, OrnsteinUhlenbeckAction } from './ai/noise';
export type { NoiseSource, ActorSlot } from './ai/noise';
export { BridgeSession, startBridgeServer } from './ai/bridge-server';
export { defaultPhysics } from './engine/world';
export { KdTree } from './engine/kdtree';
export { FIELD } from './engine/constants';
export type {
  Action,
  BallState,
  FieldGeometry,
  Frame,
  PhysicsEngine,
  RobotCommand,
  RobotState,
  SpatialIndex,
} from './engine/types';
