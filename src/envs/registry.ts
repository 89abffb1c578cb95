import type { EnvConfig, RewardMode } from '../ai/env-config';
import type { EnvDeps } from '../ai/strat-env';
import { StratEnv } from '../ai/strat-env';

export interface EnvInfo {
  id: string;
  description: string;
  mode: RewardMode;
  /** Steps before truncation */
  maxSteps: number;
}

export const ENVIRONMENTS: EnvInfo[] = [
  {
    id: 'vssStrat-v0',
    description: 'VSS 3v3, single learner, stratified reward vector [move, ballGrad, energy, goal]',
    mode: 'stratified',
    maxSteps: 1200,
  },
  {
    id: 'vssOri-v0',
    description: 'VSS 3v3, single learner, legacy weighted scalar reward',
    mode: 'legacy',
    maxSteps: 1200,
  },
];

export function findEnvironment(id: string): EnvInfo {
  const info = ENVIRONMENTS.find((e) => e.id === id);
  if (!info) {
    throw new Error(`Unknown environment "${id}". Available: ${ENVIRONMENTS.map((e) => e.id).join(', ')}`);
  }
  return info;
}

/**
 * Build a registered environment. The registered mode always wins;
 * other settings may be overridden.
 */
export function createEnv(
  id: string,
  overrides: Omit<Partial<EnvConfig>, 'mode'> = {},
  deps: EnvDeps = {},
): StratEnv {
  const info = findEnvironment(id);
  return new StratEnv<RewardMode>(
    { ...overrides, mode: info.mode, maxSteps: overrides.maxSteps ?? info.maxSteps },
    deps,
  );
}
