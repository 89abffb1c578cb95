/**
 * Noise-Driven Actors — default actions for every robot the agent does not control.
 *
 * Each non-learning robot owns one temporally-correlated noise source.
 * The default source is an Ornstein–Uhlenbeck process centred on the middle
 * of the action box.
 */

import type { Action } from '../engine/types';
import type { Rng } from './rng';
import { gaussian } from './rng';

/** Per-actor stochastic action source. */
export interface NoiseSource {
  /** Clear correlation state. Called once per episode. */
  reset(): void;
  /** Next action, within [-1, 1] on both wheels. */
  sample(): Action;
}

export interface OrnsteinUhlenbeckOptions {
  /** Mean reversion rate */
  theta?: number;
  /** Time step of the process (the env control interval) */
  dt?: number;
  /** Initial state; defaults to the mean */
  x0?: Action;
}

const ACTION_LOW = -1;
const ACTION_HIGH = 1;

/**
 * x' = x + theta * (mu - x) * dt + sigma * sqrt(dt) * N(0, 1)
 *
 * mu is the centre of the action box and sigma half the distance from mu to
 * the upper bound. The internal state is left unclipped; only the returned
 * action is clipped to the box.
 */
export class OrnsteinUhlenbeckAction implements NoiseSource {
  private readonly theta: number;
  private readonly dt: number;
  private readonly mu = (ACTION_HIGH + ACTION_LOW) / 2;
  private readonly sigma = (ACTION_HIGH - (ACTION_HIGH + ACTION_LOW) / 2) / 2;
  private readonly x0: Action | null;
  private state: [number, number] = [0, 0];

  constructor(
    private readonly rng: Rng,
    options: OrnsteinUhlenbeckOptions = {},
  ) {
    this.theta = options.theta ?? 0.17;
    this.dt = options.dt ?? 0.025;
    this.x0 = options.x0 ?? null;
    this.reset();
  }

  reset(): void {
    this.state = this.x0 ? [this.x0[0], this.x0[1]] : [this.mu, this.mu];
  }

  sample(): Action {
    const next = (x: number) =>
      x + this.theta * (this.mu - x) * this.dt + this.sigma * Math.sqrt(this.dt) * gaussian(this.rng);
    this.state = [next(this.state[0]), next(this.state[1])];
    return [clipAction(this.state[0]), clipAction(this.state[1])];
  }
}

function clipAction(value: number): number {
  return Math.max(ACTION_LOW, Math.min(ACTION_HIGH, value));
}

/** Identifies which robot a pooled source drives. */
export interface ActorSlot {
  id: number;
  yellow: boolean;
}

/**
 * One noise source per non-learning robot: blue 1..n-1, then yellow 0..m-1.
 * Blue robot 0 is the learner and has no source.
 */
export class NoiseActorPool {
  readonly slots: readonly ActorSlot[];
  private readonly sources: NoiseSource[];

  constructor(
    nRobotsBlue: number,
    nRobotsYellow: number,
    createSource: (slot: ActorSlot, index: number) => NoiseSource,
  ) {
    const slots: ActorSlot[] = [];
    for (let i = 1; i < nRobotsBlue; i++) slots.push({ id: i, yellow: false });
    for (let i = 0; i < nRobotsYellow; i++) slots.push({ id: i, yellow: true });
    this.slots = slots;
    this.sources = slots.map((slot, index) => createSource(slot, index));
  }

  reset(): void {
    for (const source of this.sources) source.reset();
  }

  /** Next action for the actor at `index` in slot order. */
  sample(index: number): Action {
    const source = this.sources[index];
    if (!source) {
      throw new RangeError(`no noise actor at index ${index}`);
    }
    return source.sample();
  }
}
