/**
 * Seeded random sources for placement sampling and noise actors.
 *
 * Each consumer gets its own named stream derived from the env seed, so
 * adding a robot does not shift the placement draws and vice versa.
 */

import seedrandom from 'seedrandom';

/** Uniform source in [0, 1). */
export type Rng = () => number;

/**
 * Create a named stream. A null seed gives an auto-seeded (nondeterministic) stream.
 */
export function createRng(seed: string | number | null, stream: string): Rng {
  if (seed === null) return seedrandom();
  return seedrandom(`${seed}:${stream}`);
}

/** Uniform sample in [min, max). */
export function uniform(rng: Rng, min: number, max: number): number {
  return min + (max - min) * rng();
}

/** Standard normal sample via Box–Muller. */
export function gaussian(rng: Rng): number {
  let u = 0;
  let v = 0;
  while (u === 0) u = rng();
  while (v === 0) v = rng();
  return Math.sqrt(-2.0 * Math.log(u)) * Math.cos(2.0 * Math.PI * v);
}
