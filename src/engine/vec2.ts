/**
 * 2D Vector Math Module
 *
 * Pure functions on the Vec2 interface. No classes, no mutation.
 * Shared by the physics step, the k-d tree and the reward terms.
 */

import type { Vec2 } from './types';

export type { Vec2 } from './types';

/** Create a new Vec2 from x and y components. */
export function vec2(x: number, y: number): Vec2 {
  return { x, y };
}

/** Vector addition: a + b. */
export function add(a: Vec2, b: Vec2): Vec2 {
  return { x: a.x + b.x, y: a.y + b.y };
}

/** Vector subtraction: a - b. */
export function sub(a: Vec2, b: Vec2): Vec2 {
  return { x: a.x - b.x, y: a.y - b.y };
}

/** Scalar multiplication: v * s. */
export function scale(v: Vec2, s: number): Vec2 {
  return { x: v.x * s, y: v.y * s };
}

/** Dot product of two vectors. */
export function dot(a: Vec2, b: Vec2): number {
  return a.x * b.x + a.y * b.y;
}

/** Magnitude (length) of a vector. */
export function length(v: Vec2): number {
  return Math.sqrt(v.x * v.x + v.y * v.y);
}

/** Unit vector in the same direction. Returns {0,0} if length < 1e-10. */
export function normalize(v: Vec2): Vec2 {
  const len = Math.sqrt(v.x * v.x + v.y * v.y);
  if (len < 1e-10) return { x: 0, y: 0 };
  return { x: v.x / len, y: v.y / len };
}

/** Euclidean distance between two points. */
export function distance(a: Vec2, b: Vec2): number {
  const dx = a.x - b.x;
  const dy = a.y - b.y;
  return Math.sqrt(dx * dx + dy * dy);
}

/** Squared distance -- avoids sqrt when only comparing distances. */
export function distanceSq(a: Vec2, b: Vec2): number {
  const dx = a.x - b.x;
  const dy = a.y - b.y;
  return dx * dx + dy * dy;
}

/** Unit vector from a heading in degrees. 0 = +x, 90 = +y. */
export function fromDegrees(degrees: number): Vec2 {
  const rad = degToRad(degrees);
  return { x: Math.cos(rad), y: Math.sin(rad) };
}

export function degToRad(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

export function radToDeg(radians: number): number {
  return (radians * 180) / Math.PI;
}

/** Wrap an angle in degrees to [0, 360). */
export function wrapDegrees(degrees: number): number {
  const wrapped = degrees % 360;
  return wrapped < 0 ? wrapped + 360 : wrapped;
}
