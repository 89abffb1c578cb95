/**
 * Physics Constants and Field Geometry
 *
 * VSS (Very Small Size) 3v3 field and robot dimensions, plus tuning for the
 * default physics step. Field geometry is the only part the RL layer reads;
 * the rest tunes the simplified simulation in world.ts.
 */

import type { FieldGeometry } from './types';

/** Control interval in seconds. One env step = one DT. */
export const DT = 0.025;

/** Physics sub-steps per control interval. */
export const SUBSTEPS = 5;

/** VSS field geometry, metres. */
export const FIELD = {
  length: 1.5,
  width: 1.3,
  goalWidth: 0.4,
  goalDepth: 0.1,
  penaltyLength: 0.15,
  robotRadius: 0.0375,
  wheelRadius: 0.026,
  axisLength: 0.075,
  motorMaxRpm: 440,
  ballRadius: 0.0215,
} as const satisfies FieldGeometry;

/** Ball motion tuning. */
export const BALL = {
  /** Fraction of speed lost per second to rolling friction */
  damping: 0.8,
  /** Restitution against field walls */
  wallRestitution: 0.6,
  /** Restitution against robots (robots treated as infinite mass) */
  robotRestitution: 0.4,
  /** Below this speed the ball is considered at rest */
  restSpeed: 1e-4,
} as const;

/**
 * Maximum linear wheel speed (m/s) for a field's motors:
 * motor rpm -> rad/s -> rim speed.
 */
export function maxWheelSpeed(field: FieldGeometry): number {
  return (field.motorMaxRpm / 60) * 2 * Math.PI * field.wheelRadius;
}
