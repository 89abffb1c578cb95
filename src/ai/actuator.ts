/**
 * Actuator Mapping — normalized action -> wheel angular speeds.
 *
 * Pure functions. Applies saturation and a dead-zone before converting the
 * linear rim speed to rad/s.
 */

import type { Action } from '../engine/types';
import { ActionError } from './errors';
import { ACTUATOR } from './env-config';

export interface WheelSpeeds {
  /** Left wheel, rad/s */
  left: number;
  /** Right wheel, rad/s */
  right: number;
}

export interface ActuatorParams {
  /** Max linear wheel speed, m/s */
  maxV: number;
  wheelRadius: number;
  /** Defaults to ACTUATOR.deadZone */
  deadZone?: number;
}

/**
 * Reject anything that is not a 2-element array of finite numbers.
 * Values outside [-1, 1] are accepted; the mapper saturates them.
 */
export function validateAction(raw: unknown): Action {
  if (!Array.isArray(raw) || raw.length !== 2) {
    throw new ActionError('action must be a 2-element array [left, right]');
  }
  const [left, right]: unknown[] = raw;
  if (typeof left !== 'number' || typeof right !== 'number') {
    throw new ActionError('action elements must be finite numbers');
  }
  if (!Number.isFinite(left) || !Number.isFinite(right)) {
    throw new ActionError('action elements must be finite numbers');
  }
  return [left, right];
}

/** Scale, saturate and dead-zone one wheel. Result in m/s. */
export function toLinearWheelSpeed(value: number, maxV: number, deadZone: number): number {
  const scaled = Math.max(-maxV, Math.min(maxV, value * maxV));
  return Math.abs(scaled) < deadZone ? 0 : scaled;
}

/**
 * Convert a normalized action into left/right wheel angular speeds.
 *
 * @param action - [left, right], nominally in [-1, 1]
 * @param params - Max rim speed, wheel radius, optional dead-zone override
 */
export function actionToWheelSpeeds(action: Action, params: ActuatorParams): WheelSpeeds {
  const deadZone = params.deadZone ?? ACTUATOR.deadZone;
  const left = toLinearWheelSpeed(action[0], params.maxV, deadZone);
  const right = toLinearWheelSpeed(action[1], params.maxV, deadZone);
  return {
    left: left / params.wheelRadius,
    right: right / params.wheelRadius,
  };
}
