/**
 * Bridge Session Tests
 *
 * Exercises the message handler directly; no sockets are opened.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { BridgeSession, parseOverrides } from '../../src/ai/bridge-server';

describe('BridgeSession', () => {
  let session: BridgeSession;

  beforeEach(() => {
    session = new BridgeSession();
  });

  it('reset defaults to the stratified environment', () => {
    const response = session.handle({ type: 'reset', config: { seed: 1 } });
    expect(response).toMatchObject({ type: 'reset_result', info: { stepCount: 0 } });
    expect(session.handle({ type: 'spaces' })).toMatchObject({ type: 'spaces_result', mode: 'stratified' });
  });

  it('step returns the reward vector and flags', () => {
    session.handle({ type: 'reset', config: { seed: 1 } });
    const response = session.handle({ type: 'step', action: [0.5, 0.5] });
    expect(response).toMatchObject({ type: 'step_result', done: false, truncated: false, info: { stepCount: 1 } });
    expect(response).toHaveProperty('reward');
    expect('reward' in response && Array.isArray(response.reward)).toBe(true);
  });

  it('the legacy environment returns a scalar reward', () => {
    session.handle({ type: 'reset', envId: 'vssOri-v0', config: { seed: 1 } });
    const response = session.handle({ type: 'step', action: [0.5, 0.5] });
    expect('reward' in response && typeof response.reward).toBe('number');
  });

  it('step and spaces before reset are errors', () => {
    expect(session.handle({ type: 'step', action: [0, 0] })).toEqual({
      type: 'error',
      message: 'Call reset before step',
    });
    expect(session.handle({ type: 'spaces' })).toEqual({ type: 'error', message: 'Call reset before spaces' });
  });

  it('malformed actions come back as errors', () => {
    session.handle({ type: 'reset', config: { seed: 1 } });
    expect(session.handle({ type: 'step', action: [0] })).toMatchObject({ type: 'error' });
  });

  it('stepping a finished episode reports the usage error', () => {
    session.handle({ type: 'reset', config: { seed: 1, maxSteps: 1 } });
    session.handle({ type: 'step', action: [0, 0] });
    expect(session.handle({ type: 'step', action: [0, 0] })).toEqual({
      type: 'error',
      message: 'step() called after the episode ended; call reset()',
    });
  });

  it('unknown environments and message types are errors', () => {
    expect(session.handle({ type: 'reset', envId: 'nope' })).toMatchObject({ type: 'error' });
    expect(session.handle({ type: 'jump' })).toEqual({ type: 'error', message: 'Unknown message type: jump' });
    expect(session.handle('reset')).toEqual({ type: 'error', message: 'message must be a JSON object' });
  });

  it('close drops the environment', () => {
    session.handle({ type: 'reset', config: { seed: 1 } });
    expect(session.handle({ type: 'close' })).toEqual({ type: 'close_result' });
    expect(session.handle({ type: 'spaces' })).toEqual({ type: 'error', message: 'Call reset before spaces' });
  });
});

describe('parseOverrides', () => {
  it('keeps the known numeric settings and the seed', () => {
    expect(parseOverrides({ maxSteps: 50, seed: 'abc', extra: true })).toEqual({ maxSteps: 50, seed: 'abc' });
  });

  it('no config means no overrides', () => {
    expect(parseOverrides(undefined)).toEqual({});
  });

  it('rejects wrongly typed values', () => {
    expect(() => parseOverrides({ maxSteps: '50' })).toThrow('config.maxSteps must be a number');
    expect(() => parseOverrides({ seed: [1] })).toThrow('config.seed must be a string, number or null');
    expect(() => parseOverrides(7)).toThrow('config must be an object');
  });
});
