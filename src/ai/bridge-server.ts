/**
 * WebSocket Bridge Server — RPC interface for external RL trainers.
 *
 * Accepts JSON messages over WebSocket: reset, step, spaces, close.
 * Each connection gets its own BridgeSession (and so its own StratEnv).
 * Binds to localhost only (no LAN exposure).
 */

import { WebSocketServer, WebSocket } from 'ws';
import type { StratEnv } from './strat-env';
import type { EnvConfig } from './env-config';
import { validateAction } from './actuator';
import { createEnv } from '../envs/registry';

const DEFAULT_ENV_ID = 'vssStrat-v0';
export const DEFAULT_BRIDGE_PORT = 9876;

type Overrides = Omit<Partial<EnvConfig>, 'mode'>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Pick the settings a client may override; anything else is ignored. */
export function parseOverrides(raw: unknown): Overrides {
  if (raw === undefined) return {};
  if (!isRecord(raw)) {
    throw new Error('config must be an object');
  }
  const overrides: Overrides = {};
  for (const key of ['nRobotsBlue', 'nRobotsYellow', 'maxSteps', 'placementMaxAttempts'] as const) {
    const value = raw[key];
    if (value === undefined) continue;
    if (typeof value !== 'number') {
      throw new Error(`config.${key} must be a number`);
    }
    overrides[key] = value;
  }
  const seed = raw.seed;
  if (seed !== undefined) {
    if (typeof seed !== 'string' && typeof seed !== 'number' && seed !== null) {
      throw new Error('config.seed must be a string, number or null');
    }
    overrides.seed = seed;
  }
  return overrides;
}

/** Socket-free message handler for one client. */
export class BridgeSession {
  private env: StratEnv | null = null;

  handle(msg: unknown): object {
    if (!isRecord(msg)) {
      return { type: 'error', message: 'message must be a JSON object' };
    }
    try {
      return this.dispatch(msg);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return { type: 'error', message };
    }
  }

  private dispatch(msg: Record<string, unknown>): object {
    switch (msg.type) {
      case 'reset': {
        const envId = typeof msg.envId === 'string' ? msg.envId : DEFAULT_ENV_ID;
        this.env = createEnv(envId, parseOverrides(msg.config));
        const result = this.env.reset();
        return { type: 'reset_result', observation: result.observation, info: result.info };
      }
      case 'step': {
        if (!this.env) {
          return { type: 'error', message: 'Call reset before step' };
        }
        const result = this.env.step(validateAction(msg.action));
        return {
          type: 'step_result',
          observation: result.observation,
          reward: result.reward,
          done: result.done,
          truncated: result.truncated,
          info: result.info,
        };
      }
      case 'spaces': {
        if (!this.env) {
          return { type: 'error', message: 'Call reset before spaces' };
        }
        return { type: 'spaces_result', spaces: this.env.spaces, mode: this.env.config.mode };
      }
      case 'close': {
        this.env = null;
        return { type: 'close_result' };
      }
      default:
        return { type: 'error', message: `Unknown message type: ${String(msg.type)}` };
    }
  }

  close(): void {
    this.env = null;
  }
}

export function startBridgeServer(port = DEFAULT_BRIDGE_PORT) {
  const wss = new WebSocketServer({
    port,
    host: '127.0.0.1',
    perMessageDeflate: false,
    maxPayload: 65_536,
    clientTracking: true,
  });

  wss.on('connection', (ws, req) => {
    req.socket.setNoDelay(true);
    const session = new BridgeSession();

    ws.on('message', (data) => {
      let response: object;
      try {
        response = session.handle(JSON.parse(data.toString()));
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        response = { type: 'error', message };
      }
      if (isRecord(response) && response.type === 'error') {
        console.error('[bridge] error:', response.message);
      }
      ws.send(JSON.stringify(response));
    });

    ws.on('close', () => session.close());
    ws.on('error', (err) => {
      console.error('[bridge] connection error:', err.message);
      session.close();
    });
  });

  function shutdown() {
    console.log('[bridge] shutting down...');
    wss.clients.forEach((client) => {
      if (client.readyState === WebSocket.OPEN) {
        client.close(1001, 'Server shutting down');
      }
    });
    wss.close(() => {
      console.log('[bridge] closed');
      process.exit(0);
    });
    setTimeout(() => process.exit(1), 5000).unref();
  }

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  wss.on('listening', () => {
    console.log(`[bridge] listening on ws://127.0.0.1:${port}`);
  });

  return { wss, shutdown };
}
