import { startBridgeServer, DEFAULT_BRIDGE_PORT } from './bridge-server';

const raw = process.env.BRIDGE_PORT;
const port = raw === undefined ? DEFAULT_BRIDGE_PORT : Number(raw);
if (!Number.isInteger(port) || port < 1 || port > 65535) {
  console.error(`[bridge] Invalid BRIDGE_PORT: ${raw}. Must be an integer 1-65535.`);
  process.exit(1);
}
startBridgeServer(port);
