import { loadConfig, ConfigError } from './config.js';
import type { BridgeConfig } from './config.js';
import { TelemetryBridge } from './service.js';
import { describeEndpoint } from './link/transport.js';
import { STREAM_PATH } from './api/stream.js';

function fatal(message: string, err: unknown): never {
  console.error(`❌ ${message}: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
}

let config: BridgeConfig;
try {
  config = loadConfig();
} catch (err) {
  fatal(err instanceof ConfigError ? 'Configuration rejected' : 'Failed to load configuration', err);
}

let bridge: TelemetryBridge;
try {
  bridge = new TelemetryBridge(config);
} catch (err) {
  fatal('Failed to initialise service', err);
}

let shuttingDown = false;
function shutdown(signal: string) {
  if (shuttingDown) return;
  shuttingDown = true;
  console.log(`\n🛑 ${signal} received, shutting down...`);
  bridge.stop()
    .then(() => {
      console.log('🛑 Shutdown complete');
      process.exit(0);
    })
    .catch((err) => fatal('Shutdown failed', err));
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

bridge.start()
  .then((addr) => {
    const http = bridge.secure ? 'https' : 'http';
    const ws = bridge.secure ? 'wss' : 'ws';
    console.log(`
  🛰️ ╔═══════════════════════════════════════╗
  🛰️ ║       T E L E M E T R Y   B R I D G E ║
  🛰️ ╠═══════════════════════════════════════╣
  🛰️ ║  Pull:  ${http}://${addr.address}:${addr.port}/api/telemetry
  🛰️ ║  Push:  ${ws}://${addr.address}:${addr.port}${STREAM_PATH}
  🛰️ ║  Link:  ${describeEndpoint(config.link)}
  🛰️ ╚═══════════════════════════════════════╝
  `);
  })
  .catch((err) => fatal(`Cannot listen on ${config.host}:${config.port}`, err));
