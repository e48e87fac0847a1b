/**
 * SCPI Bench Server entry point
 * Emulated lab instrument reachable over raw SCPI (TCP), HTTP and WebSocket
 */

import { loadConfigFromEnv } from './config.js';
import { startServer, type RunningServer } from './server.js';

async function start(): Promise<void> {
  const config = loadConfigFromEnv();
  if (!config.ok) {
    console.error(`[Server] Invalid configuration: ${config.error}`);
    process.exit(1);
  }

  const { value: cfg } = config;
  console.log('SCPI Bench Server starting...');
  console.log(`  Instrument: ${cfg.instrument}`);
  console.log(`  SCPI port: ${cfg.host}:${cfg.port}`);
  console.log(`  Max connections: ${cfg.maxConnections === 0 ? 'unlimited' : cfg.maxConnections}`);
  console.log(`  Error queue size: ${cfg.errorQueueSize === 0 ? 'unbounded' : cfg.errorQueueSize}`);
  console.log(`  HTTP port: ${cfg.httpEnabled ? cfg.httpPort : 'disabled'}`);
  console.log('');

  const result = await startServer(cfg);
  if (!result.ok) {
    console.error('[Server] Failed to start:', result.error);
    process.exit(1);
  }

  const running: RunningServer = result.value;
  console.log(`Serving "${running.session.instrument.identity}"`);

  // Graceful shutdown
  const shutdown = () => {
    console.log('Shutting down...');
    running.close().then(
      () => {
        console.log('Server closed');
        process.exit(0);
      },
      err => {
        console.error('[Server] Shutdown failed:', err);
        process.exit(1);
      }
    );
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

start().catch(err => {
  console.error('[Server] Startup failed:', err);
  process.exit(1);
});
