/**
 * P2P Relay: WebSocket message relay between identity addresses.
 *
 * Provides:
 * - Live delivery between authenticated WebSocket connections
 * - Bounded in-memory offline queue, drained on reconnect or via REST
 * - Public-key directory for E2E key exchange
 * - Heartbeat eviction of idle connections
 *
 * Usage: node dist/services/p2p-relay/src/index.js [projectDir]
 */

import path from 'node:path';
import { loadConfig } from './core/config.js';
import { createLogger, errorData, initLogger } from './core/logger.js';
import { RelayServer } from './server.js';

const projectDir = path.resolve(process.argv[2] ?? process.cwd());
const config = loadConfig(projectDir);
initLogger(config.logging, projectDir);

const log = createLogger('main');
const server = new RelayServer(config);

server.start()
  .then((port) => {
    log.info(`Relay listening on ${config.server.host}:${port}`, {
      maxMessagesPerUser: config.queue.max_messages_per_user,
      retentionHours: config.queue.retention_hours,
    });
  })
  .catch((err: unknown) => {
    log.error('Failed to start relay', errorData(err));
    process.exit(1);
  });

// Graceful shutdown
function shutdown(signal: string): void {
  log.info(`${signal} received, shutting down...`);
  server.stop()
    .then(() => process.exit(0))
    .catch((err: unknown) => {
      log.error('Error during shutdown', errorData(err));
      process.exit(1);
    });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
