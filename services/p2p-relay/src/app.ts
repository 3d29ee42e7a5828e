/**
 * Express app for the relay's REST boundary.
 *
 * - Offline queue inspection and backfill (/api/messages)
 * - Public-key directory for E2E key exchange (/api/public-keys)
 * - Presence lookups (/api/status)
 * - Health check (/health)
 *
 * All state lives in the injected components; the app holds none.
 */

import cors from 'cors';
import express, { type Express } from 'express';
import helmet from 'helmet';
import { errorHandler, notFound, requestLogger } from './middleware.js';
import type { RelayManager } from './relay/relay-manager.js';
import { createMessagesRouter } from './routes/messages.js';
import { createPublicKeysRouter } from './routes/public-keys.js';
import { createStatusRouter } from './routes/status.js';
import type { MessageQueue } from './stores/message-queue.js';
import type { PublicKeyDirectory } from './stores/public-key-directory.js';

export const SERVICE_NAME = 'p2p-relay';
export const SERVICE_VERSION = '1.0.0';

export interface AppDeps {
  queue: MessageQueue;
  directory: PublicKeyDirectory;
  relay: RelayManager;
  bodyLimit: string;
  allowedOrigins: string[];
  startedAt: number;
  clock?: () => number;
}

export function createApp(deps: AppDeps): Express {
  const { queue, directory, relay } = deps;
  const clock = deps.clock ?? Date.now;
  const app = express();

  app.use(helmet());
  app.use(cors({
    origin: deps.allowedOrigins.includes('*') ? '*' : deps.allowedOrigins,
    credentials: true,
  }));
  app.use(express.json({ limit: deps.bodyLimit }));

  // Trust proxy for deployments behind a load balancer
  app.set('trust proxy', true);

  app.use(requestLogger);

  app.get('/health', (_req, res) => {
    const now = clock();
    res.json({
      status: 'ok',
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      timestamp: new Date(now).toISOString(),
      uptime: Math.floor((now - deps.startedAt) / 1000),
      connections: relay.getConnectionCount(),
      queuedMessages: queue.getTotalQueueSize(),
    });
  });

  app.use('/api/messages', createMessagesRouter(queue));
  app.use('/api/public-keys', createPublicKeysRouter(directory));
  app.use('/api/status', createStatusRouter(relay, clock));

  app.use(notFound);
  app.use(errorHandler);

  return app;
}
