/**
 * RelayServer: composes the stores, registry, relay manager, Express app
 * and WebSocket server, and owns their lifecycle.
 */

import { createServer, type Server as HttpServer } from 'node:http';
import type { Express } from 'express';
import { WebSocketServer, type RawData } from 'ws';
import { createApp } from './app.js';
import { parseInterval, type RelayConfig } from './core/config.js';
import { createLogger, errorData } from './core/logger.js';
import { ConnectionRegistry } from './relay/connection-registry.js';
import { RelayManager } from './relay/relay-manager.js';
import { MessageQueue } from './stores/message-queue.js';
import { PublicKeyDirectory } from './stores/public-key-directory.js';

const log = createLogger('server');

export interface RelayServerOptions {
  clock?: () => number;
}

function rawToString(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
}

export class RelayServer {
  readonly queue: MessageQueue;
  readonly directory: PublicKeyDirectory;
  readonly registry: ConnectionRegistry;
  readonly relay: RelayManager;
  readonly app: Express;
  readonly httpServer: HttpServer;
  readonly wss: WebSocketServer;

  private listening = false;

  constructor(private readonly config: RelayConfig, options: RelayServerOptions = {}) {
    const clock = options.clock ?? Date.now;

    this.queue = new MessageQueue({
      maxMessagesPerUser: config.queue.max_messages_per_user,
      retentionHours: config.queue.retention_hours,
      cleanupIntervalMs: parseInterval(config.queue.cleanup_interval),
      clock,
    });
    this.directory = new PublicKeyDirectory(clock);
    this.registry = new ConnectionRegistry(clock);
    this.relay = new RelayManager({
      registry: this.registry,
      queue: this.queue,
      heartbeatIntervalMs: parseInterval(config.heartbeat.interval),
      heartbeatTimeoutMs: parseInterval(config.heartbeat.timeout),
      clock,
    });

    this.app = createApp({
      queue: this.queue,
      directory: this.directory,
      relay: this.relay,
      bodyLimit: config.server.body_limit,
      allowedOrigins: config.server.allowed_origins,
      startedAt: clock(),
      clock,
    });

    this.httpServer = createServer(this.app);
    this.wss = new WebSocketServer({ server: this.httpServer });
    // ws re-emits the HTTP server's errors (e.g. EADDRINUSE); start() rejects on them.
    this.wss.on('error', (err) => {
      log.error('WebSocket server error', errorData(err));
    });
    this.wss.on('connection', (ws, req) => {
      const session = this.relay.openSession(ws, req.socket.remoteAddress);
      ws.on('message', (data) => session.receive(rawToString(data)));
      ws.on('close', () => session.closed());
      ws.on('error', (err) => {
        log.error('WebSocket error', { error: err.message, address: session.address });
      });
    });
  }

  /**
   * Start the sweeps and listen. Resolves with the bound port
   * (useful when config asks for port 0).
   */
  async start(port: number = this.config.server.port, host: string = this.config.server.host): Promise<number> {
    await new Promise<void>((resolve, reject) => {
      const onError = (err: Error) => reject(err);
      this.httpServer.once('error', onError);
      this.httpServer.listen(port, host, () => {
        this.httpServer.off('error', onError);
        resolve();
      });
    });

    this.listening = true;
    this.queue.start();
    this.relay.start();
    return this.port ?? port;
  }

  get port(): number | undefined {
    const addr = this.httpServer.address();
    if (addr && typeof addr === 'object') return addr.port;
    return undefined;
  }

  /**
   * Stop the sweeps, close every socket and the HTTP server.
   */
  async stop(): Promise<void> {
    this.relay.stop();
    this.queue.stop();
    this.relay.closeAll();

    // Unauthenticated sockets are not in the registry.
    for (const client of this.wss.clients) client.terminate();
    await new Promise<void>((resolve) => this.wss.close(() => resolve()));

    if (!this.listening) return;
    this.listening = false;
    await new Promise<void>((resolve, reject) => {
      this.httpServer.close((err) => (err ? reject(err) : resolve()));
    });
  }
}
