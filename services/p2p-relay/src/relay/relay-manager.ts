/**
 * Relay Manager: routes frames between authenticated connections.
 *
 * Messages for a connected recipient are pushed immediately; otherwise they
 * go to the recipient's offline queue, which is drained on their next auth.
 * Typing indicators and read receipts are presence-only and never queued.
 *
 * Registry and queue calls are synchronous, so each routing decision runs
 * to completion inside one event-loop turn.
 */

import { createLogger } from '../core/logger.js';
import type { MessageQueue } from '../stores/message-queue.js';
import type { ConnectionRegistry } from './connection-registry.js';
import type { ChatFrame, ReadReceiptFrame, RelaySocket, TypingFrame } from './protocol.js';
import { ConnectionSession, sendFrame, type SessionHost } from './session.js';

const log = createLogger('relay');

export interface RelayManagerOptions {
  registry: ConnectionRegistry;
  queue: MessageQueue;
  heartbeatIntervalMs: number;
  heartbeatTimeoutMs: number;
  clock?: () => number;
}

export class RelayManager implements SessionHost {
  private readonly registry: ConnectionRegistry;
  private readonly queue: MessageQueue;
  private readonly clock: () => number;
  private heartbeatTimer: ReturnType<typeof setInterval> | null = null;

  constructor(private readonly options: RelayManagerOptions) {
    this.registry = options.registry;
    this.queue = options.queue;
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Start tracking a freshly opened socket. The caller feeds the returned
   * session with receive() and closed().
   */
  openSession(socket: RelaySocket, remoteAddress?: string): ConnectionSession {
    log.info('New WebSocket connection', { ip: remoteAddress });
    return new ConnectionSession(socket, this);
  }

  now(): number {
    return this.clock();
  }

  // ── SessionHost ────────────────────────────────────────────

  authenticate(session: ConnectionSession, address: string): void {
    this.registry.register(address, session.socket);
    log.info('User authenticated', { address });

    session.send({ type: 'auth_success', address, timestamp: this.clock() });
    this.deliverQueued(session, address);
  }

  touch(session: ConnectionSession, address: string): void {
    this.registry.touch(address, session.socket);
  }

  relayMessage(session: ConnectionSession, from: string, frame: ChatFrame): void {
    const { to, content, messageId } = frame;
    const timestamp = frame.timestamp ?? this.clock();

    // Looked up right before the send: the recipient may have gone away.
    const recipient = this.registry.getOpenSocket(to);
    if (recipient && sendFrame(recipient, { type: 'message', from, content, messageId, timestamp })) {
      session.send({ type: 'delivered', messageId, to, timestamp: this.clock() });
      log.debug('Message delivered', { from, to, messageId });
      return;
    }

    this.queue.enqueue(to, { from, content, messageId, timestamp });
    session.send({ type: 'queued', messageId, to, timestamp: this.clock() });
    log.debug('Message queued', { from, to, messageId });
  }

  forwardTyping(from: string, frame: TypingFrame): void {
    const { to, isTyping } = frame;
    if (!to) return;
    if (isTyping === undefined) {
      log.debug('Dropping typing frame without a boolean isTyping', { from, to });
      return;
    }
    const recipient = this.registry.getOpenSocket(to);
    if (recipient) sendFrame(recipient, { type: 'typing', from, isTyping });
  }

  forwardReadReceipt(from: string, frame: ReadReceiptFrame): void {
    const { to, messageId } = frame;
    if (!to || messageId === undefined) return;
    const recipient = this.registry.getOpenSocket(to);
    if (recipient) sendFrame(recipient, { type: 'read', from, messageId, timestamp: this.clock() });
  }

  disconnected(session: ConnectionSession, address: string): void {
    this.registry.unregister(address, session.socket);
    log.info('User disconnected', { address });
  }

  // ── Queue drain ────────────────────────────────────────────

  /**
   * Push everything queued for the address, oldest first. The queue is
   * emptied before sending, so whatever cannot be sent is lost.
   */
  private deliverQueued(session: ConnectionSession, address: string): void {
    const messages = this.queue.dequeue(address);
    if (messages.length === 0) return;

    log.info(`Delivering ${messages.length} queued messages`, { address });
    for (const [index, msg] of messages.entries()) {
      const sent = session.send({
        type: 'message',
        from: msg.from,
        content: msg.content,
        messageId: msg.messageId,
        timestamp: msg.timestamp,
        queued: true,
      });
      if (!sent) {
        log.warn('Socket closed during queued delivery, messages dropped', {
          address,
          dropped: messages.length - index,
        });
        return;
      }
    }
  }

  // ── Presence queries ───────────────────────────────────────

  isOnline(address: string): boolean {
    return this.registry.isOnline(address);
  }

  getConnectionCount(): number {
    return this.registry.count();
  }

  getOnlineAddresses(): string[] {
    return this.registry.addresses();
  }

  // ── Heartbeat ──────────────────────────────────────────────

  /**
   * Evict connections idle past the heartbeat timeout.
   */
  sweepIdleConnections(): string[] {
    return this.registry.sweepIdle(this.options.heartbeatTimeoutMs);
  }

  start(): void {
    if (this.heartbeatTimer) return;
    this.heartbeatTimer = setInterval(() => this.sweepIdleConnections(), this.options.heartbeatIntervalMs);
    log.debug('Heartbeat started', {
      interval: this.options.heartbeatIntervalMs,
      timeout: this.options.heartbeatTimeoutMs,
    });
  }

  stop(): void {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
  }

  /** Close every connection (shutdown). */
  closeAll(): void {
    this.registry.closeAll();
  }
}
