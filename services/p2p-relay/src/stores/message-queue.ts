/**
 * Offline message queue: holds messages for addresses that are not
 * connected, in memory, one bounded FIFO per recipient.
 *
 * Full queues drop their oldest entry to make room (newest always wins).
 * A periodic sweep removes entries older than the retention window.
 */

import { randomUUID } from 'node:crypto';
import { normalizeAddress } from '../address.js';
import { createLogger } from '../core/logger.js';

const log = createLogger('message-queue');

const HOUR_MS = 60 * 60 * 1000;

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/** Opaque ciphertext as sent by the client: any JSON value except null and "". */
export type MessageContent = Exclude<JsonValue, null>;

/** Client-chosen message id, echoed back in acks. */
export type MessageId = string | number;

export interface QueuedMessage {
  id: string;
  from: string;
  to: string;
  content: MessageContent;
  messageId: MessageId;
  timestamp: number;
  queuedAt: number;
}

export type NewQueuedMessage = Omit<QueuedMessage, 'id' | 'to' | 'queuedAt'>;

export interface MessageQueueOptions {
  maxMessagesPerUser: number;
  retentionHours: number;
  cleanupIntervalMs: number;
  clock?: () => number;
}

export interface MessageQueueStats {
  totalUsers: number;
  totalMessages: number;
  maxMessagesPerUser: number;
  retentionHours: number;
}

export class MessageQueue {
  private readonly queues = new Map<string, QueuedMessage[]>();
  private readonly clock: () => number;
  private cleanupTimer: ReturnType<typeof setInterval> | null = null;

  constructor(private readonly options: MessageQueueOptions) {
    if (!Number.isInteger(options.maxMessagesPerUser) || options.maxMessagesPerUser < 1) {
      throw new Error(`maxMessagesPerUser must be a positive integer, got ${options.maxMessagesPerUser}`);
    }
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Append a message to the recipient's queue, evicting the oldest entry
   * when the queue is already at capacity.
   */
  enqueue(address: string, message: NewQueuedMessage): QueuedMessage {
    const to = normalizeAddress(address);
    let queue = this.queues.get(to);
    if (!queue) {
      queue = [];
      this.queues.set(to, queue);
    }

    if (queue.length >= this.options.maxMessagesPerUser) {
      const dropped = queue.shift();
      log.warn('Queue full, dropped oldest message', {
        address: to,
        droppedMessageId: dropped?.messageId,
        size: queue.length,
      });
    }

    const queued: QueuedMessage = { ...message, id: randomUUID(), to, queuedAt: this.clock() };
    queue.push(queued);

    log.debug('Message enqueued', { address: to, messageId: message.messageId, queueSize: queue.length });
    return queued;
  }

  /**
   * Take every queued message for the address, oldest first, and clear the
   * queue. Removal happens here, before the caller has delivered anything.
   */
  dequeue(address: string): QueuedMessage[] {
    const key = normalizeAddress(address);
    const queue = this.queues.get(key);
    if (!queue || queue.length === 0) return [];

    this.queues.delete(key);
    log.debug('Messages dequeued', { address: key, count: queue.length });
    return queue;
  }

  /** Oldest `limit` messages, without removing them. */
  peek(address: string, limit = 10): QueuedMessage[] {
    const queue = this.queues.get(normalizeAddress(address));
    if (!queue) return [];
    return queue.slice(0, Math.max(0, limit));
  }

  clear(address: string): boolean {
    const key = normalizeAddress(address);
    const deleted = this.queues.delete(key);
    if (deleted) log.info('Queue cleared', { address: key });
    return deleted;
  }

  getQueueSize(address: string): number {
    return this.queues.get(normalizeAddress(address))?.length ?? 0;
  }

  getTotalQueueSize(): number {
    let total = 0;
    for (const queue of this.queues.values()) total += queue.length;
    return total;
  }

  getStats(): MessageQueueStats {
    return {
      totalUsers: this.queues.size,
      totalMessages: this.getTotalQueueSize(),
      maxMessagesPerUser: this.options.maxMessagesPerUser,
      retentionHours: this.options.retentionHours,
    };
  }

  /**
   * Remove messages whose age has reached the retention window. Queues left
   * empty are dropped. Returns the number of messages removed.
   */
  cleanup(): number {
    const now = this.clock();
    const retentionMs = this.options.retentionHours * HOUR_MS;
    let removed = 0;

    for (const [address, queue] of this.queues) {
      const kept = queue.filter((msg) => now - msg.queuedAt < retentionMs);
      if (kept.length === queue.length) continue;

      removed += queue.length - kept.length;
      if (kept.length === 0) {
        this.queues.delete(address);
      } else {
        this.queues.set(address, kept);
      }
    }

    if (removed > 0) log.info('Expired messages cleaned up', { removed });
    return removed;
  }

  /**
   * Start the periodic expiry sweep.
   */
  start(): void {
    if (this.cleanupTimer) return;
    this.cleanupTimer = setInterval(() => this.cleanup(), this.options.cleanupIntervalMs);
    log.info('Message queue cleanup started', {
      interval: `${Math.round(this.options.cleanupIntervalMs / 1000)}s`,
      retention: `${this.options.retentionHours}h`,
    });
  }

  /**
   * Stop the sweep (for graceful shutdown).
   */
  stop(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = null;
    }
  }
}
