/**
 * Offline queue routes.
 *
 * GET    /api/messages/stats/all              Queue statistics
 * GET    /api/messages/:address               Drain queue (?limit=N peeks instead)
 * GET    /api/messages/:address/queue-size    Queue length
 * DELETE /api/messages/:address               Clear queue
 */

import { Router } from 'express';
import { normalizeAddress } from '../address.js';
import { requireAddressParam } from '../middleware.js';
import type { MessageQueue, QueuedMessage } from '../stores/message-queue.js';

function parseLimit(value: unknown): number | null {
  if (typeof value !== 'string' || !/^\d+$/.test(value)) return null;
  return parseInt(value, 10);
}

export function createMessagesRouter(queue: MessageQueue): Router {
  const router = Router();

  router.get('/stats/all', (_req, res) => {
    res.json(queue.getStats());
  });

  /**
   * Backfill for clients that missed live delivery. Draining is destructive;
   * pass ?limit to inspect without removing.
   */
  router.get('/:address', requireAddressParam, (req, res) => {
    const address = normalizeAddress(req.params.address);

    let messages: QueuedMessage[];
    if (req.query.limit !== undefined) {
      const limit = parseLimit(req.query.limit);
      if (limit === null) {
        res.status(400).json({ error: 'limit must be a non-negative integer' });
        return;
      }
      messages = queue.peek(address, limit);
    } else {
      messages = queue.dequeue(address);
    }

    res.json({ address, count: messages.length, messages });
  });

  router.get('/:address/queue-size', requireAddressParam, (req, res) => {
    const address = normalizeAddress(req.params.address);
    res.json({ address, queueSize: queue.getQueueSize(address) });
  });

  router.delete('/:address', requireAddressParam, (req, res) => {
    const address = normalizeAddress(req.params.address);
    const cleared = queue.clear(address);
    res.json({ address, cleared, message: cleared ? 'Queue cleared' : 'No messages to clear' });
  });

  return router;
}
