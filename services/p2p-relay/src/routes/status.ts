/**
 * Presence routes.
 *
 * GET  /api/status/online/all    Every connected address
 * POST /api/status/batch         Presence for several addresses
 * GET  /api/status/:address      Presence for one address
 */

import { Router } from 'express';
import { isValidAddress, normalizeAddress } from '../address.js';
import { readBody, requireAddressParam } from '../middleware.js';
import type { RelayManager } from '../relay/relay-manager.js';

export function createStatusRouter(relay: RelayManager, clock: () => number = Date.now): Router {
  const router = Router();

  router.get('/online/all', (_req, res) => {
    const users = relay.getOnlineAddresses();
    res.json({ count: users.length, users, timestamp: clock() });
  });

  router.post('/batch', (req, res) => {
    const { addresses } = readBody(req);

    if (!Array.isArray(addresses) || addresses.length === 0) {
      res.status(400).json({ error: 'addresses must be a non-empty array' });
      return;
    }

    const statuses: Record<string, boolean> = {};
    for (const address of addresses) {
      if (!isValidAddress(address)) {
        res.status(400).json({ error: `Invalid address format: ${String(address)}` });
        return;
      }
      statuses[normalizeAddress(address)] = relay.isOnline(address);
    }

    res.json({ timestamp: clock(), statuses });
  });

  router.get('/:address', requireAddressParam, (req, res) => {
    const address = normalizeAddress(req.params.address);
    res.json({ address, online: relay.isOnline(address), timestamp: clock() });
  });

  return router;
}
