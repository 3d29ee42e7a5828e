/**
 * Public-key directory routes.
 *
 * POST   /api/public-keys              Store/update a key
 * POST   /api/public-keys/batch        Look up several keys
 * GET    /api/public-keys/stats/all    Directory statistics
 * HEAD   /api/public-keys/:address     Key exists?
 * GET    /api/public-keys/:address     Fetch a key
 * DELETE /api/public-keys/:address     Remove a key
 */

import { Router } from 'express';
import { isValidAddress } from '../address.js';
import { ValidationError } from '../errors.js';
import { readBody, requireAddressParam } from '../middleware.js';
import type { PublicKeyDirectory } from '../stores/public-key-directory.js';

export function createPublicKeysRouter(directory: PublicKeyDirectory): Router {
  const router = Router();

  router.post('/', (req, res) => {
    const { address, publicKey } = readBody(req);

    if (!isValidAddress(address)) throw ValidationError.invalidAddress();

    // Rejects empty or non-string keys with a ValidationError (400).
    const record = directory.store(address, publicKey);
    res.json({ success: true, address: record.address, updatedAt: record.updatedAt });
  });

  router.post('/batch', (req, res) => {
    const { addresses } = readBody(req);

    if (!Array.isArray(addresses) || addresses.length === 0) {
      res.status(400).json({ error: 'addresses must be a non-empty array' });
      return;
    }

    const valid: string[] = [];
    for (const address of addresses) {
      if (!isValidAddress(address)) {
        res.status(400).json({ error: `Invalid address format: ${String(address)}` });
        return;
      }
      valid.push(address);
    }

    const keys = directory.getMultiple(valid);
    res.json({ count: Object.keys(keys).length, keys });
  });

  router.get('/stats/all', (_req, res) => {
    res.json(directory.getStats());
  });

  // Registered before GET, which would otherwise answer HEAD as well.
  router.head('/:address', requireAddressParam, (req, res) => {
    res.status(directory.exists(req.params.address) ? 200 : 404).end();
  });

  router.get('/:address', requireAddressParam, (req, res) => {
    const record = directory.get(req.params.address);
    if (!record) {
      res.status(404).json({ error: 'Public key not found for this address' });
      return;
    }
    res.json(record);
  });

  router.delete('/:address', requireAddressParam, (req, res) => {
    const deleted = directory.delete(req.params.address);
    res.json({ success: deleted, message: deleted ? 'Public key deleted' : 'Public key not found' });
  });

  return router;
}
