/**
 * Public-key directory: address → public key, for E2E key discovery.
 * One record per address; the key itself is an opaque string.
 */

import { normalizeAddress } from '../address.js';
import { createLogger } from '../core/logger.js';
import { ValidationError } from '../errors.js';

const log = createLogger('public-keys');

export interface PublicKeyRecord {
  address: string;
  publicKey: string;
  createdAt: number;
  updatedAt: number;
}

export interface PublicKeyStats {
  totalKeys: number;
  addresses: string[];
}

export class PublicKeyDirectory {
  private readonly keys = new Map<string, PublicKeyRecord>();

  constructor(private readonly clock: () => number = Date.now) {}

  /**
   * Store or replace the key for an address. createdAt survives updates.
   */
  store(address: string, publicKey: unknown): PublicKeyRecord {
    if (typeof publicKey !== 'string' || publicKey.length === 0) {
      throw ValidationError.invalidPublicKey();
    }

    const key = normalizeAddress(address);
    const now = this.clock();
    const record: PublicKeyRecord = {
      address: key,
      publicKey,
      createdAt: this.keys.get(key)?.createdAt ?? now,
      updatedAt: now,
    };
    this.keys.set(key, record);

    log.debug('Public key stored', { address: key, keyLength: publicKey.length });
    return { ...record };
  }

  /** A copy of the stored record, or null. */
  get(address: string): PublicKeyRecord | null {
    const record = this.keys.get(normalizeAddress(address));
    return record ? { ...record } : null;
  }

  /**
   * Batch lookup. Addresses without a key are left out of the result.
   */
  getMultiple(addresses: readonly string[]): Record<string, PublicKeyRecord> {
    const results: Record<string, PublicKeyRecord> = {};
    for (const address of addresses) {
      const record = this.get(address);
      if (record) results[record.address] = record;
    }
    return results;
  }

  exists(address: string): boolean {
    return this.keys.has(normalizeAddress(address));
  }

  delete(address: string): boolean {
    const key = normalizeAddress(address);
    const deleted = this.keys.delete(key);
    if (deleted) log.info('Public key deleted', { address: key });
    return deleted;
  }

  getCount(): number {
    return this.keys.size;
  }

  getStats(): PublicKeyStats {
    return { totalKeys: this.keys.size, addresses: Array.from(this.keys.keys()) };
  }
}
