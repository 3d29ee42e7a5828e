/**
 * Tests for: REST routes and health endpoint
 */

import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { DEFAULTS, type RelayConfig } from '../services/p2p-relay/src/core/config.js';
import { RelayServer } from '../services/p2p-relay/src/server.js';
import { ALICE, BOB, CAROL, MIXED_CASE, MIXED_CASE_LOWER } from './helpers/addresses.js';
import { FakeClock, FakeSocket } from './helpers/fake-socket.js';

const config: RelayConfig = {
  ...DEFAULTS,
  logging: { ...DEFAULTS.logging, to_file: false },
};

describe('REST API', () => {
  let clock: FakeClock;
  let server: RelayServer;
  let baseUrl: string;

  beforeEach(async () => {
    clock = new FakeClock();
    server = new RelayServer(config, { clock: clock.now });
    const port = await server.start(0, '127.0.0.1');
    baseUrl = `http://127.0.0.1:${port}`;
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await server.stop();
  });

  async function request(method: string, path: string, body?: unknown): Promise<{ status: number; json: unknown }> {
    const res = await fetch(`${baseUrl}${path}`, {
      method,
      headers: body === undefined ? undefined : { 'Content-Type': 'application/json' },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
    const text = await res.text();
    return { status: res.status, json: text ? JSON.parse(text) : null };
  }

  function enqueue(to: string, messageId: string): void {
    server.queue.enqueue(to, { from: ALICE, content: `ciphertext-${messageId}`, messageId, timestamp: 1000 });
  }

  function authenticate(address: string): void {
    server.relay.openSession(new FakeSocket()).receive(JSON.stringify({ type: 'auth', address }));
  }

  describe('GET /health', () => {
    it('should report service status, uptime and counters', async () => {
      enqueue(BOB, 'm1');
      authenticate(ALICE);
      clock.advance(5500);

      const { status, json } = await request('GET', '/health');

      expect(status).toBe(200);
      expect(json).toEqual({
        status: 'ok',
        service: 'p2p-relay',
        version: '1.0.0',
        timestamp: new Date(clock.current).toISOString(),
        uptime: 5,
        connections: 1,
        queuedMessages: 1,
      });
    });
  });

  describe('security headers', () => {
    it('should allow any origin by default and set helmet headers', async () => {
      const res = await fetch(`${baseUrl}/health`, { headers: { Origin: 'https://chat.example' } });

      expect(res.headers.get('access-control-allow-origin')).toBe('*');
      expect(res.headers.get('x-content-type-options')).toBe('nosniff');
      expect(res.headers.get('x-powered-by')).toBeNull();
    });
  });

  describe('/api/messages', () => {
    it('should drain the queue on GET', async () => {
      enqueue(BOB, 'm1');
      enqueue(BOB, 'm2');

      const first = await request('GET', `/api/messages/${BOB}`);
      const second = await request('GET', `/api/messages/${BOB}`);

      expect(first.status).toBe(200);
      expect(first.json).toMatchObject({
        address: BOB,
        count: 2,
        messages: [
          { from: ALICE, to: BOB, messageId: 'm1', content: 'ciphertext-m1', timestamp: 1000, queuedAt: clock.current },
          { messageId: 'm2' },
        ],
      });
      expect(second.json).toEqual({ address: BOB, count: 0, messages: [] });
    });

    it('should peek without removing when a limit is given', async () => {
      enqueue(BOB, 'm1');
      enqueue(BOB, 'm2');

      const { json } = await request('GET', `/api/messages/${BOB}?limit=1`);

      expect(json).toMatchObject({ address: BOB, count: 1, messages: [{ messageId: 'm1' }] });
      expect(server.queue.getQueueSize(BOB)).toBe(2);
    });

    it('should return nothing and keep the queue for limit=0', async () => {
      enqueue(BOB, 'm1');

      const { status, json } = await request('GET', `/api/messages/${BOB}?limit=0`);

      expect(status).toBe(200);
      expect(json).toEqual({ address: BOB, count: 0, messages: [] });
      expect(server.queue.getQueueSize(BOB)).toBe(1);
    });

    it.each([['-1'], ['abc'], ['1.5']])('should reject limit=%s', async (limit) => {
      const { status, json } = await request('GET', `/api/messages/${BOB}?limit=${limit}`);

      expect(status).toBe(400);
      expect(json).toEqual({ error: 'limit must be a non-negative integer' });
    });

    it('should normalize the address in the path', async () => {
      enqueue(MIXED_CASE_LOWER, 'm1');

      const { json } = await request('GET', `/api/messages/${MIXED_CASE}/queue-size`);

      expect(json).toEqual({ address: MIXED_CASE_LOWER, queueSize: 1 });
    });

    it('should reject a malformed address', async () => {
      const { status, json } = await request('GET', '/api/messages/0x1234');

      expect(status).toBe(400);
      expect(json).toEqual({ error: 'Invalid address format' });
    });

    it('should clear a queue and report when there was nothing to clear', async () => {
      enqueue(BOB, 'm1');

      const cleared = await request('DELETE', `/api/messages/${BOB}`);
      const empty = await request('DELETE', `/api/messages/${BOB}`);

      expect(cleared.json).toEqual({ address: BOB, cleared: true, message: 'Queue cleared' });
      expect(empty.json).toEqual({ address: BOB, cleared: false, message: 'No messages to clear' });
    });

    it('should report queue statistics', async () => {
      enqueue(BOB, 'm1');
      enqueue(CAROL, 'm2');

      const { json } = await request('GET', '/api/messages/stats/all');

      expect(json).toEqual({
        totalUsers: 2,
        totalMessages: 2,
        maxMessagesPerUser: DEFAULTS.queue.max_messages_per_user,
        retentionHours: DEFAULTS.queue.retention_hours,
      });
    });
  });

  describe('/api/public-keys', () => {
    it('should store and fetch a key by any address case', async () => {
      const stored = await request('POST', '/api/public-keys', { address: MIXED_CASE, publicKey: 'pk-test' });
      const fetched = await request('GET', `/api/public-keys/${MIXED_CASE}`);

      expect(stored).toEqual({
        status: 200,
        json: { success: true, address: MIXED_CASE_LOWER, updatedAt: clock.current },
      });
      expect(fetched.json).toEqual({
        address: MIXED_CASE_LOWER,
        publicKey: 'pk-test',
        createdAt: clock.current,
        updatedAt: clock.current,
      });
    });

    it('should reject an invalid address on store', async () => {
      const { status, json } = await request('POST', '/api/public-keys', { address: 'alice', publicKey: 'pk-test' });

      expect(status).toBe(400);
      expect(json).toEqual({ error: 'Invalid address format' });
    });

    it.each([[''], [null], [42]])('should reject public key %p', async (publicKey) => {
      const { status, json } = await request('POST', '/api/public-keys', { address: ALICE, publicKey });

      expect(status).toBe(400);
      expect(json).toEqual({ error: 'Invalid public key' });
      expect(server.directory.exists(ALICE)).toBe(false);
    });

    it('should 404 an unknown address', async () => {
      const { status, json } = await request('GET', `/api/public-keys/${BOB}`);

      expect(status).toBe(404);
      expect(json).toEqual({ error: 'Public key not found for this address' });
    });

    it('should answer HEAD by existence', async () => {
      server.directory.store(ALICE, 'pk-alice');

      const found = await fetch(`${baseUrl}/api/public-keys/${ALICE}`, { method: 'HEAD' });
      const missing = await fetch(`${baseUrl}/api/public-keys/${BOB}`, { method: 'HEAD' });

      expect(found.status).toBe(200);
      expect(missing.status).toBe(404);
    });

    it('should look up several keys at once', async () => {
      server.directory.store(ALICE, 'pk-alice');

      const { json } = await request('POST', '/api/public-keys/batch', { addresses: [ALICE, BOB] });

      expect(json).toEqual({
        count: 1,
        keys: {
          [ALICE]: { address: ALICE, publicKey: 'pk-alice', createdAt: clock.current, updatedAt: clock.current },
        },
      });
    });

    it('should reject an empty or invalid batch', async () => {
      const empty = await request('POST', '/api/public-keys/batch', { addresses: [] });
      const invalid = await request('POST', '/api/public-keys/batch', { addresses: [ALICE, 'bob'] });

      expect(empty).toEqual({ status: 400, json: { error: 'addresses must be a non-empty array' } });
      expect(invalid).toEqual({ status: 400, json: { error: 'Invalid address format: bob' } });
    });

    it('should delete a key', async () => {
      server.directory.store(ALICE, 'pk-alice');

      const deleted = await request('DELETE', `/api/public-keys/${ALICE}`);
      const missing = await request('DELETE', `/api/public-keys/${ALICE}`);

      expect(deleted.json).toEqual({ success: true, message: 'Public key deleted' });
      expect(missing.json).toEqual({ success: false, message: 'Public key not found' });
    });

    it('should report directory statistics', async () => {
      server.directory.store(ALICE, 'pk-alice');

      const { json } = await request('GET', '/api/public-keys/stats/all');

      expect(json).toEqual({ totalKeys: 1, addresses: [ALICE] });
    });
  });

  describe('/api/status', () => {
    it('should report presence for one address', async () => {
      authenticate(ALICE);

      const online = await request('GET', `/api/status/${ALICE}`);
      const offline = await request('GET', `/api/status/${BOB}`);

      expect(online.json).toEqual({ address: ALICE, online: true, timestamp: clock.current });
      expect(offline.json).toEqual({ address: BOB, online: false, timestamp: clock.current });
    });

    it('should report presence for several addresses', async () => {
      authenticate(ALICE);

      const { json } = await request('POST', '/api/status/batch', { addresses: [ALICE, MIXED_CASE] });

      expect(json).toEqual({
        timestamp: clock.current,
        statuses: { [ALICE]: true, [MIXED_CASE_LOWER]: false },
      });
    });

    it('should list every online address', async () => {
      authenticate(ALICE);
      authenticate(BOB);

      const { json } = await request('GET', '/api/status/online/all');

      expect(json).toEqual({ count: 2, users: [ALICE, BOB], timestamp: clock.current });
    });
  });

  describe('errors', () => {
    it('should reject a malformed JSON body', async () => {
      const res = await fetch(`${baseUrl}/api/public-keys`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: '{"address":',
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: 'Malformed JSON body' });
    });

    it('should 404 unknown routes', async () => {
      const { status, json } = await request('GET', '/api/nothing-here');

      expect(status).toBe(404);
      expect(json).toEqual({ error: 'Not found' });
    });

    it('should hide unexpected errors behind a generic 500', async () => {
      jest.spyOn(server.queue, 'getStats').mockImplementation(() => {
        throw new Error('queue exploded');
      });
      jest.spyOn(console, 'error').mockImplementation(() => undefined);

      const { status, json } = await request('GET', '/api/messages/stats/all');

      expect(status).toBe(500);
      expect(json).toEqual({ error: 'Internal server error' });
    });
  });
});

describe('CORS with an origin list', () => {
  let server: RelayServer;
  let baseUrl: string;

  beforeEach(async () => {
    server = new RelayServer({
      ...config,
      server: { ...config.server, allowed_origins: ['https://chat.example'] },
    });
    const port = await server.start(0, '127.0.0.1');
    baseUrl = `http://127.0.0.1:${port}`;
  });

  afterEach(async () => {
    await server.stop();
  });

  it('should echo a listed origin with credentials', async () => {
    const res = await fetch(`${baseUrl}/health`, { headers: { Origin: 'https://chat.example' } });

    expect(res.headers.get('access-control-allow-origin')).toBe('https://chat.example');
    expect(res.headers.get('access-control-allow-credentials')).toBe('true');
  });

  it('should not allow an unlisted origin', async () => {
    const res = await fetch(`${baseUrl}/health`, { headers: { Origin: 'https://elsewhere.example' } });

    expect(res.status).toBe(200);
    expect(res.headers.get('access-control-allow-origin')).toBeNull();
  });
});
