/**
 * Tests for: Relay frame parsing and address helpers
 */

import { describe, it, expect } from '@jest/globals';
import { isValidAddress, normalizeAddress } from '../services/p2p-relay/src/address.js';
import { parseFrame, serializeFrame } from '../services/p2p-relay/src/relay/protocol.js';
import { ALICE, BOB, MIXED_CASE, MIXED_CASE_LOWER } from './helpers/addresses.js';

describe('addresses', () => {
  it('should accept 0x followed by 40 hex digits in any case', () => {
    expect(isValidAddress(ALICE)).toBe(true);
    expect(isValidAddress(MIXED_CASE)).toBe(true);
  });

  it.each([
    ['too short', '0x1234'],
    ['missing prefix', '1111111111111111111111111111111111111111'],
    ['non-hex digit', '0x111111111111111111111111111111111111111g'],
    ['too long', `${ALICE}1`],
  ])('should reject an address that is %s', (_label, value) => {
    expect(isValidAddress(value)).toBe(false);
  });

  it('should reject non-strings', () => {
    expect(isValidAddress(undefined)).toBe(false);
    expect(isValidAddress(123)).toBe(false);
  });

  it('should normalize to lower case', () => {
    expect(normalizeAddress(MIXED_CASE)).toBe(MIXED_CASE_LOWER);
  });
});

describe('parseFrame', () => {
  describe('malformed input', () => {
    it('should report invalid JSON', () => {
      expect(parseFrame('{not json')).toEqual({ ok: false, error: 'Invalid JSON' });
    });

    it.each([['[]'], ['"auth"'], ['null'], ['{}'], ['{"type":""}'], ['{"type":7}']])(
      'should reject %s as a frame',
      (raw) => {
        expect(parseFrame(raw)).toEqual({ ok: false, error: 'Frame must be an object with a type' });
      },
    );
  });

  describe('auth', () => {
    it('should normalize the address', () => {
      expect(parseFrame(JSON.stringify({ type: 'auth', address: MIXED_CASE }))).toEqual({
        ok: true,
        frame: { type: 'auth', address: MIXED_CASE_LOWER },
      });
    });

    it('should leave the address out when it is not valid', () => {
      const result = parseFrame(JSON.stringify({ type: 'auth', address: 'alice' }));

      expect(result).toEqual({ ok: true, frame: { type: 'auth', address: undefined } });
    });
  });

  describe('message', () => {
    it('should parse a complete message and normalize the recipient', () => {
      const raw = JSON.stringify({ type: 'message', to: MIXED_CASE, content: 'hi', messageId: 'm1', timestamp: 1234 });

      expect(parseFrame(raw)).toEqual({
        ok: true,
        frame: { type: 'message', to: MIXED_CASE_LOWER, content: 'hi', messageId: 'm1', timestamp: 1234 },
      });
    });

    it('should accept object content as an opaque payload', () => {
      const content = { ciphertext: 'abc', nonce: 'n1' };
      const result = parseFrame(JSON.stringify({ type: 'message', to: BOB, content, messageId: 'm1' }));

      expect(result).toEqual({
        ok: true,
        frame: { type: 'message', to: BOB, content, messageId: 'm1', timestamp: undefined },
      });
    });

    it.each([
      ['an array', [104, 105]],
      ['a number', 7],
      ['a boolean', false],
      ['an empty object', {}],
    ])('should accept %s as content', (_label, content) => {
      const result = parseFrame(JSON.stringify({ type: 'message', to: BOB, content, messageId: 'm1' }));

      expect(result).toEqual({
        ok: true,
        frame: { type: 'message', to: BOB, content, messageId: 'm1', timestamp: undefined },
      });
    });

    it('should accept a numeric messageId', () => {
      const result = parseFrame(JSON.stringify({ type: 'message', to: BOB, content: 'hi', messageId: 42 }));

      expect(result).toEqual({
        ok: true,
        frame: { type: 'message', to: BOB, content: 'hi', messageId: 42, timestamp: undefined },
      });
    });

    it('should echo a numeric messageId on a rejected message', () => {
      expect(parseFrame(JSON.stringify({ type: 'message', to: BOB, messageId: 42 }))).toEqual({
        ok: false,
        error: 'Invalid message format',
        messageId: 42,
      });
    });

    it('should ignore a timestamp that is not a number', () => {
      const result = parseFrame(JSON.stringify({ type: 'message', to: BOB, content: 'hi', messageId: 'm1', timestamp: 'now' }));

      expect(result.ok && result.frame.type === 'message' && result.frame.timestamp).toBeUndefined();
    });

    it.each([
      ['to', { content: 'hi', messageId: 'm1' }],
      ['content', { to: BOB, messageId: 'm1' }],
      ['empty content', { to: BOB, content: '', messageId: 'm1' }],
      ['null content', { to: BOB, content: null, messageId: 'm1' }],
    ])('should reject a message missing %s and echo the messageId', (_label, fields) => {
      expect(parseFrame(JSON.stringify({ type: 'message', ...fields }))).toEqual({
        ok: false,
        error: 'Invalid message format',
        messageId: 'm1',
      });
    });

    it('should reject a message without messageId', () => {
      expect(parseFrame(JSON.stringify({ type: 'message', to: BOB, content: 'hi' }))).toEqual({
        ok: false,
        error: 'Invalid message format',
        messageId: undefined,
      });
    });

    it('should reject a recipient that is not an address', () => {
      expect(parseFrame(JSON.stringify({ type: 'message', to: 'bob', content: 'hi', messageId: 'm1' }))).toEqual({
        ok: false,
        error: 'Invalid recipient address',
        messageId: 'm1',
      });
    });
  });

  describe('presence frames', () => {
    it('should parse typing with a boolean flag', () => {
      expect(parseFrame(JSON.stringify({ type: 'typing', to: BOB, isTyping: true }))).toEqual({
        ok: true,
        frame: { type: 'typing', to: BOB, isTyping: true },
      });
    });

    it('should leave isTyping out when it is not a boolean', () => {
      expect(parseFrame(JSON.stringify({ type: 'typing', to: BOB, isTyping: 'yes' }))).toEqual({
        ok: true,
        frame: { type: 'typing', to: BOB, isTyping: undefined },
      });
    });

    it('should parse read receipts', () => {
      expect(parseFrame(JSON.stringify({ type: 'read_receipt', to: BOB, messageId: 'm1' }))).toEqual({
        ok: true,
        frame: { type: 'read_receipt', to: BOB, messageId: 'm1' },
      });
    });

    it('should parse ping', () => {
      expect(parseFrame('{"type":"ping"}')).toEqual({ ok: true, frame: { type: 'ping' } });
    });
  });

  it('should mark unknown types as unsupported', () => {
    expect(parseFrame('{"type":"presence"}')).toEqual({
      ok: true,
      frame: { type: 'unsupported', declaredType: 'presence' },
    });
  });
});

describe('serializeFrame', () => {
  it('should drop an absent messageId from error frames', () => {
    expect(serializeFrame({ type: 'error', message: 'Invalid JSON', messageId: undefined })).toBe(
      '{"type":"error","message":"Invalid JSON"}',
    );
  });
});
