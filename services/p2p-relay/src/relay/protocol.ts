/**
 * Relay wire protocol: one JSON object per WebSocket text frame.
 *
 * Inbound frames are parsed into a tagged union so the session can
 * dispatch on `type` with full narrowing; outbound frames are built by the
 * relay and serialized as-is.
 */

import { isValidAddress, normalizeAddress } from '../address.js';
import type { JsonValue, MessageContent, MessageId } from '../stores/message-queue.js';

/** WebSocket readyState value for an open socket. */
export const OPEN_READY_STATE = 1;

/** Close codes sent by the relay (application range 4000-4999). */
export const CloseCodes = {
  AUTH_REQUIRED: 4401,
  IDLE_TIMEOUT: 4408,
  SHUTDOWN: 1001,
} as const;

/**
 * The slice of a WebSocket the relay needs. `ws` sockets satisfy it
 * structurally; tests use in-memory fakes.
 */
export interface RelaySocket {
  readonly readyState: number;
  send(data: string): void;
  close(code?: number, reason?: string): void;
}

// ── Inbound (client → relay) ─────────────────────────────────

export interface AuthFrame {
  type: 'auth';
  address?: string;
}

export interface ChatFrame {
  type: 'message';
  to: string;
  content: MessageContent;
  messageId: MessageId;
  timestamp?: number;
}

export interface TypingFrame {
  type: 'typing';
  to?: string;
  /** Absent when the client sent anything but a boolean. */
  isTyping?: boolean;
}

export interface ReadReceiptFrame {
  type: 'read_receipt';
  to?: string;
  messageId?: MessageId;
}

export interface PingFrame {
  type: 'ping';
}

/** Any `type` the relay does not handle. */
export interface UnsupportedFrame {
  type: 'unsupported';
  declaredType: string;
}

export type InboundFrame =
  | AuthFrame
  | ChatFrame
  | TypingFrame
  | ReadReceiptFrame
  | PingFrame
  | UnsupportedFrame;

export type ParseResult =
  | { ok: true; frame: InboundFrame }
  | { ok: false; error: string; messageId?: MessageId };

// ── Outbound (relay → client) ────────────────────────────────

export type OutboundFrame =
  | { type: 'auth_success'; address: string; timestamp: number }
  | { type: 'message'; from: string; content: MessageContent; messageId: MessageId; timestamp: number; queued?: true }
  | { type: 'delivered'; messageId: MessageId; to: string; timestamp: number }
  | { type: 'queued'; messageId: MessageId; to: string; timestamp: number }
  | { type: 'typing'; from: string; isTyping: boolean }
  | { type: 'read'; from: string; messageId: MessageId; timestamp: number }
  | { type: 'pong'; timestamp: number }
  | { type: 'error'; message: string; messageId?: MessageId };

// ── Parsing ──────────────────────────────────────────────────

type JsonRecord = Record<string, unknown>;

function asRecord(value: unknown): JsonRecord | null {
  if (!value || typeof value !== 'object' || Array.isArray(value)) return null;
  return Object.fromEntries(Object.entries(value));
}

function asString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) return value.every(isJsonValue);
      return Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

/** Content is opaque: anything present except null and the empty string. */
function asContent(value: unknown): MessageContent | undefined {
  if (!isJsonValue(value) || value === null || value === '') return undefined;
  return value;
}

function asMessageId(value: unknown): MessageId | undefined {
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  return asString(value);
}

function asBoolean(value: unknown): boolean | undefined {
  return typeof value === 'boolean' ? value : undefined;
}

function asAddress(value: unknown): string | undefined {
  return isValidAddress(value) ? normalizeAddress(value) : undefined;
}

function parseChat(record: JsonRecord): ParseResult {
  const messageId = asMessageId(record.messageId);
  const to = asString(record.to);
  const content = asContent(record.content);

  if (!to || content === undefined || messageId === undefined) {
    return { ok: false, error: 'Invalid message format', messageId };
  }
  const recipient = asAddress(to);
  if (!recipient) {
    return { ok: false, error: 'Invalid recipient address', messageId };
  }

  const sentAt = record.timestamp;
  const timestamp = typeof sentAt === 'number' && Number.isFinite(sentAt) ? sentAt : undefined;

  return { ok: true, frame: { type: 'message', to: recipient, content, messageId, timestamp } };
}

/**
 * Parse one raw text frame. Errors are returned rather than thrown so the
 * caller decides whether they are fatal for the connection.
 */
export function parseFrame(raw: string): ParseResult {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return { ok: false, error: 'Invalid JSON' };
  }

  const record = asRecord(value);
  const type = record ? asString(record.type) : undefined;
  if (!record || !type) return { ok: false, error: 'Frame must be an object with a type' };

  switch (type) {
    case 'auth':
      return { ok: true, frame: { type: 'auth', address: asAddress(record.address) } };
    case 'message':
      return parseChat(record);
    case 'typing':
      return { ok: true, frame: { type: 'typing', to: asAddress(record.to), isTyping: asBoolean(record.isTyping) } };
    case 'read_receipt':
      return {
        ok: true,
        frame: { type: 'read_receipt', to: asAddress(record.to), messageId: asMessageId(record.messageId) },
      };
    case 'ping':
      return { ok: true, frame: { type: 'ping' } };
    default:
      return { ok: true, frame: { type: 'unsupported', declaredType: type } };
  }
}

export function serializeFrame(frame: OutboundFrame): string {
  return JSON.stringify(frame);
}
