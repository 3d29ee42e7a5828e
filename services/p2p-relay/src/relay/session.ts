/**
 * Connection session: one per socket, owns the auth state machine.
 *
 *   unauthenticated ──auth──▶ authenticated ──close──▶ closed
 *
 * Raw frames go through receive(), strictly in arrival order, and are
 * routed by a dispatch table keyed on the current state. The session holds
 * no shared state itself; routing decisions live in the SessionHost.
 */

import { createLogger, errorData } from '../core/logger.js';
import {
  CloseCodes,
  OPEN_READY_STATE,
  parseFrame,
  serializeFrame,
  type ChatFrame,
  type OutboundFrame,
  type ReadReceiptFrame,
  type RelaySocket,
  type TypingFrame,
} from './protocol.js';

const log = createLogger('session');

export type SessionState = 'unauthenticated' | 'authenticated' | 'closed';

/** What a session needs from the relay. Implemented by RelayManager. */
export interface SessionHost {
  authenticate(session: ConnectionSession, address: string): void;
  touch(session: ConnectionSession, address: string): void;
  relayMessage(session: ConnectionSession, from: string, frame: ChatFrame): void;
  forwardTyping(from: string, frame: TypingFrame): void;
  forwardReadReceipt(from: string, frame: ReadReceiptFrame): void;
  now(): number;
  disconnected(session: ConnectionSession, address: string): void;
}

/**
 * Send one frame if the socket is open. Returns false when nothing was sent.
 */
export function sendFrame(socket: RelaySocket, frame: OutboundFrame): boolean {
  if (socket.readyState !== OPEN_READY_STATE) return false;
  try {
    socket.send(serializeFrame(frame));
    return true;
  } catch (err) {
    log.warn('Socket send failed', { type: frame.type, ...errorData(err) });
    return false;
  }
}

type FrameHandler = (session: ConnectionSession, raw: string) => void;

/**
 * Before auth, the only acceptable frame is a well-formed auth frame.
 * Anything else ends the connection.
 */
const handleUnauthenticated: FrameHandler = (session, raw) => {
  const parsed = parseFrame(raw);
  const frame = parsed.ok ? parsed.frame : null;

  if (frame?.type !== 'auth' || !frame.address) {
    session.reject('Authentication required');
    return;
  }

  session.markAuthenticated(frame.address);
  session.host.authenticate(session, frame.address);
};

const handleAuthenticated: FrameHandler = (session, raw) => {
  const address = session.requireAddress();
  session.host.touch(session, address);

  const parsed = parseFrame(raw);
  if (!parsed.ok) {
    session.send({ type: 'error', message: parsed.error, messageId: parsed.messageId });
    return;
  }

  const frame = parsed.frame;
  switch (frame.type) {
    case 'message':
      session.host.relayMessage(session, address, frame);
      return;
    case 'typing':
      session.host.forwardTyping(address, frame);
      return;
    case 'read_receipt':
      session.host.forwardReadReceipt(address, frame);
      return;
    case 'ping':
      session.send({ type: 'pong', timestamp: session.host.now() });
      return;
    case 'auth':
      log.warn('Ignoring auth frame on authenticated connection', { address });
      return;
    case 'unsupported':
      log.warn('Unknown message type', { address, type: frame.declaredType });
      return;
  }
};

const DISPATCH: Record<Exclude<SessionState, 'closed'>, FrameHandler> = {
  unauthenticated: handleUnauthenticated,
  authenticated: handleAuthenticated,
};

export class ConnectionSession {
  private _state: SessionState = 'unauthenticated';
  private _address: string | null = null;

  constructor(
    readonly socket: RelaySocket,
    readonly host: SessionHost,
  ) {}

  get state(): SessionState {
    return this._state;
  }

  get address(): string | null {
    return this._address;
  }

  requireAddress(): string {
    if (this._state !== 'authenticated' || this._address === null) {
      throw new Error(`Session is ${this._state}, not authenticated`);
    }
    return this._address;
  }

  markAuthenticated(address: string): void {
    this._state = 'authenticated';
    this._address = address;
  }

  /**
   * Handle one raw inbound frame.
   */
  receive(raw: string): void {
    if (this._state === 'closed') return;
    const handler = DISPATCH[this._state];

    try {
      handler(this, raw);
    } catch (err) {
      log.error('Error handling frame', { address: this._address, ...errorData(err) });
      if (this._state === 'authenticated') {
        this.send({ type: 'error', message: 'Failed to process message' });
      } else {
        this.reject('Failed to process message');
      }
    }
  }

  send(frame: OutboundFrame): boolean {
    return sendFrame(this.socket, frame);
  }

  /** Send an error frame and close. Used before authentication. */
  reject(message: string): void {
    this.send({ type: 'error', message });
    this.socket.close(CloseCodes.AUTH_REQUIRED, message);
  }

  /**
   * The socket has closed. Terminal; later frames are ignored.
   */
  closed(): void {
    if (this._state === 'closed') return;
    const address = this._address;
    this._state = 'closed';
    if (address) this.host.disconnected(this, address);
  }
}
