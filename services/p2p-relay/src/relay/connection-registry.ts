/**
 * Connection Registry: tracks authenticated sockets by address.
 *
 * One entry per address. Re-registering an address replaces the mapping
 * without closing or notifying the previous socket (last write wins).
 * Connections idle past the timeout are evicted by sweepIdle().
 */

import { normalizeAddress } from '../address.js';
import { createLogger, errorData } from '../core/logger.js';
import { CloseCodes, OPEN_READY_STATE, type RelaySocket } from './protocol.js';

const log = createLogger('connections');

export interface Connection {
  address: string;
  socket: RelaySocket;
  connectedAt: number;
  lastActivity: number;
}

export class ConnectionRegistry {
  private readonly connections = new Map<string, Connection>();

  constructor(private readonly clock: () => number = Date.now) {}

  register(address: string, socket: RelaySocket): Connection {
    const key = normalizeAddress(address);
    const now = this.clock();
    const previous = this.connections.get(key);
    if (previous && previous.socket !== socket) {
      // The displaced socket stays open and is simply no longer routable.
      log.warn('Address re-registered, replacing previous connection', { address: key });
    }

    const connection: Connection = { address: key, socket, connectedAt: now, lastActivity: now };
    this.connections.set(key, connection);
    return connection;
  }

  /**
   * Remove the entry for an address. With a socket given, only removes the
   * entry if it still belongs to that socket.
   */
  unregister(address: string, socket?: RelaySocket): boolean {
    const key = normalizeAddress(address);
    const existing = this.connections.get(key);
    if (!existing) return false;
    if (socket && existing.socket !== socket) return false;
    return this.connections.delete(key);
  }

  get(address: string): Connection | undefined {
    return this.connections.get(normalizeAddress(address));
  }

  /** The socket for an address, if registered and currently open. */
  getOpenSocket(address: string): RelaySocket | undefined {
    const socket = this.get(address)?.socket;
    return socket && socket.readyState === OPEN_READY_STATE ? socket : undefined;
  }

  isOnline(address: string): boolean {
    return this.getOpenSocket(address) !== undefined;
  }

  /** Refresh lastActivity, if this socket still owns the address. */
  touch(address: string, socket: RelaySocket): void {
    const connection = this.get(address);
    if (connection && connection.socket === socket) connection.lastActivity = this.clock();
  }

  count(): number {
    return this.connections.size;
  }

  addresses(): string[] {
    return Array.from(this.connections.keys());
  }

  /**
   * Close and remove every connection idle for longer than timeoutMs.
   * Returns the evicted addresses.
   */
  sweepIdle(timeoutMs: number): string[] {
    const now = this.clock();
    const evicted: string[] = [];

    for (const [address, connection] of this.connections) {
      const idleMs = now - connection.lastActivity;
      if (idleMs <= timeoutMs) continue;

      this.connections.delete(address);
      evicted.push(address);
      log.warn('Closing stale connection', { address, idleFor: `${Math.round(idleMs / 1000)}s` });
      closeSocket(connection.socket, CloseCodes.IDLE_TIMEOUT, 'Heartbeat timeout');
    }

    return evicted;
  }

  /**
   * Close every registered socket and empty the registry (shutdown).
   */
  closeAll(): void {
    log.info('Closing all connections', { count: this.connections.size });
    for (const connection of this.connections.values()) {
      closeSocket(connection.socket, CloseCodes.SHUTDOWN, 'Server shutting down');
    }
    this.connections.clear();
  }
}

function closeSocket(socket: RelaySocket, code: number, reason: string): void {
  try {
    socket.close(code, reason);
  } catch (err) {
    log.warn('Socket close failed', errorData(err));
  }
}
