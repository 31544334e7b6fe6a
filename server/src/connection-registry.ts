/**
 * Connection Registry
 *
 * Admission control and bookkeeping for active relay sessions. One instance is
 * created by the entry point and shared by every session.
 *
 * Every operation is synchronous, so each check-and-insert or removal runs to
 * completion on the event loop before another caller can observe the map.
 */

import { DEFAULT_MAX_CONNECTIONS } from './config.js';
import type { ConnectionType } from './protocol.js';

export interface RegistryEntry {
  callerId?: string;
  connectionType: ConnectionType;
  connectedAt: Date;
  status: 'connected';
}

function copyEntry(entry: RegistryEntry): RegistryEntry {
  return { ...entry, connectedAt: new Date(entry.connectedAt.getTime()) };
}

export class ConnectionRegistry {
  private connections = new Map<string, RegistryEntry>();
  private maxConnections: number;

  constructor(maxConnections: number = DEFAULT_MAX_CONNECTIONS) {
    if (!Number.isInteger(maxConnections) || maxConnections <= 0) {
      throw new Error(`maxConnections must be a positive integer, got ${maxConnections}`);
    }
    this.maxConnections = maxConnections;
  }

  /**
   * Admit a connection if there is capacity.
   * @returns false, without changing anything, when the limit is reached or the id is already registered
   */
  register(connectionId: string, callerId: string | undefined, connectionType: ConnectionType): boolean {
    if (this.connections.size >= this.maxConnections) {
      console.warn(
        `[Registry] Connection limit reached (${this.connections.size}/${this.maxConnections}). ` +
          `Rejecting connection ${connectionId}`
      );
      return false;
    }

    if (this.connections.has(connectionId)) {
      console.warn(`[Registry] Connection ${connectionId} is already registered`);
      return false;
    }

    this.connections.set(connectionId, {
      callerId,
      connectionType,
      connectedAt: new Date(),
      status: 'connected',
    });

    console.log(
      `[Registry] Connection registered: ${connectionId} (type=${connectionType}, caller=${callerId ?? 'unknown'}). ` +
        `Active connections: ${this.connections.size}/${this.maxConnections}`
    );
    return true;
  }

  /**
   * Remove a connection. Unknown ids are logged and otherwise ignored.
   */
  unregister(connectionId: string): void {
    const entry = this.connections.get(connectionId);
    if (!entry) {
      console.warn(`[Registry] Attempted to unregister unknown connection: ${connectionId}`);
      return;
    }

    this.connections.delete(connectionId);
    const durationSeconds = (Date.now() - entry.connectedAt.getTime()) / 1000;
    console.log(
      `[Registry] Connection unregistered: ${connectionId} (duration=${durationSeconds.toFixed(2)}s). ` +
        `Active connections: ${this.connections.size}/${this.maxConnections}`
    );
  }

  activeCount(): number {
    return this.connections.size;
  }

  get(connectionId: string): RegistryEntry | undefined {
    const entry = this.connections.get(connectionId);
    return entry ? copyEntry(entry) : undefined;
  }

  /**
   * Point-in-time copy of every entry; later registry changes do not show through it
   */
  all(): Map<string, RegistryEntry> {
    const snapshot = new Map<string, RegistryEntry>();
    for (const [connectionId, entry] of this.connections) {
      snapshot.set(connectionId, copyEntry(entry));
    }
    return snapshot;
  }

  getMaxConnections(): number {
    return this.maxConnections;
  }

  /**
   * Applies to subsequent register() calls. Non-positive values are ignored.
   */
  setMaxConnections(maxConnections: number): void {
    if (!Number.isInteger(maxConnections) || maxConnections <= 0) {
      console.warn(`[Registry] Ignoring invalid max connections: ${maxConnections}`);
      return;
    }
    this.maxConnections = maxConnections;
    console.log(`[Registry] Max connections set to ${maxConnections}`);
  }
}
