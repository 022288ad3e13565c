/**
 * ServiceRegistry: the process-wide directory of active users and their
 * connections.
 *
 * Both maps are keyed by user id and only touched synchronously between
 * awaits, so the event loop serializes every read and write on them.
 * Connection calls are serialized per handle by SharedConnection.
 */

import type { ConnectionConfig } from '../types/source';
import type { RemoteConfigStore } from '../interfaces/config-store';
import type { Session, SessionMinter } from '../interfaces/session-minter';
import { UnsupportedSourceError, UserNotFoundError } from '../types/errors';
import { sourceTypeKey } from '../types/source';
import { DriverRegistry } from './driver-registry';
import { MemoryConfigStore } from './memory-config-store';
import { SharedConnection } from './shared-connection';
import { User } from './user';

export interface ServiceRegistryOptions {
  /** Session minting collaborator */
  sessions: SessionMinter;
  /** Available backend drivers (default: none) */
  drivers?: DriverRegistry;
  /** Remote configuration store (default: MemoryConfigStore) */
  configStore?: RemoteConfigStore;
  /** Default timeout applied to every call on created connections */
  driverTimeoutMs?: number;
}

export interface RegistryStats {
  users: number;
  connections: number;
}

export class ServiceRegistry {
  private readonly users = new Map<string, User>();
  private readonly connections = new Map<string, SharedConnection>();

  readonly drivers: DriverRegistry;
  readonly configStore: RemoteConfigStore;
  private readonly sessions: SessionMinter;
  private readonly driverTimeoutMs?: number;

  constructor(options: ServiceRegistryOptions) {
    this.sessions = options.sessions;
    this.drivers = options.drivers ?? new DriverRegistry();
    this.configStore = options.configStore ?? new MemoryConfigStore();
    this.driverTimeoutMs = options.driverTimeoutMs;
  }

  // ── Connections ─────────────────────────────────────────────────────

  /**
   * Construct a driver for the config's source type and wrap it in a shared
   * handle. The handle is not indexed; pass it to addConnection.
   *
   * Resolves to undefined only for sources that need no connection; no
   * registered driver produces that today.
   *
   * @throws UnsupportedSourceError if no driver serves the source type
   */
  async createConnection(config: ConnectionConfig): Promise<SharedConnection | undefined> {
    const driver = this.drivers.get(config.sourceType);
    if (!driver) {
      throw new UnsupportedSourceError(sourceTypeKey(config.sourceType));
    }

    const connection = await driver.connect(config, { configStore: this.configStore });
    return new SharedConnection(connection, { timeoutMs: this.driverTimeoutMs });
  }

  getConnection(userId: string): SharedConnection | undefined {
    return this.connections.get(userId);
  }

  /**
   * Index a connection under a user id. A handle it replaces is closed
   * before this resolves; calls already queued on it finish first.
   */
  async addConnection(userId: string, conn: SharedConnection): Promise<void> {
    const previous = this.connections.get(userId);
    this.connections.set(userId, conn);

    if (previous && previous !== conn) {
      await this.closeQuietly(previous);
    }
  }

  /**
   * Create a connection and index it under the user id. If the user was
   * active when the call started and has since logged out, the new
   * connection is closed instead of indexed.
   *
   * @throws UserNotFoundError if the user logged out while connecting
   */
  async connect(userId: string, config: ConnectionConfig): Promise<SharedConnection | undefined> {
    const owner = this.users.get(userId);
    const conn = await this.createConnection(config);
    if (!conn) return conn;

    if (owner && this.users.get(userId) !== owner) {
      await this.closeQuietly(conn);
      throw new UserNotFoundError(userId);
    }

    await this.addConnection(userId, conn);
    return conn;
  }

  /**
   * Drop and close a user's connection. Resolves false if there was none.
   */
  async removeConnection(userId: string): Promise<boolean> {
    const conn = this.connections.get(userId);
    if (!conn) return false;

    this.connections.delete(userId);
    await this.closeQuietly(conn);
    return true;
  }

  // ── Users ───────────────────────────────────────────────────────────

  /**
   * Mint a session bound to the request origin and register a guest user
   * under that origin. A user already active under the origin is kept and
   * gains the new session. A minting failure leaves the registry untouched.
   */
  async createGuestUser(origin: string): Promise<Session> {
    const session = await this.sessions.mint(origin);

    let user = this.users.get(origin);
    if (!user) {
      user = User.guest(origin, this.configStore);
      this.addUser(user);
    }
    user.addSession(session.sessionId);
    return session;
  }

  /**
   * Mint another session for an active user, e.g. after external login.
   *
   * @throws UserNotFoundError if the user is not active
   */
  async createSession(userId: string): Promise<Session> {
    const user = this.users.get(userId);
    if (!user) {
      throw new UserNotFoundError(userId);
    }

    const session = await this.sessions.mint(userId);
    if (this.users.get(userId) !== user) {
      throw new UserNotFoundError(userId);
    }
    user.addSession(session.sessionId);
    return session;
  }

  /**
   * Register a user. Used by the external authentication path.
   */
  addUser(user: User): void {
    this.users.set(user.id, user);
  }

  findUser(userId: string): User | undefined {
    return this.users.get(userId);
  }

  /**
   * Log a user out and drop them from the active users, closing their
   * connection. No-op for an unknown id.
   */
  async logUserOut(userId: string): Promise<void> {
    const user = this.users.get(userId);
    if (!user) return;

    user.logout();
    this.users.delete(userId);
    await this.removeConnection(userId);
  }

  /**
   * Save a connection config to the remote store for a user.
   *
   * @throws UserNotFoundError if the user is not active
   */
  async saveConfig(config: ConnectionConfig, userId: string): Promise<void> {
    const user = this.users.get(userId);
    if (!user) {
      throw new UserNotFoundError(userId);
    }
    await user.saveConfig(config);
  }

  // ── Lifecycle ───────────────────────────────────────────────────────

  stats(): RegistryStats {
    return { users: this.users.size, connections: this.connections.size };
  }

  /**
   * Close every connection and forget all users.
   */
  async shutdown(): Promise<void> {
    const open = Array.from(this.connections.values());
    this.connections.clear();
    this.users.clear();
    await Promise.all(open.map(conn => this.closeQuietly(conn)));
  }

  private async closeQuietly(conn: SharedConnection): Promise<void> {
    try {
      await conn.close();
    } catch (err) {
      console.error(`[Registry] Failed to close connection ${conn.connectionId}:`, err);
    }
  }
}
