import type { RemoteConfigStore } from '../interfaces/config-store';
import { redactConfig, type ConnectionConfig } from '../types/source';

/**
 * An active identity. Guests are keyed by network origin, authenticated
 * users by account id.
 */
export class User {
  private logged: boolean;
  private readonly sessionIds = new Set<string>();

  constructor(
    readonly id: string,
    isLogged: boolean,
    private readonly configStore: RemoteConfigStore
  ) {
    this.logged = isLogged;
  }

  static guest(origin: string, configStore: RemoteConfigStore): User {
    return new User(origin, false, configStore);
  }

  static authenticated(accountId: string, configStore: RemoteConfigStore): User {
    return new User(accountId, true, configStore);
  }

  get isLogged(): boolean {
    return this.logged;
  }

  /** Guest → Authenticated, after the external auth path succeeds. */
  login(): void {
    this.logged = true;
  }

  /** Ends every session bound to this user. */
  logout(): void {
    this.logged = false;
    this.sessionIds.clear();
  }

  addSession(sessionId: string): void {
    this.sessionIds.add(sessionId);
  }

  hasSession(sessionId: string): boolean {
    return this.sessionIds.has(sessionId);
  }

  /**
   * Save a connection config for this user in the remote store.
   * The password never leaves the process.
   */
  async saveConfig(config: ConnectionConfig): Promise<void> {
    await this.configStore.saveConnectionConfig(this.id, redactConfig(config));
  }

  toJSON(): { id: string; isLogged: boolean } {
    return { id: this.id, isLogged: this.logged };
  }
}
