/**
 * Simple dependency injection container.
 */

import type { ServiceToken } from './tokens';

/**
 * Factory function for lazy service creation.
 */
export type ServiceFactory<T> = (container: ServiceContainer) => T;

type ServiceEntry =
  | { kind: 'instance'; instance: unknown }
  | { kind: 'factory'; factory: ServiceFactory<unknown>; singleton: boolean };

/**
 * @example
 * ```typescript
 * const container = new ServiceContainer();
 *
 * container.registerInstance(ServiceTokens.SessionMinter, new HmacSessionMinter({ secret }));
 * container.registerFactory(ServiceTokens.Registry, (c) =>
 *   new ServiceRegistry({
 *     sessions: c.resolve(ServiceTokens.SessionMinter),
 *     drivers: c.resolve(ServiceTokens.DriverRegistry),
 *   })
 * );
 *
 * const registry = container.resolve(ServiceTokens.Registry);
 * ```
 */
export class ServiceContainer {
  private services = new Map<symbol, ServiceEntry>();

  /**
   * Register a service instance (eager registration).
   */
  registerInstance<T>(token: ServiceToken<T>, instance: T): this {
    this.services.set(token.key, { kind: 'instance', instance });
    return this;
  }

  /**
   * Register a service factory (lazy registration).
   *
   * @param singleton - Whether to cache the instance (default: true)
   */
  registerFactory<T>(token: ServiceToken<T>, factory: ServiceFactory<T>, singleton = true): this {
    this.services.set(token.key, { kind: 'factory', factory, singleton });
    return this;
  }

  /**
   * Resolve a service by token.
   *
   * @throws Error if service not registered
   */
  resolve<T>(token: ServiceToken<T>): T {
    const entry = this.services.get(token.key);
    if (!entry) {
      throw new Error(`Service not registered: ${String(token.key)}. Did you forget to register it?`);
    }

    if (entry.kind === 'instance') {
      // Entries are only written through the typed register methods
      return entry.instance as T;
    }

    const instance = entry.factory(this);
    if (entry.singleton) {
      this.services.set(token.key, { kind: 'instance', instance });
    }
    return instance as T;
  }

  has(token: ServiceToken<unknown>): boolean {
    return this.services.has(token.key);
  }

  /**
   * Try to resolve a service, returning undefined if not registered.
   */
  tryResolve<T>(token: ServiceToken<T>): T | undefined {
    return this.has(token) ? this.resolve(token) : undefined;
  }

  clear(): void {
    this.services.clear();
  }

  getRegisteredTokens(): symbol[] {
    return Array.from(this.services.keys());
  }
}
