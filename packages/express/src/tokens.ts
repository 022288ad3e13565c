/**
 * Service tokens for dependency injection.
 *
 * Each token carries the type of the service it identifies, so
 * `container.resolve(ServiceTokens.Registry)` is typed without a type
 * argument.
 */

import type { Application } from 'express';
import type { DriverRegistry, RemoteConfigStore, ServiceRegistry, SessionMinter } from '@sourcedesk/core';
import type { PgQueryable } from '@sourcedesk/postgres';

export interface ServiceToken<T> {
  readonly key: symbol;
  /** Type carrier, never set */
  readonly __service?: T;
}

export function serviceToken<T>(name: string): ServiceToken<T> {
  return { key: Symbol.for(`sd:${name}`) };
}

export const ServiceTokens = {
  // Core services
  Registry: serviceToken<ServiceRegistry>('Registry'),
  DriverRegistry: serviceToken<DriverRegistry>('DriverRegistry'),
  SessionMinter: serviceToken<SessionMinter>('SessionMinter'),

  // Storage
  ConfigStore: serviceToken<RemoteConfigStore>('ConfigStore'),
  DatabasePool: serviceToken<PgQueryable>('DatabasePool'),

  // Express
  ExpressApp: serviceToken<Application>('ExpressApp'),
} as const;
