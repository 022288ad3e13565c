import { describe, it, expect, beforeEach } from 'vitest';
import { MemoryConfigStore } from '../impl/memory-config-store';
import { DriverRegistry } from '../impl/driver-registry';
import { User } from '../impl/user';
import { DriverRegistrationError } from '../types/errors';
import { databaseSource } from '../types/source';
import { fakeDriver } from './connections';

describe('MemoryConfigStore', () => {
  let store: MemoryConfigStore;

  beforeEach(() => {
    store = new MemoryConfigStore();
  });

  it('saves and reads table configs per connection', async () => {
    await store.saveTableConfig('conn_a', 'orders', { label: 'Orders' });
    await store.saveTableConfig('conn_b', 'orders', { label: 'Other' });

    expect(await store.getTableConfig('conn_a', 'orders')).toEqual({ label: 'Orders' });
    expect(await store.getTableConfig('conn_b', 'orders')).toEqual({ label: 'Other' });
  });

  it('returns null for an unknown table config', async () => {
    expect(await store.getTableConfig('conn_a', 'missing')).toBeNull();
  });

  it('replaces a table config on save', async () => {
    await store.saveTableConfig('conn_a', 'orders', { label: 'Orders' });
    await store.saveTableConfig('conn_a', 'orders', { label: 'All orders' });

    expect(await store.getTableConfig('conn_a', 'orders')).toEqual({ label: 'All orders' });
  });

  it('isolates stored data from callers', async () => {
    const config = { columns: ['id'] };
    await store.saveTableConfig('conn_a', 'orders', config);
    config.columns.push('total');

    const loaded = await store.getTableConfig('conn_a', 'orders');
    expect(loaded).toEqual({ columns: ['id'] });
  });

  it('lists connection configs newest first', async () => {
    await store.saveConnectionConfig('1.2.3.4', { sourceType: databaseSource('mysql'), host: 'first' });
    await store.saveConnectionConfig('1.2.3.4', { sourceType: databaseSource('mysql'), host: 'second' });

    const saved = await store.listConnectionConfigs('1.2.3.4');
    expect(saved.map(s => s.config.host)).toEqual(['second', 'first']);
    expect(saved[0].userId).toBe('1.2.3.4');
    expect(await store.listConnectionConfigs('5.6.7.8')).toEqual([]);
  });
});

describe('DriverRegistry', () => {
  it('finds drivers by source type', () => {
    const mysql = fakeDriver('mysql');
    const registry = new DriverRegistry().register(mysql);

    expect(registry.get(databaseSource('mysql'))).toBe(mysql);
    expect(registry.has(databaseSource('postgres'))).toBe(false);
    expect(registry.get({ kind: 'file', format: 'csv' })).toBeUndefined();
    expect(registry.keys()).toEqual(['database:mysql']);
  });

  it('refuses a second driver for the same source type', () => {
    const registry = new DriverRegistry().register(fakeDriver('mysql'));

    expect(() => registry.register(fakeDriver('mysql'))).toThrow(DriverRegistrationError);
  });
});

describe('User', () => {
  it('moves from guest to authenticated to logged out', () => {
    const user = User.guest('1.2.3.4', new MemoryConfigStore());
    expect(user.isLogged).toBe(false);

    user.login();
    expect(user.isLogged).toBe(true);

    user.logout();
    expect(user.isLogged).toBe(false);
  });

  it('serializes without its store', () => {
    const user = User.authenticated('acct_42', new MemoryConfigStore());

    expect(JSON.parse(JSON.stringify(user))).toEqual({ id: 'acct_42', isLogged: true });
  });
});
