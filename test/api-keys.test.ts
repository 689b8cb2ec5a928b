import { describe, expect, it } from 'vitest';
import { ApiKeyService } from '../src/auth/api-keys.js';
import { ConfigError } from '../src/errors.js';
import { InMemoryApiKeyStore } from './fixtures.js';

const DAY_MS = 24 * 60 * 60 * 1000;

function setup(cacheTtlMs = 60000) {
  const store = new InMemoryApiKeyStore();
  const clock = { current: new Date('2026-01-01T00:00:00Z') };
  const service = new ApiKeyService({
    store,
    envKeys: ['test-key-1', 'test-key-2'],
    cacheTtlMs,
    now: () => clock.current,
  });
  return { store, clock, service };
}

describe('ApiKeyService.validate', () => {
  it('accepts configured environment keys', async () => {
    const { service } = setup();

    expect(await service.validate('test-key-2')).toEqual({ id: 'env:2', name: 'env-key-2', source: 'env' });
    expect(service.envKeyCount).toBe(2);
  });

  it('rejects empty and unknown keys', async () => {
    const { service } = setup();

    expect(await service.validate('')).toBeNull();
    expect(await service.validate('not-a-key')).toBeNull();
  });

  it('accepts generated keys and caches the result', async () => {
    const { service, store } = setup();
    const { key, record } = await service.generate('reporting');

    expect(await service.validate(key)).toEqual({ id: `db:${record.id}`, name: 'reporting', source: 'database' });
    expect(await service.validate(key)).toEqual({ id: `db:${record.id}`, name: 'reporting', source: 'database' });
    expect(store.touches).toEqual([record.id]);
  });

  it('checks the store every time when caching is off', async () => {
    const { service, store } = setup(0);
    const { key, record } = await service.generate('reporting');

    await service.validate(key);
    await service.validate(key);

    expect(store.touches).toEqual([record.id, record.id]);
  });

  it('rejects expired keys', async () => {
    const { service, clock } = setup(0);
    const { key } = await service.generate('short-lived', 1);

    clock.current = new Date(clock.current.getTime() + 2 * DAY_MS);

    expect(await service.validate(key)).toBeNull();
  });

  it('rejects a cached key once it has expired', async () => {
    const { service, store, clock } = setup(60000);
    const { key, record } = await service.generate('short-lived', 1);

    expect(await service.validate(key)).toEqual({ id: `db:${record.id}`, name: 'short-lived', source: 'database' });

    clock.current = new Date(clock.current.getTime() + 2 * DAY_MS);

    expect(await service.validate(key)).toBeNull();
    expect(store.touches).toEqual([record.id]);
  });

  it('rejects revoked keys even after they were cached', async () => {
    const { service } = setup();
    const { key, record } = await service.generate('temporary');
    await service.validate(key);

    expect(await service.revoke(record.id)).toBe(true);
    expect(await service.validate(key)).toBeNull();
    expect(await service.revoke(record.id)).toBe(false);
  });
});

describe('ApiKeyService.generate', () => {
  it('stores only the hash and a display prefix', async () => {
    const { service, store } = setup();
    const { key, record } = await service.generate('ci');

    expect(key).toMatch(/^hr_mcp_[A-Za-z0-9_-]{43}$/);
    expect(store.records[0].keyHash).toBe(ApiKeyService.hashKey(key));
    expect(record.keyPrefix).toBe(key.slice(0, 12));
    expect(ApiKeyService.mask(record)).toBe(`${key.slice(0, 12)}...`);
    expect(record.expiresAt).toEqual(new Date('2027-01-01T00:00:00Z'));
  });

  it('counts and lists stored keys', async () => {
    const { service } = setup();
    await service.generate('one');
    const { record } = await service.generate('two');
    await service.revoke(record.id);

    expect(await service.countActive()).toBe(1);
    expect((await service.list()).map(k => k.name)).toEqual(['one', 'two']);
  });

  it('requires a store', async () => {
    const service = new ApiKeyService({ store: null, envKeys: [], cacheTtlMs: 0 });

    expect(service.hasStore).toBe(false);
    await expect(service.generate('ci')).rejects.toBeInstanceOf(ConfigError);
    expect(await service.validate('anything')).toBeNull();
  });
});
