import { describe, it, expect, vi } from 'vitest';
import Database from 'better-sqlite3';
import {
  prepareDedupStore,
  resolveDedupBackend,
  selfCheckDedupStore,
} from '../../src/infrastructure/dedup/dedup-factory.js';
import { SqliteDedupStore } from '../../src/infrastructure/dedup/sqlite-dedup-store.js';
import { ConfigurationError } from '../../src/domain/index.js';
import type { DedupStore } from '../../src/domain/index.js';
import { fakeLogger } from '../helpers.js';

function memoryStore(): SqliteDedupStore {
  return new SqliteDedupStore(new Database(':memory:'), fakeLogger(), 'sqlite ":memory:"');
}

/** Store whose put silently drops writes. */
function forgetfulStore(): DedupStore {
  return {
    description: 'forgetful',
    has: vi.fn().mockResolvedValue(false),
    get: vi.fn().mockResolvedValue(undefined),
    put: vi.fn().mockResolvedValue(undefined),
    delete: vi.fn().mockResolvedValue(false),
    close: vi.fn().mockResolvedValue(undefined),
  };
}

describe('resolveDedupBackend', () => {
  it('defaults to the embedded store named auctions_mapping', () => {
    expect(resolveDedupBackend({})).toEqual({ kind: 'embedded', name: 'auctions_mapping' });
  });

  it('uses the configured embedded name', () => {
    expect(resolveDedupBackend({ name: 'processed' })).toEqual({ kind: 'embedded', name: 'processed' });
  });

  it('selects redis when a host is present, with defaults', () => {
    expect(resolveDedupBackend({ host: 'cache' })).toEqual({
      kind: 'networked',
      host: 'cache',
      port: 6379,
      db: 0,
      password: undefined,
    });
  });

  it('reads the redis database index from name', () => {
    expect(resolveDedupBackend({ host: 'cache', port: 6380, name: '3', password: 'test-secret' })).toEqual({
      kind: 'networked',
      host: 'cache',
      port: 6380,
      db: 3,
      password: 'test-secret',
    });
    expect(resolveDedupBackend({ host: 'cache', name: 5 })).toMatchObject({ db: 5 });
  });

  it('rejects a non-numeric redis database selector', () => {
    expect(() => resolveDedupBackend({ host: 'cache', name: 'auctions_mapping' })).toThrow(ConfigurationError);
  });
});

describe('selfCheckDedupStore', () => {
  it('passes on a working store and leaves no sentinel behind', async () => {
    const store = memoryStore();

    await expect(selfCheckDedupStore(store)).resolves.toBeUndefined();
    expect(await store.has('test')).toBe(false);

    await store.close();
  });

  it('fails when the sentinel is not stored', async () => {
    await expect(selfCheckDedupStore(forgetfulStore())).rejects.toThrow(
      'Dedup store self-check failed on forgetful: key missing after put',
    );
  });

  it('fails when the sentinel value differs', async () => {
    const store = forgetfulStore();
    vi.mocked(store.has).mockResolvedValue(true);
    vi.mocked(store.get).mockResolvedValue('0');

    await expect(selfCheckDedupStore(store)).rejects.toThrow('value mismatch after put');
  });

  it('fails when delete does not remove the sentinel', async () => {
    const store = forgetfulStore();
    vi.mocked(store.has).mockResolvedValue(true);
    vi.mocked(store.get).mockResolvedValue('1');

    await expect(selfCheckDedupStore(store)).rejects.toThrow('key still present after delete');
  });
});

describe('prepareDedupStore', () => {
  it('returns the created store after a passing self-check', async () => {
    const store = memoryStore();
    const create = vi.fn().mockResolvedValue(store);

    const prepared = await prepareDedupStore({}, fakeLogger(), { check: true, create });

    expect(prepared).toBe(store);
    expect(create).toHaveBeenCalledWith({ kind: 'embedded', name: 'auctions_mapping' }, expect.anything());
    await store.close();
  });

  it('skips the self-check unless asked', async () => {
    const store = forgetfulStore();

    await expect(prepareDedupStore({}, fakeLogger(), { create: async () => store })).resolves.toBe(store);
    expect(store.put).not.toHaveBeenCalled();
  });

  it('wraps backend construction failures', async () => {
    const create = vi.fn().mockRejectedValue(new Error('ECONNREFUSED'));

    const err = await prepareDedupStore({ host: 'cache' }, fakeLogger(), { create }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ConfigurationError);
    expect((err as Error).message).toBe('Cannot open networked dedup store: ECONNREFUSED');
  });

  it('closes the store and raises when the self-check fails', async () => {
    const store = forgetfulStore();

    await expect(
      prepareDedupStore({}, fakeLogger(), { check: true, create: async () => store }),
    ).rejects.toBeInstanceOf(ConfigurationError);
    expect(store.close).toHaveBeenCalledTimes(1);
  });

  it('wraps backend errors raised during the self-check', async () => {
    const store = forgetfulStore();
    vi.mocked(store.put).mockRejectedValue(new Error('READONLY'));

    const err = await prepareDedupStore({}, fakeLogger(), { check: true, create: async () => store })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ConfigurationError);
    expect((err as Error).message).toBe('Dedup store self-check failed on forgetful: READONLY');
  });
});
