import { Redis } from 'ioredis';
import type { AppLogger } from '../logging/index.js';
import type { DedupStore } from '../../domain/index.js';
import { ConfigurationError, PROCESSED_MARKER } from '../../domain/index.js';
import type { DedupStoreSettings } from '../config/index.js';
import { RedisDedupStore } from './redis-dedup-store.js';
import { SqliteDedupStore } from './sqlite-dedup-store.js';

export const DEFAULT_REDIS_PORT = 6379;
export const DEFAULT_EMBEDDED_NAME = 'auctions_mapping';

/** Backend chosen once from the settings. */
export type DedupBackend =
  | {
    readonly kind: 'networked';
    readonly host: string;
    readonly port: number;
    readonly db: number;
    readonly password?: string | undefined;
  }
  | {
    readonly kind: 'embedded';
    readonly name: string;
  };

/**
 * Resolves the settings into a backend variant: `host` present means Redis,
 * where `name` selects the database index; otherwise `name` names the
 * embedded database.
 */
export function resolveDedupBackend(settings: DedupStoreSettings): DedupBackend {
  if (settings.host === undefined) {
    return { kind: 'embedded', name: String(settings.name ?? DEFAULT_EMBEDDED_NAME) };
  }

  const db = settings.name === undefined ? 0 : Number(settings.name);
  if (!Number.isInteger(db) || db < 0) {
    throw new ConfigurationError(
      `Redis database selector must be a non-negative integer, got "${String(settings.name)}"`,
    );
  }

  return {
    kind: 'networked',
    host: settings.host,
    port: settings.port ?? DEFAULT_REDIS_PORT,
    db,
    password: settings.password || undefined,
  };
}

/** Builds the store for a backend. Redis connects before returning. */
export async function createDedupStore(backend: DedupBackend, log: AppLogger): Promise<DedupStore> {
  switch (backend.kind) {
    case 'networked': {
      const redis = new Redis({
        host: backend.host,
        port: backend.port,
        db: backend.db,
        password: backend.password,
        lazyConnect: true,
        enableReadyCheck: true,
        maxRetriesPerRequest: 3,
      });
      try {
        await redis.connect();
      } catch (err: unknown) {
        redis.disconnect();
        throw err;
      }
      const description = `redis "${backend.db}" at ${backend.host}:${backend.port}`;
      log.info({ host: backend.host, port: backend.port, db: backend.db }, 'Set redis store as auctions mapping');
      return new RedisDedupStore(redis, log, description);
    }
    case 'embedded': {
      const store = SqliteDedupStore.open(backend.name, log);
      log.info({ name: backend.name }, 'Set embedded store as auctions mapping');
      return store;
    }
  }
}

const SELF_CHECK_KEY = 'test';

/**
 * Round-trips a sentinel key through the store: absent after delete,
 * present with the written value after put.
 */
export async function selfCheckDedupStore(store: DedupStore): Promise<void> {
  const fail = (step: string): never => {
    throw new ConfigurationError(`Dedup store self-check failed on ${store.description}: ${step}`);
  };

  await store.put(SELF_CHECK_KEY, PROCESSED_MARKER);
  if (!(await store.has(SELF_CHECK_KEY))) fail('key missing after put');
  if ((await store.get(SELF_CHECK_KEY)) !== PROCESSED_MARKER) fail('value mismatch after put');
  await store.delete(SELF_CHECK_KEY);
  if (await store.has(SELF_CHECK_KEY)) fail('key still present after delete');
}

export interface PrepareDedupOptions {
  readonly check?: boolean;
  /** Replaces `createDedupStore`, used by tests. */
  readonly create?: (backend: DedupBackend, log: AppLogger) => Promise<DedupStore>;
}

/**
 * Opens the dedup store that tracks processed ids, optionally verifying it.
 * Any failure is a `ConfigurationError`.
 */
export async function prepareDedupStore(
  settings: DedupStoreSettings,
  log: AppLogger,
  options: PrepareDedupOptions = {},
): Promise<DedupStore> {
  const backend = resolveDedupBackend(settings);
  const create = options.create ?? createDedupStore;

  let store: DedupStore;
  try {
    store = await create(backend, log);
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`Cannot open ${backend.kind} dedup store: ${reason}`, { cause: err });
  }

  if (options.check) {
    try {
      await selfCheckDedupStore(store);
    } catch (err: unknown) {
      await store.close().catch((closeErr: unknown) => {
        log.warn({ err: closeErr }, 'Failed to close dedup store after self-check');
      });
      if (err instanceof ConfigurationError) throw err;
      const reason = err instanceof Error ? err.message : String(err);
      throw new ConfigurationError(`Dedup store self-check failed on ${store.description}: ${reason}`, { cause: err });
    }
  }
  return store;
}
