import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { and, eq, gt, isNull, or } from 'drizzle-orm';
import type { AppLogger } from '../logging/index.js';
import type { DedupStore } from '../../domain/index.js';
import { CREATE_DEDUP_TABLE, dedupEntries } from './schema.js';

/**
 * Maps a store name to a database file. Names with an extension are used
 * as given, `:memory:` opens a private in-memory database.
 */
export function embeddedDatabasePath(name: string): string {
  if (name === ':memory:' || /\.[a-z0-9]+$/i.test(name)) return name;
  return `${name}.db`;
}

/**
 * Dedup store in a local SQLite file, for single-host deployments.
 *
 * better-sqlite3 is synchronous; the methods stay async to match the
 * Redis backend.
 */
export class SqliteDedupStore implements DedupStore {
  private readonly db: BetterSQLite3Database;

  constructor(
    private readonly sqlite: Database.Database,
    private readonly log: AppLogger,
    readonly description: string,
    private readonly now: () => number = Date.now,
  ) {
    this.sqlite.exec(CREATE_DEDUP_TABLE);
    this.db = drizzle(sqlite);
  }

  static open(name: string, log: AppLogger): SqliteDedupStore {
    const path = embeddedDatabasePath(name);
    return new SqliteDedupStore(new Database(path), log, `sqlite "${path}"`);
  }

  async has(key: string): Promise<boolean> {
    return this.live(key) !== undefined;
  }

  async get(key: string): Promise<string | undefined> {
    return this.live(key)?.value;
  }

  async put(key: string, value: string, ttlSeconds?: number): Promise<void> {
    this.log.info({ key }, 'Save ID in cache');
    const now = this.now();
    const expiresAt = ttlSeconds !== undefined ? now + ttlSeconds * 1000 : null;

    this.db
      .insert(dedupEntries)
      .values({ key, value, expires_at: expiresAt, created_at: now })
      .onConflictDoUpdate({
        target: dedupEntries.key,
        set: { value, expires_at: expiresAt, created_at: now },
      })
      .run();
  }

  async delete(key: string): Promise<boolean> {
    const result = this.db.delete(dedupEntries).where(eq(dedupEntries.key, key)).run();
    return result.changes > 0;
  }

  async close(): Promise<void> {
    this.sqlite.close();
  }

  private live(key: string): { value: string } | undefined {
    return this.db
      .select({ value: dedupEntries.value })
      .from(dedupEntries)
      .where(
        and(
          eq(dedupEntries.key, key),
          or(isNull(dedupEntries.expires_at), gt(dedupEntries.expires_at, this.now())),
        ),
      )
      .get();
  }
}
