import { sqliteTable, text, integer } from 'drizzle-orm/sqlite-core';

/**
 * Drizzle schema for the embedded dedup table.
 *
 * `expires_at` is epoch milliseconds; NULL means the entry never expires.
 */
export const dedupEntries = sqliteTable('dedup_entries', {
  key: text('key').primaryKey(),
  value: text('value').notNull(),
  expires_at: integer('expires_at'),
  created_at: integer('created_at').notNull(),
});

export const CREATE_DEDUP_TABLE = `
  CREATE TABLE IF NOT EXISTS dedup_entries (
    key        TEXT    PRIMARY KEY,
    value      TEXT    NOT NULL,
    expires_at INTEGER,
    created_at INTEGER NOT NULL
  )
`;
