import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';
import { ConfigurationError } from '../../domain/index.js';
import { CONVOY_FEED_FILTER_REF, DEFAULT_RETRY_POLICY } from '../../application/index.js';

const apiSchema = z.object({
  url: z.string().url(),
  token: z.string().min(1),
  version: z.string().min(1).default('2.5'),
});

const documentServiceSchema = z.object({
  url: z.string().url(),
  username: z.string().min(1),
  password: z.string(),
});

const resourceSectionSchema = z.object({
  api: apiSchema,
  ds: documentServiceSchema.optional(),
});

const couchDbSchema = z.object({
  host: z.string().min(1).default('localhost'),
  port: z.coerce.number().int().positive().default(5984),
  name: z.string().min(1),
  login: z.string().optional(),
  password: z.string().optional(),
});

/**
 * Dedup store settings as written in the file. The presence of `host`
 * selects the Redis backend; see `resolveDedupBackend`.
 */
const dedupStoreSchema = z.object({
  host: z.string().min(1).optional(),
  port: z.coerce.number().int().positive().optional(),
  name: z.union([z.string().min(1), z.number().int().nonnegative()]).optional(),
  password: z.string().optional(),
});

const feedSchema = z.object({
  /** Idle interval between empty polls, in seconds. */
  timeout: z.number().positive().default(10),
  limit: z.number().int().positive().max(10_000).default(100),
  filter: z.string().min(1).default(CONVOY_FEED_FILTER_REF),
  mode: z.enum(['continuous', 'once']).default('continuous'),
});

const retrySchema = z.object({
  max_attempts: z.number().int().positive().default(DEFAULT_RETRY_POLICY.maxAttempts),
  base_delay_ms: z.number().int().nonnegative().default(DEFAULT_RETRY_POLICY.baseDelayMs),
  max_delay_ms: z.number().int().nonnegative().default(DEFAULT_RETRY_POLICY.maxDelayMs),
});

const statusServerSchema = z.object({
  enabled: z.boolean().default(false),
  host: z.string().default('0.0.0.0'),
  port: z.number().int().positive().default(8080),
});

export const configSchema = z.object({
  db: couchDbSchema,
  auctions_mapping: dedupStoreSchema.default({}),
  auctions: resourceSectionSchema.optional(),
  lots: resourceSectionSchema.optional(),
  assets: resourceSectionSchema.optional(),
  contracts: resourceSectionSchema.optional(),
  auction_types: z
    .object({
      basic: z.array(z.string().min(1)).default([]),
      loki: z.array(z.string().min(1)).default([]),
    })
    .default({}),
  feed: feedSchema.default({}),
  retry: retrySchema.default({}),
  status_server: statusServerSchema.default({}),
});

export type ConvoyConfig = z.infer<typeof configSchema>;
export type CouchDbSettings = ConvoyConfig['db'];
export type DedupStoreSettings = ConvoyConfig['auctions_mapping'];
export type ResourceSection = z.infer<typeof resourceSectionSchema>;

/**
 * Validates a raw configuration object, filling defaults.
 * Every zod issue is listed in the thrown error.
 */
export function parseConfig(raw: unknown): ConvoyConfig {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${issues}`);
  }
  return result.data;
}

/**
 * Loads and validates the JSON configuration file.
 *
 * Path resolution: explicit argument, then `CONFIG_PATH`, then
 * `config/convoy.json` under the working directory.
 */
export function loadConfig(configPath?: string): ConvoyConfig {
  const filePath = configPath
    ?? process.env['CONFIG_PATH']
    ?? resolve(process.cwd(), 'config', 'convoy.json');

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (err: unknown) {
    throw new ConfigurationError(`Cannot read configuration file ${filePath}`, { cause: err });
  }

  return parseConfig(raw);
}
