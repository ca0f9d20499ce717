import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import { ConfigurationError } from './domain/index.js';
import type { DedupStore } from './domain/index.js';
import { FeedState, buildDerivedRecord } from './application/index.js';
import type { RetryPolicy } from './application/index.js';
import {
  loadConfig,
  createLogger,
  initClients,
  getClientFromResourceType,
  pushFilterDoc,
  continuousChangesFeed,
  processChangeFeed,
} from './infrastructure/index.js';
import type { DerivedRecordHandler } from './infrastructure/index.js';
import { statusRoutes } from './interfaces/http/index.js';

/**
 * Standalone worker: follows the auctions change feed and creates one
 * contract per newly qualifying auction.
 *
 * A single instance per feed. Restarts replay the feed from the origin;
 * the dedup store keeps already-handled auctions from being processed
 * twice.
 */
const logLevel = process.env['LOG_LEVEL'] ?? 'info';
const log = createLogger(logLevel);

// Abort controller for graceful shutdown
const ac = new AbortController();

let dedup: DedupStore | undefined;
let statusServer: FastifyInstance | undefined;

async function main(): Promise<void> {
  const config = loadConfig();
  const retry: RetryPolicy = {
    maxAttempts: config.retry.max_attempts,
    baseDelayMs: config.retry.base_delay_ms,
    maxDelayMs: config.retry.max_delay_ms,
  };

  const { clients, outcomes } = await initClients(config, log);
  dedup = clients.auctions_mapping;

  const contracts = getClientFromResourceType(clients, 'contract');

  const state = new FeedState();
  state.setResources(outcomes);

  if (config.status_server.enabled) {
    statusServer = Fastify({ logger: { level: logLevel } });
    await statusServer.register(statusRoutes, { state });
    await statusServer.listen({ host: config.status_server.host, port: config.status_server.port });
  }

  await pushFilterDoc(clients.db, config.auction_types, log);

  const handle: DerivedRecordHandler = async (event) => {
    const created = await contracts.create(buildDerivedRecord(event));
    log.info({ id: event.id, contract: created['id'] }, 'Contract created');
  };

  const events = continuousChangesFeed(clients.db, ac.signal, log, {
    mode: config.feed.mode,
    limit: config.feed.limit,
    filter: config.feed.filter,
    idleMs: config.feed.timeout * 1000,
    retry,
    onPoll: (cursor) => state.recordPoll(cursor),
  });

  await processChangeFeed(events, {
    dedup: clients.auctions_mapping,
    log,
    handle,
    signal: ac.signal,
    retry,
    state,
  });
}

async function cleanup(): Promise<void> {
  await statusServer?.close().catch((err: unknown) => {
    log.warn({ err }, 'Failed to close status server');
  });
  await dedup?.close().catch((err: unknown) => {
    log.warn({ err }, 'Failed to close dedup store');
  });
}

// Graceful shutdown on SIGINT / SIGTERM: the feed finishes its current
// batch, then main() returns.
function shutdown(): void {
  if (ac.signal.aborted) return;
  log.info('Shutting down worker...');
  ac.abort();
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

main()
  .then(async () => {
    await cleanup();
    log.info('Worker stopped');
    process.exit(0);
  })
  .catch(async (err: unknown) => {
    log.fatal({ err }, err instanceof ConfigurationError ? 'Worker misconfigured' : 'Worker crashed');
    await cleanup();
    process.exit(1);
  });
