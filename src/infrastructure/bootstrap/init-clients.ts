import type { DedupStore, DocumentStore, ResourceOutcome } from '../../domain/index.js';
import { ConfigurationError } from '../../domain/index.js';
import type { ConvoyConfig, CouchDbSettings, DedupStoreSettings, ResourceSection } from '../config/index.js';
import type { AppLogger } from '../logging/index.js';
import { logCheck } from '../logging/index.js';
import { prepareCouchDb } from '../couchdb/index.js';
import { prepareDedupStore } from '../dedup/index.js';
import { ResourceClient, RESOURCE_TYPES } from '../upstream/index.js';
import type { ResourceType } from '../upstream/index.js';

export type ResourceClients = Partial<Record<`${ResourceType}s_client`, ResourceClient>>;

const sectionKey = (type: ResourceType) => `${type}s` as const;
const clientKey = (type: ResourceType) => `${type}s_client` as const;

export interface Clients extends ResourceClients {
  readonly db: DocumentStore;
  readonly auctions_mapping: DedupStore;
}

export interface BootstrapResult {
  readonly clients: Clients;
  readonly outcomes: readonly ResourceOutcome[];
}

/** Constructors for each resource, replaceable in tests. */
export interface ClientFactories {
  createResourceClient(type: ResourceType, section: ResourceSection): ResourceClient;
  prepareDocumentStore(settings: CouchDbSettings, log: AppLogger): Promise<DocumentStore>;
  prepareDedupStore(settings: DedupStoreSettings, log: AppLogger): Promise<DedupStore>;
}

export const defaultClientFactories: ClientFactories = {
  createResourceClient: (type, section) => new ResourceClient(type, section),
  prepareDocumentStore: (settings, log) => prepareCouchDb(settings, log),
  prepareDedupStore: (settings, log) => prepareDedupStore(settings, log, { check: true }),
};

/**
 * Builds every client the worker needs.
 *
 * Each resource is attempted even when an earlier one failed, and each
 * outcome is logged at the `check` level. Only then, if anything failed,
 * the first failure is rethrown.
 */
export async function initClients(
  config: ConvoyConfig,
  log: AppLogger,
  factories: ClientFactories = defaultClientFactories,
): Promise<BootstrapResult> {
  const outcomes: ResourceOutcome[] = [];
  const resourceClients: ResourceClients = {};

  const attempt = async <T>(resource: string, build: () => T | Promise<T>): Promise<T | undefined> => {
    try {
      const value = await build();
      outcomes.push({ resource, status: 'ok' });
      logCheck(log, `${resource} - ok`);
      return value;
    } catch (err: unknown) {
      outcomes.push({ resource, status: 'failed', error: err });
      logCheck(log, `${resource} - failed`, err);
      return undefined;
    }
  };

  const sections = RESOURCE_TYPES.filter((type) => config[sectionKey(type)] !== undefined);
  log.info({ sections: sections.map(sectionKey) }, 'Clients for such resources will be initialized');

  for (const type of sections) {
    const section = config[sectionKey(type)];
    if (section === undefined) continue;
    const client = await attempt(clientKey(type), () => factories.createResourceClient(type, section));
    if (client) resourceClients[clientKey(type)] = client;
  }

  if (!resourceClients.auctions_client?.hasDocumentService) {
    log.warn('Document Service configuration is not available.');
  }

  const db = await attempt('couchdb', () => factories.prepareDocumentStore(config.db, log));
  const dedup = await attempt('auctions_mapping', () => factories.prepareDedupStore(config.auctions_mapping, log));

  const firstFailure = outcomes.find((o) => o.status === 'failed');
  if (firstFailure !== undefined || db === undefined || dedup === undefined) {
    // Release what did come up before bailing out.
    await dedup?.close().catch((err: unknown) => {
      log.warn({ err }, 'Failed to close dedup store during bootstrap abort');
    });
    throw firstFailure?.error ?? new ConfigurationError('Bootstrap failed');
  }

  return {
    clients: { ...resourceClients, db, auctions_mapping: dedup },
    outcomes,
  };
}

/** Resolves `<type>s_client`, e.g. `contract` to the contracts client. */
export function getClientFromResourceType(clients: ResourceClients, type: ResourceType): ResourceClient {
  const client = clients[clientKey(type)];
  if (client === undefined) {
    throw new ConfigurationError(`No client configured for resource type "${type}"`);
  }
  return client;
}
