import type { AppLogger } from '../logging/index.js';
import { z } from 'zod';
import type {
  ChangesBatch,
  ChangesQuery,
  DocumentStore,
  StoredDocument,
} from '../../domain/index.js';
import { ConfigurationError, RequestFailed, errorFromStatus } from '../../domain/index.js';
import type { CouchDbSettings } from '../config/index.js';

type Fetch = typeof fetch;

const cursorSchema = z.union([z.string(), z.number()]);

const changesResponseSchema = z.object({
  results: z.array(
    z.object({
      seq: cursorSchema,
      id: z.string(),
      deleted: z.boolean().optional(),
      doc: z.record(z.string(), z.unknown()).optional(),
    }),
  ),
  last_seq: cursorSchema,
});

const storedDocumentSchema = z
  .object({
    _id: z.string(),
    _rev: z.string().optional(),
  })
  .passthrough();

const saveResponseSchema = z.object({
  id: z.string(),
  rev: z.string(),
});

/** `_design/x` keeps its slash; every other id is a single path segment. */
function documentPath(id: string): string {
  if (id.startsWith('_design/')) {
    return `_design/${encodeURIComponent(id.slice('_design/'.length))}`;
  }
  return encodeURIComponent(id);
}

function basicAuth(login: string, password: string): string {
  return `Basic ${Buffer.from(`${login}:${password}`).toString('base64')}`;
}

/**
 * Minimal CouchDB database handle over the HTTP API.
 *
 * Non-2xx responses become `UpstreamApiError` subclasses; a request that
 * never reaches the server becomes `RequestFailed` with status 503 so the
 * retry classifier treats it as transient.
 */
export class CouchDatabase implements DocumentStore {
  private readonly headers: Record<string, string>;

  constructor(
    readonly serverUrl: string,
    readonly name: string,
    credentials?: { login: string; password: string },
    private readonly fetchImpl: Fetch = fetch,
  ) {
    this.headers = {
      Accept: 'application/json',
      'Content-Type': 'application/json',
    };
    if (credentials) {
      this.headers['Authorization'] = basicAuth(credentials.login, credentials.password);
    }
  }

  get databaseUrl(): string {
    return `${this.serverUrl}/${encodeURIComponent(this.name)}`;
  }

  async get(id: string): Promise<StoredDocument | undefined> {
    const response = await this.request('GET', `${this.databaseUrl}/${documentPath(id)}`);
    if (response.status === 404) {
      await response.body?.cancel();
      return undefined;
    }
    return storedDocumentSchema.parse(await this.readBody(response, `GET ${id}`));
  }

  async save(doc: StoredDocument): Promise<{ id: string; rev: string }> {
    const response = await this.request(
      'PUT',
      `${this.databaseUrl}/${documentPath(doc._id)}`,
      JSON.stringify(doc),
    );
    const saved = saveResponseSchema.parse(await this.readBody(response, `PUT ${doc._id}`));
    doc._rev = saved.rev;
    return saved;
  }

  async changes(query: ChangesQuery): Promise<ChangesBatch> {
    const params = new URLSearchParams({
      since: String(query.since),
      limit: String(query.limit),
      filter: query.filter,
      include_docs: String(query.includeDocs),
    });
    const response = await this.request('GET', `${this.databaseUrl}/_changes?${params.toString()}`);
    return changesResponseSchema.parse(await this.readBody(response, 'GET _changes'));
  }

  /** Resolves true when the database exists, false on 404. */
  async exists(): Promise<boolean> {
    const response = await this.request('HEAD', this.databaseUrl);
    if (response.status === 404) return false;
    if (!response.ok) {
      throw errorFromStatus(response.status, `HEAD ${this.name} failed with ${response.status}`);
    }
    return true;
  }

  /** Creates the database. A concurrent creation (412) counts as success. */
  async create(): Promise<void> {
    const response = await this.request('PUT', this.databaseUrl);
    if (response.status === 412) return;
    await this.readBody(response, `PUT ${this.name}`);
  }

  private async request(method: string, url: string, body?: string): Promise<Response> {
    try {
      return await this.fetchImpl(url, { method, headers: this.headers, body });
    } catch (err: unknown) {
      throw new RequestFailed(`${method} ${url} could not reach the server`, 503, undefined, { cause: err });
    }
  }

  private async readBody(response: Response, context: string): Promise<unknown> {
    const text = await response.text();
    let body: unknown = text;
    if (text !== '') {
      try {
        body = JSON.parse(text);
      } catch {
        body = text;
      }
    }

    if (!response.ok) {
      throw errorFromStatus(response.status, `${context} failed with ${response.status}`, body);
    }
    return body;
  }
}

/** `http://host:port`, credentials are sent as a header, never in the URL. */
export function couchServerUrl(settings: CouchDbSettings): string {
  return `http://${settings.host}:${settings.port}`;
}

/**
 * Opens the configured database, creating it when missing.
 *
 * Any failure here means the process cannot run, so it surfaces as a
 * `ConfigurationError`.
 */
export async function prepareCouchDb(
  settings: CouchDbSettings,
  log: AppLogger,
  fetchImpl: Fetch = fetch,
): Promise<CouchDatabase> {
  const serverUrl = couchServerUrl(settings);
  let credentials: { login: string; password: string } | undefined;
  if (settings.login && settings.password) {
    credentials = { login: settings.login, password: settings.password };
    log.info({ url: serverUrl }, 'couchdb - authorized');
  } else {
    log.info({ url: serverUrl }, 'couchdb without user');
  }

  const db = new CouchDatabase(serverUrl, settings.name, credentials, fetchImpl);
  try {
    if (!(await db.exists())) {
      await db.create();
      log.info({ db: settings.name }, 'Database created');
    }
  } catch (err: unknown) {
    log.error({ err, db: settings.name }, 'Database error');
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`Cannot open database "${settings.name}": ${reason}`, { cause: err });
  }
  return db;
}
