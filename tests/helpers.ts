import { vi } from 'vitest';
import type {
  ChangeRow,
  ChangesBatch,
  ChangesQuery,
  Cursor,
  DocumentStore,
  StoredDocument,
} from '../src/domain/index.js';
import type { AppLogger } from '../src/infrastructure/logging/index.js';

/** Minimal fake logger. */
export function fakeLogger() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    check: vi.fn(),
  } as unknown as AppLogger;
}

let counter = 0;

/** Change row carrying an auction document; override any doc field. */
export function makeRow(seq: Cursor, doc: Record<string, unknown> = {}): ChangeRow {
  counter++;
  const id = typeof doc['id'] === 'string' ? doc['id'] : `auction-${counter}`;
  return {
    seq,
    id,
    doc: {
      _id: id,
      id,
      doc_type: 'Auction',
      status: 'pending.verification',
      procurementMethodType: 'rubble',
      ...doc,
    },
  };
}

type ScriptedPoll = ChangesBatch | Error;

/**
 * In-memory document store. `changes` replays scripted polls in order and
 * keeps returning the last cursor with no results once the script runs out.
 */
export class FakeDocumentStore implements DocumentStore {
  readonly name = 'fake';
  readonly docs = new Map<string, StoredDocument>();
  readonly queries: ChangesQuery[] = [];
  saves = 0;
  private revision = 0;
  private lastSeq: Cursor = 0;

  constructor(private readonly script: ScriptedPoll[] = []) {}

  async get(id: string): Promise<StoredDocument | undefined> {
    const doc = this.docs.get(id);
    return doc === undefined ? undefined : structuredClone(doc);
  }

  async save(doc: StoredDocument): Promise<{ id: string; rev: string }> {
    this.saves++;
    this.revision++;
    const rev = `${this.revision}-fake`;
    doc._rev = rev;
    this.docs.set(doc._id, structuredClone(doc));
    return { id: doc._id, rev };
  }

  async changes(query: ChangesQuery): Promise<ChangesBatch> {
    this.queries.push(query);
    const next = this.script.shift();
    if (next instanceof Error) throw next;
    if (next === undefined) return { results: [], last_seq: this.lastSeq };
    this.lastSeq = next.last_seq;
    return next;
  }
}

/** In-memory stand-in for the ioredis commands the dedup store uses. */
export function fakeRedis() {
  const data = new Map<string, string>();
  const ttls = new Map<string, number>();
  return {
    data,
    ttls,
    exists: vi.fn(async (key: string) => (data.has(key) ? 1 : 0)),
    get: vi.fn(async (key: string) => data.get(key) ?? null),
    set: vi.fn(async (key: string, value: string, mode?: string, ttl?: number) => {
      data.set(key, value);
      if (mode === 'EX' && ttl !== undefined) ttls.set(key, ttl);
      return 'OK';
    }),
    del: vi.fn(async (key: string) => (data.delete(key) ? 1 : 0)),
    quit: vi.fn(async () => 'OK'),
  };
}
