/**
 * Key/value store remembering which document ids were already delivered.
 *
 * Implementations differ in backing store only; callers never branch on
 * the backend.
 */
export interface DedupStore {
  /** Human-readable backend description for logs and status output. */
  readonly description: string;
  has(key: string): Promise<boolean>;
  get(key: string): Promise<string | undefined>;
  /** `ttlSeconds` expires the entry; omitted means it never expires. */
  put(key: string, value: string, ttlSeconds?: number): Promise<void>;
  /** Resolves true when an entry was removed. */
  delete(key: string): Promise<boolean>;
  close(): Promise<void>;
}

/** Value stored against an id once it has been processed. */
export const PROCESSED_MARKER = '1';
