import type { ChangeEvent } from '../domain/index.js';

export interface DerivedRecord {
  relatedProcessID: string;
  merchandisingObject?: unknown;
  contractType?: unknown;
  mode?: 'test';
  [field: string]: unknown;
}

/**
 * Builds the downstream record linked to an event. Only the linkage fields
 * are set here; callers merge in whatever domain fields they need.
 */
export function buildDerivedRecord(event: ChangeEvent): DerivedRecord {
  const record: DerivedRecord = { relatedProcessID: event.id };
  if (event['merchandisingObject'] !== undefined) {
    record.merchandisingObject = event['merchandisingObject'];
  }
  const terms = event['contractTerms'];
  if (typeof terms === 'object' && terms !== null && 'type' in terms && terms.type !== undefined) {
    record.contractType = terms.type;
  }
  if (event['mode'] !== undefined) {
    record.mode = 'test';
  }
  return record;
}
