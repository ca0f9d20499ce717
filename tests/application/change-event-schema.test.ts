import { describe, it, expect } from 'vitest';
import { changeEventSchema } from '../../src/application/change-event-schema.js';

describe('changeEventSchema', () => {
  it('accepts a document with an id and keeps unknown fields', () => {
    const result = changeEventSchema.safeParse({
      id: 'a1',
      status: 'complete',
      procurementMethodType: 'rubble',
      doc_type: 'Auction',
      merchandisingObject: 'lot-1',
    });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.id).toBe('a1');
      expect(result.data['merchandisingObject']).toBe('lot-1');
    }
  });

  it('falls back to _id when id is absent', () => {
    const result = changeEventSchema.safeParse({ _id: 'a2', _rev: '1-x', status: 'complete' });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.id).toBe('a2');
    }
  });

  it('rejects a missing document', () => {
    expect(changeEventSchema.safeParse(undefined).success).toBe(false);
  });

  it('rejects a document without any identifier', () => {
    expect(changeEventSchema.safeParse({ status: 'complete' }).success).toBe(false);
  });

  it('rejects a non-string status', () => {
    expect(changeEventSchema.safeParse({ id: 'a3', status: 7 }).success).toBe(false);
  });
});
