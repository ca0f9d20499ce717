import { z } from 'zod';

const documentSchema = z
  .object({
    id: z.string().min(1),
    status: z.string().optional(),
    procurementMethodType: z.string().optional(),
    doc_type: z.string().optional(),
  })
  .passthrough();

/**
 * Zod schema for a document delivered by the change feed.
 *
 * Only the identifier is required; documents stored without an `id` field
 * take it from `_id`. The discriminators the feed filter matches on are
 * typed when present, every other field passes through.
 */
export const changeEventSchema = z.preprocess((doc) => {
  if (typeof doc === 'object' && doc !== null && !('id' in doc) && '_id' in doc) {
    return { ...doc, id: doc._id };
  }
  return doc;
}, documentSchema);
