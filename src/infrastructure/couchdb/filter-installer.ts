import type { AppLogger } from '../logging/index.js';
import type { DocumentStore, StoredDocument, TrackTypes } from '../../domain/index.js';
import {
  CONVOY_FEED_FILTER,
  FILTER_DOC_ID,
  renderConvoyFeedFilter,
} from '../../application/index.js';

interface FiltersDocument extends StoredDocument {
  filters: Record<string, string>;
}

function isFilterMap(value: unknown): value is Record<string, string> {
  return typeof value === 'object'
    && value !== null
    && Object.values(value).every((v) => typeof v === 'string');
}

/**
 * Publishes the convoy feed filter into the design document.
 *
 * Writes only when the stored predicate differs from the rendered one, so
 * it runs on every startup. Other filters in the same design document are
 * left untouched.
 *
 * @returns true when the design document was written.
 */
export async function pushFilterDoc(
  store: DocumentStore,
  tracks: TrackTypes,
  log: AppLogger,
): Promise<boolean> {
  const predicate = renderConvoyFeedFilter(tracks);
  const stored = await store.get(FILTER_DOC_ID);
  const storedFilters = stored?.['filters'];

  const doc: FiltersDocument = {
    ...stored,
    _id: FILTER_DOC_ID,
    filters: isFilterMap(storedFilters) ? { ...storedFilters } : {},
  };

  if (doc.filters[CONVOY_FEED_FILTER] === predicate) {
    log.info({ filter: CONVOY_FEED_FILTER }, 'Filter doc exists');
    return false;
  }

  doc.filters[CONVOY_FEED_FILTER] = predicate;
  await store.save(doc);
  log.info(
    { filter: CONVOY_FEED_FILTER, basic: tracks.basic, loki: tracks.loki },
    'Filter doc saved',
  );
  return true;
}
