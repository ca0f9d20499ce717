import type { TrackTypes } from '../domain/index.js';

export const FILTER_DOC_ID = '_design/auction_filters';
export const CONVOY_FEED_FILTER = 'convoy_feed';

/** Filter reference used by the changes query: `<design doc>/<filter>`. */
export const CONVOY_FEED_FILTER_REF = `${FILTER_DOC_ID.slice('_design/'.length)}/${CONVOY_FEED_FILTER}`;

/**
 * Renders the server-side predicate for the convoy feed.
 *
 * Basic-track auctions qualify on `pending.verification`, or on a terminal
 * status once they carry a merchandising object. Loki-track auctions
 * qualify only on the latter.
 */
export function renderConvoyFeedFilter(tracks: TrackTypes): string {
  const basic = JSON.stringify(tracks.basic);
  const loki = JSON.stringify(tracks.loki);

  return `function(doc, req) {
  if (doc.doc_type !== 'Auction') return false;
  var terminal = ['complete', 'cancelled', 'unsuccessful'].indexOf(doc.status) >= 0;
  if (${basic}.indexOf(doc.procurementMethodType) >= 0) {
    return doc.status === 'pending.verification' || (terminal && !!doc.merchandisingObject);
  }
  if (${loki}.indexOf(doc.procurementMethodType) >= 0) {
    return terminal && !!doc.merchandisingObject;
  }
  return false;
}`;
}
