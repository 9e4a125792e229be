/**
 * Canonical encoding utilities.
 *
 * @module encoding
 */

export {
  uriEncode,
  EncodedQuery,
  encodeQuery,
  renderQuery,
  canonicalQueryString,
} from './canonical.js';
export type { QueryPair, QueryOrdering } from './canonical.js';
