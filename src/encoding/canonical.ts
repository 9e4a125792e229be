/**
 * Canonical Encoding
 *
 * RFC 3986 percent-encoding and query string rendering used by both the
 * request URL and the SigV4 canonical request.
 *
 * @see https://docs.aws.amazon.com/IAM/latest/UserGuide/create-signed-request.html
 */

/**
 * A query parameter as supplied by the caller, not yet encoded.
 */
export type QueryPair = readonly [name: string, value: string];

/**
 * How rendered pairs are ordered.
 *
 * - `insertion`: keep the order pairs were added in
 * - `sorted`: byte order by encoded name, then by encoded value (SigV4)
 */
export type QueryOrdering = 'insertion' | 'sorted';

const encoder = new TextEncoder();

function isUnreserved(byte: number): boolean {
  return (
    (byte >= 0x41 && byte <= 0x5a) || // A-Z
    (byte >= 0x61 && byte <= 0x7a) || // a-z
    (byte >= 0x30 && byte <= 0x39) || // 0-9
    byte === 0x2d || // -
    byte === 0x5f || // _
    byte === 0x2e || // .
    byte === 0x7e // ~
  );
}

/**
 * URI encode a string for AWS Signature V4.
 *
 * Every UTF-8 byte other than an unreserved character is escaped as `%XX`
 * with uppercase hex. Space becomes `%20`, never `+`. Lone surrogates are
 * encoded as U+FFFD, so the function accepts any string.
 *
 * @param input - String to encode
 * @param encodeSlash - Whether to encode forward slashes (default: true)
 *
 * @example
 * ```typescript
 * uriEncode('hello world'); // 'hello%20world'
 * uriEncode('path/to/file', false); // 'path/to/file'
 * uriEncode('café'); // 'caf%C3%A9'
 * ```
 */
export function uriEncode(input: string, encodeSlash: boolean = true): string {
  let out = '';
  for (const byte of encoder.encode(input)) {
    if (isUnreserved(byte) || (!encodeSlash && byte === 0x2f)) {
      out += String.fromCharCode(byte);
    } else {
      out += `%${byte.toString(16).toUpperCase().padStart(2, '0')}`;
    }
  }
  return out;
}

function compareBytes(a: string, b: string): number {
  // Encoded strings are ASCII, so code unit order is byte order
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Query parameters that have been percent-encoded exactly once.
 *
 * Only {@link EncodedQuery.encode} builds one, so rendering never encodes a
 * second time and raw pairs cannot be rendered by mistake.
 */
export class EncodedQuery {
  private constructor(private readonly pairs: ReadonlyArray<QueryPair>) {}

  /**
   * Encode each name and value of `pairs`. Duplicate names are kept.
   */
  static encode(pairs: Iterable<QueryPair>): EncodedQuery {
    const encoded: QueryPair[] = [];
    for (const [name, value] of pairs) {
      encoded.push([uriEncode(name), uriEncode(value)]);
    }
    return new EncodedQuery(encoded);
  }

  get size(): number {
    return this.pairs.length;
  }

  /**
   * Encoded pairs in insertion order.
   */
  entries(): ReadonlyArray<QueryPair> {
    return this.pairs;
  }

  /**
   * Join pairs as `name=value` separated by `&`. Empty input renders `''`.
   */
  render(ordering: QueryOrdering = 'insertion'): string {
    const pairs = ordering === 'sorted' ? [...this.pairs].sort(comparePairs) : this.pairs;
    return pairs.map(([name, value]) => `${name}=${value}`).join('&');
  }
}

function comparePairs(a: QueryPair, b: QueryPair): number {
  return compareBytes(a[0], b[0]) || compareBytes(a[1], b[1]);
}

/**
 * Percent-encode query pairs once.
 */
export function encodeQuery(pairs: Iterable<QueryPair>): EncodedQuery {
  return EncodedQuery.encode(pairs);
}

/**
 * Render already-encoded query pairs.
 */
export function renderQuery(query: EncodedQuery, ordering: QueryOrdering = 'insertion'): string {
  return query.render(ordering);
}

/**
 * Create the canonical query string for SigV4.
 *
 * @example
 * ```typescript
 * canonicalQueryString([['foo', 'bar'], ['baz', 'a b']]); // 'baz=a%20b&foo=bar'
 * canonicalQueryString([]); // ''
 * ```
 */
export function canonicalQueryString(pairs: Iterable<QueryPair>): string {
  return encodeQuery(pairs).render('sorted');
}
