/**
 * AWS Canonical Request Building
 *
 * Functions for creating canonical requests according to AWS Signature V4 specification.
 *
 * @see https://docs.aws.amazon.com/IAM/latest/UserGuide/create-signed-request.html
 */

import type { HeaderPair } from '../http/types.js';
import type { CanonicalRequest } from './types.js';

/**
 * Header names never included in the signature.
 */
const UNSIGNED_HEADERS = new Set(['authorization']);

/**
 * Create canonical headers string and signed headers list.
 *
 * AWS requirements:
 * - Convert header names to lowercase
 * - Sort headers by name
 * - Trim whitespace from header values and collapse inner runs to one space
 * - Join repeated headers with commas, in the order they were added
 *
 * @example
 * ```typescript
 * const result = canonicalHeaders([
 *   ['Host', 'logs.us-east-1.amazonaws.com'],
 *   ['X-Amz-Date', '20231201T120000Z'],
 * ]);
 * // result.canonical: 'host:logs.us-east-1.amazonaws.com\nx-amz-date:20231201T120000Z\n'
 * // result.signed: 'host;x-amz-date'
 * ```
 */
export function canonicalHeaders(headers: ReadonlyArray<HeaderPair>): {
  canonical: string;
  signed: string;
} {
  const headerMap = new Map<string, string>();

  for (const [name, value] of headers) {
    const lowerName = name.trim().toLowerCase();
    if (UNSIGNED_HEADERS.has(lowerName)) {
      continue;
    }

    const normalizedValue = value.trim().replace(/\s+/g, ' ');
    const existing = headerMap.get(lowerName);
    headerMap.set(lowerName, existing === undefined ? normalizedValue : `${existing},${normalizedValue}`);
  }

  const sortedHeaders = Array.from(headerMap.entries()).sort(([a], [b]) =>
    a < b ? -1 : a > b ? 1 : 0
  );

  const canonical = sortedHeaders.map(([name, value]) => `${name}:${value}\n`).join('');
  const signed = sortedHeaders.map(([name]) => name).join(';');

  return { canonical, signed };
}

/**
 * Create the canonical request string.
 *
 * Format:
 * ```
 * HTTPMethod + '\n' +
 * CanonicalURI + '\n' +
 * CanonicalQueryString + '\n' +
 * CanonicalHeaders + '\n' +
 * SignedHeaders + '\n' +
 * HashedPayload
 * ```
 *
 * The header block already ends in `\n`, so a blank line precedes the
 * signed headers.
 */
export function buildCanonicalRequest(request: CanonicalRequest): string {
  return [
    request.method.toUpperCase(),
    request.uri === '' ? '/' : request.uri,
    request.query,
    request.headers,
    request.signedHeaders,
    request.payloadHash,
  ].join('\n');
}
