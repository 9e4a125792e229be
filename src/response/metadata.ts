/**
 * Response classification and metadata.
 *
 * @module response/metadata
 */

import type { RawResponse } from '../http/types.js';

/**
 * `good` iff the status is in [200, 300).
 */
export type ResponseClass = 'good' | 'bad';

export interface ResponseMetadata {
  status: number;
  /** Lower-cased response headers */
  headers: Record<string, string>;
  /** AWS request ID, when the service sent one */
  requestId?: string;
}

const decoder = new TextDecoder('utf-8');

/**
 * Classify an HTTP status code.
 *
 * @example
 * ```typescript
 * classifyStatus(204); // 'good'
 * classifyStatus(404); // 'bad'
 * ```
 */
export function classifyStatus(status: number): ResponseClass {
  return status >= 200 && status < 300 ? 'good' : 'bad';
}

/**
 * Extract the AWS request ID from response headers.
 */
export function extractRequestId(headers: Record<string, string>): string | undefined {
  return headers['x-amzn-requestid'] ?? headers['x-amz-request-id'];
}

export function responseMetadata(response: RawResponse): ResponseMetadata {
  return {
    status: response.status,
    headers: response.headers,
    requestId: extractRequestId(response.headers),
  };
}

/**
 * Response body decoded as UTF-8.
 */
export function bodyText(response: RawResponse): string {
  return decoder.decode(response.body);
}
