/**
 * HTTP types shared by the request model, the signer and the transport.
 *
 * @module http/types
 */

/**
 * HTTP methods supported by the dispatcher.
 */
export type HttpMethod = 'GET' | 'HEAD' | 'POST' | 'PUT' | 'DELETE' | 'PATCH';

/**
 * A header as a name/value pair. Header lists are ordered and may repeat names.
 */
export type HeaderPair = readonly [name: string, value: string];

/**
 * A fully built request handed to the transport.
 *
 * @example
 * ```typescript
 * const request: TransportRequest = {
 *   method: 'POST',
 *   url: 'https://dynamodb.us-east-1.amazonaws.com/',
 *   headers: [['content-type', 'application/x-amz-json-1.0']],
 *   body: new TextEncoder().encode('{}'),
 * };
 * ```
 */
export interface TransportRequest {
  method: HttpMethod;

  /**
   * Absolute URL including the query string.
   */
  url: string;

  headers: ReadonlyArray<HeaderPair>;

  /**
   * Request body bytes; undefined when there is no body.
   */
  body?: Uint8Array;

  /**
   * Aborts the network round trip.
   */
  signal?: AbortSignal;
}

/**
 * Raw HTTP response as returned by the transport.
 */
export interface RawResponse {
  /**
   * HTTP status code (e.g., 200, 400, 500).
   */
  status: number;

  /**
   * Response headers. Names are lower-cased; repeated headers are joined with `, `.
   */
  headers: Record<string, string>;

  /**
   * Response body bytes. Empty when the response has no body.
   */
  body: Uint8Array;
}
