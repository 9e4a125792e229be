/**
 * HTTP types, header helpers and transport.
 *
 * @module http
 */

export type { HttpMethod, HeaderPair, TransportRequest, RawResponse } from './types.js';
export { hasHeader, findHeader, withoutHeader } from './headers.js';
export { UndiciTransport, toTransportError } from './transport.js';
export type { Transport, UndiciTransportConfig } from './transport.js';
