/**
 * Transport layer abstraction for HTTP communication.
 *
 * The transport executes a fully built request and reports either a raw
 * response or a {@link TransportError}. It never retries.
 *
 * @module http/transport
 */

import { request, errors, type Dispatcher } from 'undici';
import { TransportError, ok, err, errorMessage, type Result } from '../error/index.js';
import type { RawResponse, TransportRequest } from './types.js';

/**
 * Transport interface for HTTP communication.
 *
 * @example
 * ```typescript
 * class RecordingTransport implements Transport {
 *   readonly sent: TransportRequest[] = [];
 *   async send(request: TransportRequest): Promise<Result<RawResponse, TransportError>> {
 *     this.sent.push(request);
 *     return ok({ status: 200, headers: {}, body: new Uint8Array() });
 *   }
 * }
 * ```
 */
export interface Transport {
  send(request: TransportRequest): Promise<Result<RawResponse, TransportError>>;
}

/**
 * HTTP transport options.
 */
export interface UndiciTransportConfig {
  /**
   * Time allowed for response headers and for each body chunk, in
   * milliseconds. Undefined leaves undici's defaults in place.
   */
  timeout?: number;

  /**
   * undici dispatcher to send through (default: the global dispatcher).
   */
  dispatcher?: Dispatcher;
}

/**
 * Flatten ordered header pairs for undici, which accepts repeated names in
 * this form.
 */
function flattenHeaders(request: TransportRequest): string[] {
  return request.headers.flatMap(([name, value]) => [name, value]);
}

function normalizeHeaders(headers: Record<string, string | string[] | undefined>): Record<string, string> {
  const normalized: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) {
      continue;
    }
    normalized[name.toLowerCase()] = Array.isArray(value) ? value.join(', ') : value;
  }
  return normalized;
}

const URL_ARGUMENT = /\b(url|origin|path|hostname|port|protocol)\b/i;

/**
 * Map a thrown undici error to a transport error.
 */
export function toTransportError(error: unknown): TransportError {
  if (
    error instanceof errors.ConnectTimeoutError ||
    error instanceof errors.HeadersTimeoutError ||
    error instanceof errors.BodyTimeoutError
  ) {
    return new TransportError(`Request timed out: ${error.message}`, 'timeout');
  }

  // InvalidArgumentError also covers headers, methods and bodies
  if (error instanceof errors.InvalidArgumentError) {
    const reason = URL_ARGUMENT.test(error.message) ? 'bad-url' : 'network';
    return new TransportError(`Invalid request: ${error.message}`, reason);
  }

  if (error instanceof Error && (error.name === 'AbortError' || error instanceof errors.RequestAbortedError)) {
    return new TransportError('Request aborted', 'network');
  }

  return new TransportError(`Network error: ${errorMessage(error)}`, 'network');
}

/**
 * undici-based HTTP transport.
 *
 * @example
 * ```typescript
 * const transport = new UndiciTransport({ timeout: 30000 });
 * const result = await transport.send({
 *   method: 'GET',
 *   url: 'https://sts.amazonaws.com/?Action=GetCallerIdentity&Version=2011-06-15',
 *   headers: [],
 * });
 * ```
 */
export class UndiciTransport implements Transport {
  private readonly config: UndiciTransportConfig;

  constructor(config: UndiciTransportConfig = {}) {
    this.config = { ...config };
  }

  async send(req: TransportRequest): Promise<Result<RawResponse, TransportError>> {
    let url: URL;
    try {
      url = new URL(req.url);
    } catch (error) {
      return err(new TransportError(`Invalid URL '${req.url}': ${errorMessage(error)}`, 'bad-url'));
    }

    try {
      const response = await request(url, {
        method: req.method,
        headers: flattenHeaders(req),
        body: req.body,
        signal: req.signal,
        dispatcher: this.config.dispatcher,
        headersTimeout: this.config.timeout,
        bodyTimeout: this.config.timeout,
      });

      const body = new Uint8Array(await response.body.arrayBuffer());

      return ok({
        status: response.statusCode,
        headers: normalizeHeaders(response.headers),
        body,
      });
    } catch (error) {
      return err(toTransportError(error));
    }
  }

  getConfig(): Readonly<UndiciTransportConfig> {
    return { ...this.config };
  }
}
