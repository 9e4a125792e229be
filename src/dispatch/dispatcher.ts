/**
 * Request Dispatcher
 *
 * Turns a {@link ServiceRequest} into an HTTP call: protocol headers,
 * timestamp, SigV4 signature, URL, transport, and decoding of the response.
 * Every outcome is returned as a {@link Result}; nothing is retried.
 *
 * @module dispatch/dispatcher
 */

import { toTransportBody } from '../body/index.js';
import { DEFAULT_USER_AGENT, resolveConfig, type CoreConfig } from '../config/index.js';
import { canonicalQueryString } from '../encoding/index.js';
import {
  ClockError,
  DecodeError,
  ServiceError,
  SigningUnsupportedError,
  type TransportError,
  ok,
  err,
  errorMessage,
  type DispatchFailure,
  type Result,
} from '../error/index.js';
import { hasHeader, withoutHeader } from '../http/headers.js';
import { UndiciTransport, toTransportError, type Transport } from '../http/transport.js';
import type { HeaderPair, RawResponse } from '../http/types.js';
import { ConsoleLogger, NoopLogger, type Logger } from '../observability/index.js';
import { acceptFor, targetHeader } from '../protocol/index.js';
import type { ServiceRequest } from '../request/index.js';
import { classifyStatus, extractRequestId } from '../response/index.js';
import {
  resolveHost,
  resolveRegion,
  signingServiceName,
  type ServiceDescriptor,
} from '../service/index.js';
import {
  signV4,
  sha256Hex,
  formatAmzDate,
  AMZ_DATE_HEADER,
  AUTHORIZATION_HEADER,
  CONTENT_SHA256_HEADER,
  SECURITY_TOKEN_HEADER,
  type AwsCredentials,
} from '../signing/index.js';
import { systemClock, type Clock } from './clock.js';

export type DispatchResult<T, E> = Result<T, DispatchFailure<E>>;

export interface DispatcherOptions {
  /** HTTP transport (default: {@link UndiciTransport}) */
  transport?: Transport;
  /** Time source (default: the system clock) */
  clock?: Clock;
  /** Logger (default: {@link NoopLogger}) */
  logger?: Logger;
  /** User-Agent header, appended after signing */
  userAgent?: string;
}

export interface SendOptions {
  /** Cancels the network round trip */
  signal?: AbortSignal;
}

interface PreparedRequest {
  headers: HeaderPair[];
  payload: Uint8Array | undefined;
}

/**
 * Absolute request URL: `https://` + host + path + `?query` when non-empty.
 */
export function buildUrl(host: string, path: string, query: string): string {
  return `https://${host}${path}${query === '' ? '' : `?${query}`}`;
}

/**
 * Sends signed and unsigned requests.
 *
 * Holds no per-call state: concurrent calls with the same descriptor and
 * credentials each sign with their own timestamp.
 *
 * @example
 * ```typescript
 * const dispatcher = new Dispatcher({ logger: new ConsoleLogger('debug') });
 * const result = await dispatcher.sendSigned(dynamodb, credentials, listTables);
 * if (result.success) {
 *   console.log(result.data.TableNames);
 * } else if (result.error instanceof ServiceError) {
 *   console.error(result.error.error.code);
 * }
 * ```
 */
export class Dispatcher {
  private readonly transport: Transport;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly userAgent: string;

  constructor(options: DispatcherOptions = {}) {
    this.transport = options.transport ?? new UndiciTransport();
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? new NoopLogger();
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
  }

  /**
   * Sign the request with the descriptor's scheme and send it.
   *
   * Fails with {@link SigningUnsupportedError} before reading the clock when
   * the descriptor's scheme has no signer.
   */
  async sendSigned<T, E>(
    descriptor: ServiceDescriptor,
    credentials: AwsCredentials,
    request: ServiceRequest<T, E>,
    options: SendOptions = {}
  ): Promise<DispatchResult<T, E>> {
    if (descriptor.signingScheme !== 'v4') {
      this.logger.warn('Signing scheme not supported', {
        operation: request.operation,
        scheme: descriptor.signingScheme,
      });
      return err(new SigningUnsupportedError(descriptor.signingScheme));
    }

    const now = await this.readClock();
    if (!now.success) {
      return now;
    }

    const prepared = this.prepare(descriptor, request);
    const host = resolveHost(descriptor);

    const signed = signV4({
      method: request.method,
      host,
      path: request.path,
      query: request.query,
      headers: prepared.headers,
      payload: prepared.payload ?? '',
      region: resolveRegion(descriptor),
      service: signingServiceName(descriptor),
      credentials,
      timestamp: now.data,
    });

    // Unsigned User-Agent goes before the session token, which stays last
    const headers: HeaderPair[] = [...signed.headers];
    const tokenIndex = headers.findIndex(([name]) => name === SECURITY_TOKEN_HEADER);
    headers.splice(tokenIndex === -1 ? headers.length : tokenIndex, 0, ['user-agent', this.userAgent]);

    return this.execute(request, host, headers, prepared.payload, options, true);
  }

  /**
   * Send the request without an `Authorization` header.
   *
   * `x-amz-date`, `x-amz-content-sha256` and an `Accept` header matching the
   * protocol family are still added unless the caller supplied them.
   */
  async sendUnsigned<T, E>(
    descriptor: ServiceDescriptor,
    request: ServiceRequest<T, E>,
    options: SendOptions = {}
  ): Promise<DispatchResult<T, E>> {
    const now = await this.readClock();
    if (!now.success) {
      return now;
    }

    const prepared = this.prepare(descriptor, request);
    const headers = [...prepared.headers];

    const defaults: HeaderPair[] = [
      [AMZ_DATE_HEADER, formatAmzDate(now.data)],
      [CONTENT_SHA256_HEADER, sha256Hex(prepared.payload ?? '')],
      ['accept', acceptFor(descriptor.protocol)],
      ['user-agent', this.userAgent],
    ];
    for (const header of defaults) {
      if (!hasHeader(headers, header[0])) {
        headers.push(header);
      }
    }

    return this.execute(request, resolveHost(descriptor), headers, prepared.payload, options, false);
  }

  private async readClock(): Promise<Result<Date, ClockError>> {
    try {
      const now = await this.clock.now();
      if (Number.isNaN(now.getTime())) {
        return err(new ClockError('Clock returned an invalid date'));
      }
      return ok(now);
    } catch (error) {
      return err(new ClockError(`Failed to read the clock: ${errorMessage(error)}`));
    }
  }

  /**
   * Caller headers (without `Authorization`) plus the JSON target header and
   * the body's content type, unless the caller set them.
   */
  private prepare<T, E>(descriptor: ServiceDescriptor, request: ServiceRequest<T, E>): PreparedRequest {
    const headers = withoutHeader(request.headers, AUTHORIZATION_HEADER);
    if (headers.length !== request.headers.length) {
      this.logger.warn('Dropping caller-supplied Authorization header', {
        operation: request.operation,
      });
    }

    const target = targetHeader(descriptor, request.operation);
    if (target !== undefined && !hasHeader(headers, target[0])) {
      headers.push(target);
    }

    const { payload, contentType } = toTransportBody(request.body, descriptor);
    if (contentType !== undefined && !hasHeader(headers, 'content-type')) {
      headers.push(['content-type', contentType]);
    }

    return { headers, payload };
  }

  private async execute<T, E>(
    request: ServiceRequest<T, E>,
    host: string,
    headers: HeaderPair[],
    payload: Uint8Array | undefined,
    options: SendOptions,
    signed: boolean
  ): Promise<DispatchResult<T, E>> {
    const url = buildUrl(host, request.path, canonicalQueryString(request.query));
    const context = { operation: request.operation, method: request.method, host, signed };
    this.logger.debug('Dispatching request', context);

    const startedAt = Date.now();
    let sent: Result<RawResponse, TransportError>;
    try {
      sent = await this.transport.send({
        method: request.method,
        url,
        headers,
        body: payload,
        signal: options.signal,
      });
    } catch (error) {
      sent = err(toTransportError(error));
    }

    if (!sent.success) {
      this.logger.warn('Request failed', {
        ...context,
        reason: sent.error.reason,
        error: sent.error.message,
      });
      return sent;
    }

    const response = sent.data;
    this.logger.debug('Response received', {
      ...context,
      status: response.status,
      requestId: extractRequestId(response.headers),
      durationMs: Date.now() - startedAt,
    });

    const decoded = this.decode(request, response);
    if (!decoded.success) {
      this.logger.warn('Request returned an error', {
        ...context,
        status: response.status,
        code: decoded.error.code,
      });
    }
    return decoded;
  }

  /**
   * Good status goes to the response decoder. Bad status goes to the error
   * decoder first; if it declines, the response decoder decides.
   */
  private decode<T, E>(request: ServiceRequest<T, E>, response: RawResponse): DispatchResult<T, E> {
    try {
      if (classifyStatus(response.status) === 'bad') {
        const serviceError = request.errorDecoder.decode(response);
        if (serviceError !== undefined) {
          return err(
            new ServiceError(serviceError, response.status, extractRequestId(response.headers))
          );
        }
      }

      const result = request.decoder.decode(response);
      return result.success ? ok(result.data) : err(result.error);
    } catch (error) {
      return err(
        DecodeError.badBody(`Decoder failed: ${errorMessage(error)}`, response.status)
      );
    }
  }
}

/**
 * Build a dispatcher from configuration, with the undici transport and a
 * console logger.
 *
 * @example
 * ```typescript
 * const dispatcher = createDispatcher(loadConfigFromEnv());
 * ```
 */
export function createDispatcher(
  config: CoreConfig = resolveConfig(),
  overrides: DispatcherOptions = {}
): Dispatcher {
  return new Dispatcher({
    transport: new UndiciTransport({ timeout: config.timeoutMs }),
    logger: new ConsoleLogger(config.logLevel),
    userAgent: config.userAgent,
    ...overrides,
  });
}
