/**
 * Request Model
 *
 * The unsigned request: what to call, what to send, and how to read the
 * answer. Requests are immutable; the `with*` methods return a new request
 * with entries appended after the existing ones.
 *
 * @module request/request
 */

import { Body } from '../body/index.js';
import type { QueryPair } from '../encoding/index.js';
import type { HeaderPair, HttpMethod } from '../http/types.js';
import type { ResponseDecoder, ErrorDecoder } from '../response/index.js';
import { noErrorDecoder } from '../response/index.js';

type Pairs = Iterable<readonly [string, string]> | Readonly<Record<string, string>>;

function isIterable(value: Pairs): value is Iterable<readonly [string, string]> {
  return Symbol.iterator in value;
}

function toPairs(input: Pairs): Array<readonly [string, string]> {
  return isIterable(input) ? Array.from(input) : Object.entries(input);
}

export interface ServiceRequestInit<T, E> {
  /** Operation name, e.g. "GetItem"; used for the JSON target header */
  operation: string;
  method: HttpMethod;
  /** Percent-safe path (default: "/") */
  path?: string;
  body?: Body;
  headers?: Pairs;
  query?: Pairs;
  decoder: ResponseDecoder<T>;
  /** Recognises the service's error payload (default: declines everything) */
  errorDecoder?: ErrorDecoder<E>;
}

interface ServiceRequestFields<T, E> {
  operation: string;
  method: HttpMethod;
  path: string;
  body: Body;
  headers: ReadonlyArray<HeaderPair>;
  query: ReadonlyArray<QueryPair>;
  decoder: ResponseDecoder<T>;
  errorDecoder: ErrorDecoder<E>;
}

/**
 * An unsigned request bound to the decoders for its result.
 *
 * @template T - Value produced on success
 * @template E - Error value produced by the error decoder
 *
 * @example
 * ```typescript
 * const request = ServiceRequest.create({
 *   operation: 'ListTables',
 *   method: 'POST',
 *   body: Body.json({ Limit: 10 }),
 *   decoder: BodyDecoder.json(ListTablesSchema),
 *   errorDecoder: new AwsJsonErrorDecoder(),
 * }).withHeader('x-request-tag', 'nightly');
 * ```
 */
export class ServiceRequest<T, E = never> {
  readonly operation: string;
  readonly method: HttpMethod;
  readonly path: string;
  readonly body: Body;
  readonly headers: ReadonlyArray<HeaderPair>;
  readonly query: ReadonlyArray<QueryPair>;
  readonly decoder: ResponseDecoder<T>;
  readonly errorDecoder: ErrorDecoder<E>;

  private constructor(fields: ServiceRequestFields<T, E>) {
    this.operation = fields.operation;
    this.method = fields.method;
    this.path = fields.path;
    this.body = fields.body;
    this.headers = Object.freeze([...fields.headers]);
    this.query = Object.freeze([...fields.query]);
    this.decoder = fields.decoder;
    this.errorDecoder = fields.errorDecoder;
    Object.freeze(this);
  }

  static create<T, E = never>(init: ServiceRequestInit<T, E>): ServiceRequest<T, E> {
    const path = init.path ?? '/';
    return new ServiceRequest<T, E>({
      operation: init.operation,
      method: init.method,
      path: path.startsWith('/') ? path : `/${path}`,
      body: init.body ?? Body.empty(),
      headers: init.headers !== undefined ? toPairs(init.headers) : [],
      query: init.query !== undefined ? toPairs(init.query) : [],
      decoder: init.decoder,
      errorDecoder: init.errorDecoder ?? noErrorDecoder,
    });
  }

  private copy(changes: Partial<ServiceRequestFields<T, E>>): ServiceRequest<T, E> {
    return new ServiceRequest<T, E>({ ...this.fields(), ...changes });
  }

  private fields(): ServiceRequestFields<T, E> {
    return {
      operation: this.operation,
      method: this.method,
      path: this.path,
      body: this.body,
      headers: this.headers,
      query: this.query,
      decoder: this.decoder,
      errorDecoder: this.errorDecoder,
    };
  }

  /**
   * Append a header. Repeated names are kept.
   */
  withHeader(name: string, value: string): ServiceRequest<T, E> {
    return this.copy({ headers: [...this.headers, [name, value]] });
  }

  /**
   * Append several headers in order.
   */
  withHeaders(headers: Pairs): ServiceRequest<T, E> {
    return this.copy({ headers: [...this.headers, ...toPairs(headers)] });
  }

  /**
   * Append a raw (unencoded) query parameter. Repeated names are kept.
   */
  withQuery(name: string, value: string): ServiceRequest<T, E> {
    return this.copy({ query: [...this.query, [name, value]] });
  }

  /**
   * Append several raw query parameters in order.
   */
  withQueryParams(params: Pairs): ServiceRequest<T, E> {
    return this.copy({ query: [...this.query, ...toPairs(params)] });
  }

  /**
   * Same request with a different error decoder.
   */
  withErrorDecoder<F>(errorDecoder: ErrorDecoder<F>): ServiceRequest<T, F> {
    return new ServiceRequest<T, F>({ ...this.fields(), errorDecoder });
  }
}
