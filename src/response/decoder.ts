/**
 * Response decoders.
 *
 * A request carries one {@link ResponseDecoder}; the dispatcher hands it the
 * raw response and gets back a typed value or a {@link DecodeError}.
 *
 * @module response/decoder
 */

import type { Schema } from '../body/index.js';
import { DecodeError, ok, err, type Result } from '../error/index.js';
import type { RawResponse } from '../http/types.js';
import { ResponsePayload } from './payload.js';
import {
  bodyText,
  classifyStatus,
  responseMetadata,
  type ResponseMetadata,
} from './metadata.js';

/**
 * Turns a raw response into a typed result.
 *
 * @template T - Success value
 */
export interface ResponseDecoder<T> {
  decode(response: RawResponse): Result<T, DecodeError>;
}

/**
 * Sees every response: status, metadata and the body as a string.
 * A string error becomes a `bad-body` {@link DecodeError}.
 *
 * @example
 * ```typescript
 * const exists = new FullDecoder((metadata) =>
 *   metadata.status === 404 ? ok(false) : metadata.status === 200 ? ok(true) : err('unexpected status')
 * );
 * ```
 */
export class FullDecoder<T> implements ResponseDecoder<T> {
  constructor(
    private readonly handler: (metadata: ResponseMetadata, body: string) => Result<T, string>
  ) {}

  decode(response: RawResponse): Result<T, DecodeError> {
    const result = this.handler(responseMetadata(response), bodyText(response));
    return result.success ? ok(result.data) : err(DecodeError.badBody(result.error, response.status));
  }
}

/**
 * Sees every response through a {@link ResponsePayload} reader.
 */
export class StructuredDecoder<T> implements ResponseDecoder<T> {
  constructor(
    private readonly handler: (
      metadata: ResponseMetadata,
      payload: ResponsePayload
    ) => Result<T, string>
  ) {}

  decode(response: RawResponse): Result<T, DecodeError> {
    const result = this.handler(responseMetadata(response), new ResponsePayload(bodyText(response)));
    return result.success ? ok(result.data) : err(DecodeError.badBody(result.error, response.status));
  }
}

/**
 * Decodes the body of successful responses only. Any other status yields a
 * `bad-status` error without the body being read.
 */
export class BodyDecoder<T> implements ResponseDecoder<T> {
  constructor(private readonly handler: (body: string) => Result<T, string>) {}

  decode(response: RawResponse): Result<T, DecodeError> {
    if (classifyStatus(response.status) === 'bad') {
      return err(DecodeError.badStatus(response.status));
    }

    const result = this.handler(bodyText(response));
    return result.success ? ok(result.data) : err(DecodeError.badBody(result.error, response.status));
  }

  /**
   * JSON body validated against a schema.
   */
  static json<T>(schema: Schema<T>): BodyDecoder<T> {
    return new BodyDecoder(body => new ResponsePayload(body).json(schema));
  }

  /**
   * XML body validated against a schema.
   */
  static xml<T>(schema: Schema<T>): BodyDecoder<T> {
    return new BodyDecoder(body => new ResponsePayload(body).xml(schema));
  }

  /**
   * The body text as is.
   */
  static text(): BodyDecoder<string> {
    return new BodyDecoder(body => ok(body));
  }
}

/**
 * Ignores the body; yields `value` on success and `bad-status` otherwise.
 */
export class ConstantDecoder<T> implements ResponseDecoder<T> {
  constructor(private readonly value: T) {}

  decode(response: RawResponse): Result<T, DecodeError> {
    if (classifyStatus(response.status) === 'bad') {
      return err(DecodeError.badStatus(response.status));
    }
    return ok(this.value);
  }
}
