/**
 * Request Body Model
 *
 * A request payload is exactly one of: empty, a JSON value, or a raw string
 * with an explicit mime type. Serialization happens once, at construction.
 *
 * @module body
 */

import type { z } from 'zod';
import { ok, err, errorMessage, type Result } from '../error/index.js';
import { jsonContentType } from '../protocol/content-type.js';
import type { ServiceDescriptor } from '../service/index.js';

/**
 * A zod schema producing `T` from untyped input.
 */
export type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/**
 * Any value `JSON.stringify` renders losslessly.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type Body =
  | { readonly kind: 'empty' }
  | { readonly kind: 'json'; readonly value: JsonValue | object; readonly text: string }
  | { readonly kind: 'text'; readonly text: string; readonly mimeType: string };

const EMPTY: Body = Object.freeze<Body>({ kind: 'empty' });

/**
 * Body factory functions.
 */
export const Body = {
  empty(): Body {
    return EMPTY;
  },

  /**
   * Serialize a JSON value without pretty-printing. Plain objects typed by an
   * interface are accepted as they are.
   */
  json(value: JsonValue | object): Body {
    return Object.freeze<Body>({ kind: 'json', value, text: JSON.stringify(value) });
  },

  /**
   * Raw string sent with `mimeType` as its content type, verbatim.
   */
  text(text: string, mimeType: string): Body {
    return Object.freeze<Body>({ kind: 'text', text, mimeType });
  },
};

/**
 * Body rendered as a string. Empty bodies render `''`.
 */
export function bodyToString(body: Body): string {
  return body.kind === 'empty' ? '' : body.text;
}

/**
 * UTF-8 bytes of the body.
 */
export function bodyToBytes(body: Body): Uint8Array {
  return new TextEncoder().encode(bodyToString(body));
}

/**
 * Body as handed to the transport.
 */
export interface TransportBody {
  /** Bytes to send; undefined for empty bodies */
  payload: Uint8Array | undefined;
  /** Content-Type header value; undefined for empty bodies */
  contentType: string | undefined;
}

/**
 * Map a body to the transport's representation and its content type.
 *
 * JSON bodies take the service's JSON content type; text bodies keep the
 * caller's mime type.
 */
export function toTransportBody(body: Body, descriptor: ServiceDescriptor): TransportBody {
  switch (body.kind) {
    case 'empty':
      return { payload: undefined, contentType: undefined };
    case 'json':
      return { payload: bodyToBytes(body), contentType: jsonContentType(descriptor) };
    case 'text':
      return { payload: bodyToBytes(body), contentType: body.mimeType };
  }
}

/**
 * Parse JSON text and validate it against a schema.
 *
 * @returns The validated value, or a message describing why it was rejected
 */
export function decodeJsonBody<T>(text: string, schema: Schema<T>): Result<T, string> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    return err(`Failed to parse JSON response: ${errorMessage(error)}`);
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    return err(`Response did not match the expected shape: ${result.error.issues.map(i => i.message).join('; ')}`);
  }
  return ok(result.data);
}
