/**
 * Structured access to a response body.
 *
 * @module response/payload
 */

import { XMLParser } from 'fast-xml-parser';
import { decodeJsonBody, type Schema } from '../body/index.js';
import { ok, err, errorMessage, type Result } from '../error/index.js';

/**
 * Parser options for AWS XML responses. Tag values stay strings; schemas
 * coerce where they need numbers.
 */
const PARSER_OPTIONS = {
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  textNodeName: '#text',
  ignoreDeclaration: true,
  parseAttributeValue: false,
  parseTagValue: false,
  trimValues: true,
};

/**
 * Parse XML text into a plain object.
 */
export function parseXml(text: string): Result<unknown, string> {
  try {
    const parsed: unknown = new XMLParser(PARSER_OPTIONS).parse(text, true);
    return ok(parsed);
  } catch (error) {
    return err(`Failed to parse XML response: ${errorMessage(error)}`);
  }
}

/**
 * Response body with JSON and XML readers validated by zod schemas.
 *
 * @example
 * ```typescript
 * const decoder = new StructuredDecoder((metadata, payload) =>
 *   payload.json(z.object({ TableNames: z.array(z.string()) }))
 * );
 * ```
 */
export class ResponsePayload {
  constructor(public readonly text: string) {}

  json<T>(schema: Schema<T>): Result<T, string> {
    return decodeJsonBody(this.text, schema);
  }

  xml<T>(schema: Schema<T>): Result<T, string> {
    const parsed = parseXml(this.text);
    if (!parsed.success) {
      return parsed;
    }

    const result = schema.safeParse(parsed.data);
    if (!result.success) {
      return err(
        `Response did not match the expected shape: ${result.error.issues.map(i => i.message).join('; ')}`
      );
    }
    return ok(result.data);
  }
}
