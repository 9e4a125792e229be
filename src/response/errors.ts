/**
 * API error decoders.
 *
 * An {@link ErrorDecoder} looks at an unsuccessful response and either
 * recognises the service's error payload or declines it, in which case the
 * request's response decoder gets the response.
 *
 * @module response/errors
 */

import { z } from 'zod';
import { decodeJsonBody } from '../body/index.js';
import type { RawResponse } from '../http/types.js';
import type { ProtocolFamily } from '../service/index.js';
import { parseXml } from './payload.js';
import { bodyText, classifyStatus, extractRequestId } from './metadata.js';

/**
 * Recognises a service's error payload.
 *
 * @template E - Typed error value
 */
export interface ErrorDecoder<E> {
  /**
   * @returns The typed error, or undefined when the response is not one
   */
  decode(response: RawResponse): E | undefined;
}

/**
 * Declines every response.
 */
export const noErrorDecoder: ErrorDecoder<never> = {
  decode: () => undefined,
};

/**
 * Error reported by an AWS API.
 */
export interface AwsApiError {
  /** Error code without namespace (e.g., "ResourceNotFoundException") */
  code: string;
  message: string;
  status: number;
  requestId?: string;
  /** Whether the same request may succeed later; informational, the core never retries */
  retryable: boolean;
}

const THROTTLING_CODES = new Set([
  'Throttling',
  'ThrottlingException',
  'ThrottledException',
  'TooManyRequestsException',
  'RequestLimitExceeded',
  'RequestThrottled',
  'RequestThrottledException',
  'ProvisionedThroughputExceededException',
  'SlowDown',
  'RequestTimeout',
  'RequestTimeoutException',
]);

/**
 * Whether an API error is worth retrying: throttling codes, 429 and 5xx.
 */
export function isRetryableError(code: string, status: number): boolean {
  return THROTTLING_CODES.has(code) || status === 429 || status >= 500;
}

/**
 * Strip the namespace from an error type.
 *
 * @example
 * ```typescript
 * normalizeErrorCode('com.amazonaws.dynamodb.v20120810#ResourceNotFoundException');
 * // 'ResourceNotFoundException'
 * normalizeErrorCode('ValidationException:http://internal.amazon.com/coral/');
 * // 'ValidationException'
 * ```
 */
export function normalizeErrorCode(type: string): string {
  const withoutUri = type.split(':')[0] ?? type;
  const hash = withoutUri.lastIndexOf('#');
  return (hash >= 0 ? withoutUri.slice(hash + 1) : withoutUri).trim();
}

function apiError(
  code: string,
  message: string | undefined,
  response: RawResponse,
  requestId?: string
): AwsApiError {
  return {
    code,
    message: message ?? code,
    status: response.status,
    requestId: requestId ?? extractRequestId(response.headers),
    retryable: isRetryableError(code, response.status),
  };
}

const JsonErrorSchema = z
  .object({
    __type: z.string().optional(),
    code: z.string().optional(),
    Code: z.string().optional(),
    message: z.string().optional(),
    Message: z.string().optional(),
  })
  .passthrough();

/**
 * Decodes JSON error bodies (JSON and REST+JSON protocols).
 *
 * The code comes from the `x-amzn-errortype` header when present, otherwise
 * from `__type` or `code` in the body.
 */
export class AwsJsonErrorDecoder implements ErrorDecoder<AwsApiError> {
  decode(response: RawResponse): AwsApiError | undefined {
    if (classifyStatus(response.status) === 'good') {
      return undefined;
    }

    const text = bodyText(response);
    const body = text.trim() === '' ? undefined : decodeJsonBody(text, JsonErrorSchema);
    const fields = body?.success ? body.data : undefined;

    const type =
      response.headers['x-amzn-errortype'] ?? fields?.__type ?? fields?.code ?? fields?.Code;
    if (type === undefined) {
      return undefined;
    }

    return apiError(normalizeErrorCode(type), fields?.message ?? fields?.Message, response);
  }
}

const XmlErrorDetailSchema = z.object({
  Code: z.string(),
  Message: z.string().optional(),
  RequestId: z.string().optional(),
});

const XmlErrorShapes = z.union([
  // Query protocol: <ErrorResponse><Error>...</Error><RequestId/></ErrorResponse>
  z.object({
    ErrorResponse: z.object({
      Error: XmlErrorDetailSchema,
      RequestId: z.string().optional(),
    }),
  }),
  // EC2 protocol: <Response><Errors><Error>...</Error></Errors><RequestID/></Response>
  z.object({
    Response: z.object({
      Errors: z.object({
        Error: z.union([XmlErrorDetailSchema, z.array(XmlErrorDetailSchema).nonempty()]),
      }),
      RequestID: z.string().optional(),
    }),
  }),
  // REST+XML: <Error><Code/><Message/><RequestId/></Error>
  z.object({ Error: XmlErrorDetailSchema }),
]);

/**
 * Decodes XML error bodies (query, EC2 and REST+XML protocols).
 */
export class AwsXmlErrorDecoder implements ErrorDecoder<AwsApiError> {
  decode(response: RawResponse): AwsApiError | undefined {
    if (classifyStatus(response.status) === 'good') {
      return undefined;
    }

    const text = bodyText(response);
    if (text.trim() === '') {
      return undefined;
    }

    const parsed = parseXml(text);
    if (!parsed.success) {
      return undefined;
    }

    const shape = XmlErrorShapes.safeParse(parsed.data);
    if (!shape.success) {
      return undefined;
    }

    const data = shape.data;
    if ('ErrorResponse' in data) {
      const { Error: detail, RequestId } = data.ErrorResponse;
      return apiError(detail.Code, detail.Message, response, RequestId ?? detail.RequestId);
    }
    if ('Response' in data) {
      const errors = data.Response.Errors.Error;
      const detail = Array.isArray(errors) ? errors[0] : errors;
      return apiError(detail.Code, detail.Message, response, data.Response.RequestID);
    }
    return apiError(data.Error.Code, data.Error.Message, response, data.Error.RequestId);
  }
}

/**
 * Error decoder matching a service's protocol family.
 */
export function errorDecoderFor(protocol: ProtocolFamily): ErrorDecoder<AwsApiError> {
  return protocol === 'json' || protocol === 'rest-json'
    ? new AwsJsonErrorDecoder()
    : new AwsXmlErrorDecoder();
}
