/**
 * aws-request-core
 *
 * Canonical request building, Signature Version 4 signing and response
 * dispatch for AWS-style HTTP APIs.
 *
 * @example
 * ```typescript
 * import {
 *   Body,
 *   BodyDecoder,
 *   AwsJsonErrorDecoder,
 *   ServiceRequest,
 *   createDispatcher,
 *   knownService,
 *   loadConfigFromEnv,
 * } from 'aws-request-core';
 * import { z } from 'zod';
 *
 * const dynamodb = knownService('dynamodb', { kind: 'regional', region: 'eu-west-1' });
 * const dispatcher = createDispatcher(loadConfigFromEnv());
 *
 * const listTables = ServiceRequest.create({
 *   operation: 'ListTables',
 *   method: 'POST',
 *   body: Body.json({}),
 *   decoder: BodyDecoder.json(z.object({ TableNames: z.array(z.string()) })),
 *   errorDecoder: new AwsJsonErrorDecoder(),
 * });
 *
 * const result = await dispatcher.sendSigned(dynamodb, credentials, listTables);
 * ```
 *
 * @module aws-request-core
 */

// Errors
export {
  CoreError,
  TransportError,
  DecodeError,
  ServiceError,
  SigningUnsupportedError,
  ClockError,
  ConfigurationError,
  ok,
  err,
  isCoreError,
  errorMessage,
} from './error/index.js';
export type {
  CoreErrorCode,
  TransportErrorReason,
  DecodeErrorReason,
  DispatchFailure,
  Result,
} from './error/index.js';

// Encoding
export {
  uriEncode,
  EncodedQuery,
  encodeQuery,
  renderQuery,
  canonicalQueryString,
} from './encoding/index.js';
export type { QueryPair, QueryOrdering } from './encoding/index.js';

// Body
export {
  Body,
  bodyToString,
  bodyToBytes,
  toTransportBody,
  decodeJsonBody,
} from './body/index.js';
export type { JsonValue, Schema, TransportBody } from './body/index.js';

// Service descriptors
export * from './service/index.js';

// Protocol helpers
export * from './protocol/index.js';

// Request model
export * from './request/index.js';

// Response decoding
export * from './response/index.js';

// Signing
export * from './signing/index.js';

// HTTP
export * from './http/index.js';

// Dispatch
export * from './dispatch/index.js';

// Configuration
export {
  CoreConfigSchema,
  DEFAULT_CONFIG,
  DEFAULT_USER_AGENT,
  DEFAULT_LOG_LEVEL,
  resolveConfig,
  loadConfigFromEnv,
} from './config/index.js';
export type { CoreConfig, CoreConfigInput } from './config/index.js';

// Logging
export * from './observability/index.js';
