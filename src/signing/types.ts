/**
 * AWS Signature V4 Signing Types
 *
 * Type definitions for AWS request signing functionality.
 */

import type { QueryPair } from '../encoding/index.js';
import type { HeaderPair, HttpMethod } from '../http/types.js';

/**
 * AWS credentials for signing requests. Supplied by the caller on every
 * call and never stored.
 */
export interface AwsCredentials {
  readonly accessKeyId: string;
  readonly secretAccessKey: string;
  readonly sessionToken?: string;
}

/**
 * Everything needed to sign one request.
 */
export interface SigningInput {
  method: HttpMethod;
  /** Host the request is sent to; becomes the `host` header */
  host: string;
  /** Percent-safe request path */
  path: string;
  /** Raw (unencoded) query pairs */
  query: ReadonlyArray<QueryPair>;
  /** Caller and protocol headers */
  headers: ReadonlyArray<HeaderPair>;
  /** Body bytes (or text) exactly as they will be sent */
  payload: Uint8Array | string;
  /** Region in the credential scope */
  region: string;
  /** Service name in the credential scope */
  service: string;
  credentials: AwsCredentials;
  /** Signing time; the caller reads the clock */
  timestamp: Date;
}

/**
 * Canonical request components.
 */
export interface CanonicalRequest {
  /** HTTP method */
  method: string;
  /** Canonical URI path */
  uri: string;
  /** Canonical query string */
  query: string;
  /** Canonical headers string, each line ending in `\n` */
  headers: string;
  /** Signed headers list */
  signedHeaders: string;
  /** Payload hash */
  payloadHash: string;
}

/**
 * Output of {@link signV4}.
 */
export interface SigningResult {
  /** Final header list: caller headers, signing headers, authorization, token */
  headers: HeaderPair[];
  authorization: string;
  signature: string;
  signedHeaders: string;
  credentialScope: string;
  canonicalRequest: string;
  stringToSign: string;
  amzDate: string;
  payloadHash: string;
}
