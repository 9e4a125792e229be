/**
 * AWS Signature Version 4 Signing Module
 *
 * @example Basic usage
 * ```typescript
 * import { signV4 } from './signing/index.js';
 *
 * const { headers } = signV4({
 *   method: 'POST',
 *   host: 'dynamodb.us-east-1.amazonaws.com',
 *   path: '/',
 *   query: [],
 *   headers: [['x-amz-target', 'DynamoDB_20120810.ListTables']],
 *   payload: '{}',
 *   region: 'us-east-1',
 *   service: 'dynamodb',
 *   credentials: { accessKeyId: 'AKIDEXAMPLE', secretAccessKey: 'test-secret' },
 *   timestamp: new Date(),
 * });
 * ```
 *
 * @module signing
 */

// Core signing functionality
export {
  signV4,
  sha256Hex,
  formatAmzDate,
  credentialScope,
  deriveSigningKey,
  createStringToSign,
  calculateSignature,
  buildAuthorizationHeader,
  ALGORITHM,
  AMZ_DATE_HEADER,
  CONTENT_SHA256_HEADER,
  SECURITY_TOKEN_HEADER,
  AUTHORIZATION_HEADER,
} from './v4.js';

// Canonical request utilities
export { canonicalHeaders, buildCanonicalRequest } from './canonical.js';

// Type definitions
export type {
  AwsCredentials,
  SigningInput,
  SigningResult,
  CanonicalRequest,
} from './types.js';
