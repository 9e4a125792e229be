/**
 * AWS Signature Version 4 (SigV4) Implementation
 *
 * Implements the AWS Signature Version 4 signing process. Signing is a pure,
 * synchronous computation: every call derives its key and signature from the
 * timestamp it is given and nothing is cached between calls.
 *
 * @see https://docs.aws.amazon.com/IAM/latest/UserGuide/reference_sigv-create-signed-request.html
 */

import { createHash, createHmac } from 'crypto';
import { canonicalQueryString } from '../encoding/index.js';
import type { HeaderPair } from '../http/types.js';
import { canonicalHeaders, buildCanonicalRequest } from './canonical.js';
import type { SigningInput, SigningResult } from './types.js';

/**
 * AWS Signature V4 algorithm identifier.
 */
export const ALGORITHM = 'AWS4-HMAC-SHA256';

/**
 * Termination string for signing key derivation.
 */
const AWS4_REQUEST = 'aws4_request';

export const AMZ_DATE_HEADER = 'x-amz-date';
export const CONTENT_SHA256_HEADER = 'x-amz-content-sha256';
export const SECURITY_TOKEN_HEADER = 'x-amz-security-token';
export const AUTHORIZATION_HEADER = 'authorization';

/**
 * Headers the signer owns; caller-supplied copies are replaced.
 */
const SIGNER_HEADERS = new Set([
  'host',
  AMZ_DATE_HEADER,
  CONTENT_SHA256_HEADER,
  SECURITY_TOKEN_HEADER,
  AUTHORIZATION_HEADER,
]);

/**
 * Hex-encoded SHA-256 hash of data.
 */
export function sha256Hex(data: Uint8Array | string): string {
  return createHash('sha256').update(data).digest('hex');
}

function hmacSha256(key: Uint8Array | string, data: string): Buffer {
  return createHmac('sha256', key).update(data, 'utf8').digest();
}

/**
 * Format a date as ISO 8601 basic format with time (YYYYMMDDTHHMMSSZ).
 *
 * @example
 * ```typescript
 * formatAmzDate(new Date('2015-08-30T12:36:00Z')); // '20150830T123600Z'
 * ```
 */
export function formatAmzDate(date: Date): string {
  return date.toISOString().replace(/[:-]|\.\d{3}/g, '');
}

/**
 * Credential scope: `date/region/service/aws4_request`.
 */
export function credentialScope(date: string, region: string, service: string): string {
  return `${date}/${region}/${service}/${AWS4_REQUEST}`;
}

/**
 * Derive the signing key from AWS credentials.
 *
 * 1. kDate = HMAC-SHA256("AWS4" + SecretAccessKey, Date)
 * 2. kRegion = HMAC-SHA256(kDate, Region)
 * 3. kService = HMAC-SHA256(kRegion, Service)
 * 4. kSigning = HMAC-SHA256(kService, "aws4_request")
 *
 * @param secret - AWS secret access key
 * @param date - Date in YYYYMMDD format
 */
export function deriveSigningKey(
  secret: string,
  date: string,
  region: string,
  service: string
): Buffer {
  const kDate = hmacSha256(`AWS4${secret}`, date);
  const kRegion = hmacSha256(kDate, region);
  const kService = hmacSha256(kRegion, service);
  return hmacSha256(kService, AWS4_REQUEST);
}

/**
 * Create the string to sign.
 *
 * Format:
 * ```
 * Algorithm + '\n' +
 * RequestDateTime + '\n' +
 * CredentialScope + '\n' +
 * HashedCanonicalRequest
 * ```
 */
export function createStringToSign(
  datetime: string,
  scope: string,
  canonicalRequestHash: string
): string {
  return [ALGORITHM, datetime, scope, canonicalRequestHash].join('\n');
}

/**
 * Hex-encoded HMAC-SHA256 of the string to sign.
 */
export function calculateSignature(signingKey: Uint8Array, stringToSign: string): string {
  return createHmac('sha256', signingKey).update(stringToSign, 'utf8').digest('hex');
}

/**
 * Build the Authorization header value.
 *
 * Format:
 * ```
 * AWS4-HMAC-SHA256 Credential=AccessKeyId/CredentialScope,
 * SignedHeaders=SignedHeaders, Signature=Signature
 * ```
 */
export function buildAuthorizationHeader(
  accessKeyId: string,
  scope: string,
  signedHeaders: string,
  signature: string
): string {
  return [
    `${ALGORITHM} Credential=${accessKeyId}/${scope}`,
    `SignedHeaders=${signedHeaders}`,
    `Signature=${signature}`,
  ].join(', ');
}

/**
 * Sign a request using AWS Signature Version 4.
 *
 * This function:
 * 1. Hashes the payload
 * 2. Adds `host`, `x-amz-date` and `x-amz-content-sha256` (and
 *    `x-amz-security-token` for temporary credentials)
 * 3. Creates the canonical request and string to sign
 * 4. Derives the signing key and calculates the signature
 * 5. Appends the `authorization` header, with the session token last
 *
 * @example
 * ```typescript
 * const result = signV4({
 *   method: 'GET',
 *   host: 'sts.amazonaws.com',
 *   path: '/',
 *   query: [['Action', 'GetCallerIdentity'], ['Version', '2011-06-15']],
 *   headers: [],
 *   payload: '',
 *   region: 'us-east-1',
 *   service: 'sts',
 *   credentials,
 *   timestamp: new Date(),
 * });
 * // result.headers now carries the authorization header
 * ```
 */
export function signV4(input: SigningInput): SigningResult {
  const amzDate = formatAmzDate(input.timestamp);
  const date = amzDate.slice(0, 8);
  const payloadHash = sha256Hex(input.payload);

  const callerHeaders = input.headers.filter(
    ([name]) => !SIGNER_HEADERS.has(name.trim().toLowerCase())
  );
  const baseHeaders: HeaderPair[] = [
    ...callerHeaders,
    ['host', input.host],
    [AMZ_DATE_HEADER, amzDate],
    [CONTENT_SHA256_HEADER, payloadHash],
  ];
  const tokenHeaders: HeaderPair[] =
    input.credentials.sessionToken !== undefined
      ? [[SECURITY_TOKEN_HEADER, input.credentials.sessionToken]]
      : [];

  const { canonical, signed } = canonicalHeaders([...baseHeaders, ...tokenHeaders]);

  const canonicalRequest = buildCanonicalRequest({
    method: input.method,
    uri: input.path,
    query: canonicalQueryString(input.query),
    headers: canonical,
    signedHeaders: signed,
    payloadHash,
  });

  const scope = credentialScope(date, input.region, input.service);
  const stringToSign = createStringToSign(amzDate, scope, sha256Hex(canonicalRequest));

  const signingKey = deriveSigningKey(
    input.credentials.secretAccessKey,
    date,
    input.region,
    input.service
  );
  const signature = calculateSignature(signingKey, stringToSign);

  const authorization = buildAuthorizationHeader(
    input.credentials.accessKeyId,
    scope,
    signed,
    signature
  );

  return {
    headers: [...baseHeaders, [AUTHORIZATION_HEADER, authorization], ...tokenHeaders],
    authorization,
    signature,
    signedHeaders: signed,
    credentialScope: scope,
    canonicalRequest,
    stringToSign,
    amzDate,
    payloadHash,
  };
}
