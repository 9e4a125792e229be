/**
 * Response classification and decoding.
 *
 * @module response
 */

export {
  classifyStatus,
  responseMetadata,
  extractRequestId,
  bodyText,
} from './metadata.js';
export type { ResponseClass, ResponseMetadata } from './metadata.js';

export { ResponsePayload, parseXml } from './payload.js';

export {
  FullDecoder,
  StructuredDecoder,
  BodyDecoder,
  ConstantDecoder,
} from './decoder.js';
export type { ResponseDecoder } from './decoder.js';

export {
  AwsJsonErrorDecoder,
  AwsXmlErrorDecoder,
  noErrorDecoder,
  errorDecoderFor,
  isRetryableError,
  normalizeErrorCode,
} from './errors.js';
export type { ErrorDecoder, AwsApiError } from './errors.js';
