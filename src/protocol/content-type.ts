/**
 * Content negotiation per protocol family.
 *
 * @module protocol/content-type
 */

import type { ProtocolFamily, ServiceDescriptor } from '../service/index.js';

export const FORM_CONTENT_TYPE = 'application/x-www-form-urlencoded; charset=utf-8';
export const XML_CONTENT_TYPE = 'application/xml';
export const JSON_CONTENT_TYPE = 'application/json';

/**
 * Content type of JSON bodies sent to this service.
 *
 * @example
 * ```typescript
 * jsonContentType(dynamodb); // 'application/x-amz-json-1.0'
 * jsonContentType(sesv2); // 'application/json'
 * ```
 */
export function jsonContentType(descriptor: ServiceDescriptor): string {
  if (descriptor.protocol === 'json') {
    return `application/x-amz-json-${descriptor.jsonVersion ?? '1.0'}`;
  }
  return JSON_CONTENT_TYPE;
}

/**
 * `Accept` header value for responses of a protocol family.
 */
export function acceptFor(protocol: ProtocolFamily): string {
  switch (protocol) {
    case 'json':
    case 'rest-json':
      return JSON_CONTENT_TYPE;
    case 'query':
    case 'ec2':
    case 'rest-xml':
      return XML_CONTENT_TYPE;
  }
}
