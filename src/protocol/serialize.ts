/**
 * Protocol-specific request shaping: the JSON target header and the form and
 * XML body encodings.
 *
 * @module protocol/serialize
 */

import { XMLBuilder } from 'fast-xml-parser';
import { Body } from '../body/index.js';
import { encodeQuery, type QueryPair } from '../encoding/index.js';
import type { HeaderPair } from '../http/types.js';
import type { ServiceDescriptor } from '../service/index.js';
import { FORM_CONTENT_TYPE, XML_CONTENT_TYPE } from './content-type.js';

export const TARGET_HEADER = 'x-amz-target';

/**
 * Builder options for REST+XML request bodies
 */
const BUILDER_OPTIONS = {
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  textNodeName: '#text',
  format: false,
  suppressEmptyNode: true,
};

/**
 * `x-amz-target` header naming the operation, for JSON protocol services.
 *
 * @returns The header pair, or undefined for other protocols
 *
 * @example
 * ```typescript
 * targetHeader(dynamodb, 'GetItem'); // ['x-amz-target', 'DynamoDB_20120810.GetItem']
 * ```
 */
export function targetHeader(descriptor: ServiceDescriptor, operation: string): HeaderPair | undefined {
  if (descriptor.protocol !== 'json' || descriptor.targetPrefix === undefined) {
    return undefined;
  }
  return [TARGET_HEADER, `${descriptor.targetPrefix}.${operation}`];
}

/**
 * Form-encoded body for the query and EC2 protocols.
 *
 * `Action` and `Version` come first, then `params` in the order given.
 *
 * @example
 * ```typescript
 * queryBody(sqs, 'ListQueues', [['QueueNamePrefix', 'jobs']]);
 * // text: 'Action=ListQueues&Version=2012-11-05&QueueNamePrefix=jobs'
 * ```
 */
export function queryBody(
  descriptor: ServiceDescriptor,
  operation: string,
  params: Iterable<QueryPair> = []
): Body {
  const pairs: QueryPair[] = [
    ['Action', operation],
    ['Version', descriptor.apiVersion],
    ...params,
  ];
  return Body.text(encodeQuery(pairs).render('insertion'), FORM_CONTENT_TYPE);
}

/**
 * XML body for REST+XML services, namespaced with the descriptor's
 * `xmlNamespace` when it has one.
 *
 * @example
 * ```typescript
 * xmlBody(s3, 'VersioningConfiguration', { Status: 'Enabled' });
 * // <VersioningConfiguration xmlns="http://s3.amazonaws.com/doc/2006-03-01/"><Status>Enabled</Status></VersioningConfiguration>
 * ```
 */
export function xmlBody(
  descriptor: ServiceDescriptor,
  rootName: string,
  content: Record<string, unknown>
): Body {
  const root: Record<string, unknown> =
    descriptor.xmlNamespace !== undefined
      ? { '@_xmlns': descriptor.xmlNamespace, ...content }
      : { ...content };

  const xml: string = new XMLBuilder(BUILDER_OPTIONS).build({ [rootName]: root });
  return Body.text(xml, XML_CONTENT_TYPE);
}
