/**
 * Descriptors for a handful of well-known APIs. The endpoint topology is
 * supplied by the caller.
 *
 * @module service/known
 */

import {
  defineService,
  type EndpointTopology,
  type ServiceDescriptor,
  type ServiceDescriptorInput,
} from './descriptor.js';

type ServiceTemplate = Omit<ServiceDescriptorInput, 'topology'>;

const KNOWN_SERVICES = {
  dynamodb: {
    endpointPrefix: 'dynamodb',
    apiVersion: '2012-08-10',
    protocol: 'json',
    jsonVersion: '1.0',
    targetPrefix: 'DynamoDB_20120810',
  },
  logs: {
    endpointPrefix: 'logs',
    apiVersion: '2014-03-28',
    protocol: 'json',
    jsonVersion: '1.1',
    targetPrefix: 'Logs_20140328',
  },
  sts: {
    endpointPrefix: 'sts',
    apiVersion: '2011-06-15',
    protocol: 'query',
  },
  sqs: {
    endpointPrefix: 'sqs',
    apiVersion: '2012-11-05',
    protocol: 'query',
  },
  iam: {
    endpointPrefix: 'iam',
    apiVersion: '2010-05-08',
    protocol: 'query',
    regionRule: { kind: 'fixed', region: 'us-east-1' },
  },
  ec2: {
    endpointPrefix: 'ec2',
    apiVersion: '2016-11-15',
    protocol: 'ec2',
  },
  s3: {
    endpointPrefix: 's3',
    apiVersion: '2006-03-01',
    protocol: 'rest-xml',
    xmlNamespace: 'http://s3.amazonaws.com/doc/2006-03-01/',
  },
  sesv2: {
    endpointPrefix: 'email',
    apiVersion: '2019-09-27',
    protocol: 'rest-json',
    signingName: 'ses',
  },
} as const satisfies Record<string, ServiceTemplate>;

export type KnownServiceName = keyof typeof KNOWN_SERVICES;

/**
 * Build the descriptor of a well-known API for the given topology.
 *
 * @example
 * ```typescript
 * const sts = knownService('sts', { kind: 'global' });
 * ```
 */
export function knownService(name: KnownServiceName, topology: EndpointTopology): ServiceDescriptor {
  return defineService({ ...KNOWN_SERVICES[name], topology });
}

/**
 * Names of the APIs {@link knownService} can build.
 */
export function knownServiceNames(): KnownServiceName[] {
  return Object.keys(KNOWN_SERVICES).filter(isKnownServiceName);
}

export function isKnownServiceName(name: string): name is KnownServiceName {
  return Object.prototype.hasOwnProperty.call(KNOWN_SERVICES, name);
}
