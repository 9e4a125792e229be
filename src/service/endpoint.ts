/**
 * Endpoint resolution.
 *
 * Host and signing region are derived from the descriptor's topology through
 * its named rules. Both resolvers are total.
 *
 * @module service/endpoint
 */

import type { ServiceDescriptor } from './descriptor.js';

function dnsSuffix(region: string): string {
  return region.startsWith('cn-') ? 'amazonaws.com.cn' : 'amazonaws.com';
}

/**
 * Resolve the host name requests are sent to.
 *
 * @example
 * ```typescript
 * resolveHost(sqs); // 'sqs.eu-west-1.amazonaws.com'
 * ```
 */
export function resolveHost(descriptor: ServiceDescriptor): string {
  const { endpointPrefix: prefix, hostRule, topology } = descriptor;

  switch (hostRule.kind) {
    case 'fixed':
      return hostRule.host;
    case 'dashed':
      if (topology.kind === 'global' || topology.region === 'us-east-1') {
        return `${prefix}.amazonaws.com`;
      }
      return `${prefix}-${topology.region}.${dnsSuffix(topology.region)}`;
    case 'standard':
      if (topology.kind === 'global') {
        return `${prefix}.amazonaws.com`;
      }
      return `${prefix}.${topology.region}.${dnsSuffix(topology.region)}`;
  }
}

/**
 * Resolve the region placed in the credential scope.
 */
export function resolveRegion(descriptor: ServiceDescriptor): string {
  const { regionRule, topology } = descriptor;

  if (regionRule.kind === 'fixed') {
    return regionRule.region;
  }
  return topology.kind === 'regional' ? topology.region : regionRule.globalRegion;
}

/**
 * Service name placed in the credential scope.
 */
export function signingServiceName(descriptor: ServiceDescriptor): string {
  return descriptor.signingName ?? descriptor.endpointPrefix;
}
