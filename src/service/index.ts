/**
 * Service descriptors and endpoint resolution.
 *
 * @module service
 */

export {
  ProtocolFamilySchema,
  SigningSchemeSchema,
  EndpointTopologySchema,
  HostRuleSchema,
  RegionRuleSchema,
  ServiceDescriptorSchema,
  defineService,
  withTopology,
} from './descriptor.js';
export type {
  ProtocolFamily,
  SigningScheme,
  EndpointTopology,
  HostRule,
  RegionRule,
  ServiceDescriptor,
  ServiceDescriptorInput,
} from './descriptor.js';

export { resolveHost, resolveRegion, signingServiceName } from './endpoint.js';

export { knownService, knownServiceNames, isKnownServiceName } from './known.js';
export type { KnownServiceName } from './known.js';
