/**
 * Service Descriptor
 *
 * Immutable per-API configuration: protocol family, signing scheme, endpoint
 * topology and the named strategies used to resolve host and signing region.
 * Descriptors are plain data, validated once with zod and frozen.
 *
 * @module service/descriptor
 */

import { z } from 'zod';
import { ConfigurationError } from '../error/index.js';

/**
 * Wire shape an API uses for requests and responses.
 */
export const ProtocolFamilySchema = z.enum(['json', 'query', 'ec2', 'rest-json', 'rest-xml']);
export type ProtocolFamily = z.infer<typeof ProtocolFamilySchema>;

/**
 * Request signing scheme. Only `v4` has a signer; `v2` is the provider's
 * legacy scheme and is rejected at dispatch.
 */
export const SigningSchemeSchema = z.enum(['v4', 'v2']);
export type SigningScheme = z.infer<typeof SigningSchemeSchema>;

/**
 * Whether the API is served from one global endpoint or per region.
 */
export const EndpointTopologySchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('global') }),
  z.object({
    kind: z.literal('regional'),
    region: z.string().regex(/^[a-z0-9-]+$/, 'Region must be lowercase letters, digits and dashes'),
  }),
]);
export type EndpointTopology = z.infer<typeof EndpointTopologySchema>;

/**
 * Named host resolution strategies.
 *
 * - `standard`: `prefix.amazonaws.com` / `prefix.region.amazonaws.com`
 * - `dashed`: `prefix-region.amazonaws.com`, with `us-east-1` on the bare host
 * - `fixed`: an explicit host, e.g. a VPC endpoint or a local emulator
 */
export const HostRuleSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('standard') }),
  z.object({ kind: z.literal('dashed') }),
  z.object({ kind: z.literal('fixed'), host: z.string().min(1) }),
]);
export type HostRule = z.infer<typeof HostRuleSchema>;

/**
 * Named signing-region resolution strategies.
 *
 * - `endpoint`: the topology's region, or `globalRegion` for global endpoints
 * - `fixed`: always sign for the given region
 */
export const RegionRuleSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('endpoint'),
    globalRegion: z.string().min(1).default('us-east-1'),
  }),
  z.object({ kind: z.literal('fixed'), region: z.string().min(1) }),
]);
export type RegionRule = z.infer<typeof RegionRuleSchema>;

export const ServiceDescriptorSchema = z
  .object({
    /** DNS label of the service endpoint, also the default signing name */
    endpointPrefix: z.string().regex(/^[a-z0-9][a-z0-9.-]*$/, 'Invalid endpoint prefix'),
    apiVersion: z.string().min(1),
    protocol: ProtocolFamilySchema,
    signingScheme: SigningSchemeSchema.default('v4'),
    /** `application/x-amz-json-<version>` for the JSON protocol */
    jsonVersion: z.enum(['1.0', '1.1']).optional(),
    /** Overrides the endpoint prefix in the credential scope */
    signingName: z.string().min(1).optional(),
    /** Prefix of the `x-amz-target` header (JSON protocol) */
    targetPrefix: z.string().min(1).optional(),
    /** Namespace placed on REST+XML request bodies */
    xmlNamespace: z.string().url().optional(),
    topology: EndpointTopologySchema,
    hostRule: HostRuleSchema.default({ kind: 'standard' }),
    regionRule: RegionRuleSchema.default({ kind: 'endpoint', globalRegion: 'us-east-1' }),
  })
  .superRefine((descriptor, ctx) => {
    if (descriptor.protocol === 'json' && descriptor.targetPrefix === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['targetPrefix'],
        message: 'JSON protocol services require a target prefix',
      });
    }
  });

/**
 * Descriptor fields as accepted by {@link defineService}; defaults applied on parse.
 */
export type ServiceDescriptorInput = z.input<typeof ServiceDescriptorSchema>;

export type ServiceDescriptor = Readonly<z.output<typeof ServiceDescriptorSchema>>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Validate and freeze a service descriptor.
 *
 * @throws {ConfigurationError} If the descriptor is invalid
 *
 * @example
 * ```typescript
 * const dynamodb = defineService({
 *   endpointPrefix: 'dynamodb',
 *   apiVersion: '2012-08-10',
 *   protocol: 'json',
 *   jsonVersion: '1.0',
 *   targetPrefix: 'DynamoDB_20120810',
 *   topology: { kind: 'regional', region: 'eu-west-1' },
 * });
 * ```
 */
export function defineService(input: ServiceDescriptorInput): ServiceDescriptor {
  const parsed = ServiceDescriptorSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid service descriptor: ${formatIssues(parsed.error)}`);
  }

  const descriptor = parsed.data;
  return Object.freeze({
    ...descriptor,
    topology: Object.freeze(descriptor.topology),
    hostRule: Object.freeze(descriptor.hostRule),
    regionRule: Object.freeze(descriptor.regionRule),
  });
}

/**
 * Copy a descriptor onto a different endpoint topology.
 */
export function withTopology(
  descriptor: ServiceDescriptor,
  topology: EndpointTopology
): ServiceDescriptor {
  return defineService({ ...descriptor, topology });
}
