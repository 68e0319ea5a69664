import { isPlainObject } from '../common/utils';
import {
  CLUSTER_NAME_PREFIX,
  DEFAULT_RPC_ADDRESS,
  EC2_SNITCH,
  InstanceMetadata,
  SIMPLE_SEED_PROVIDER,
  SeedProviderEntry
} from '../types';

export interface MergeContext {
  metadata: InstanceMetadata;
  /** Source of the cluster name suffix */
  generateId: () => string;
}

/**
 * Default for one top-level scylla.yaml key, used when the operator did
 * not override it. `apply` receives the template's current value.
 */
export interface MergeRule {
  readonly key: string;
  readonly description: string;
  apply(current: unknown, context: MergeContext): unknown;
}

/**
 * Patch the seed address of the template's first provider entry, or
 * install a SimpleSeedProvider when the template has none.
 */
export function patchSeedProvider(current: unknown, address: string): unknown[] {
  if (Array.isArray(current) && current.length > 0) {
    const [first, ...rest] = current;
    if (isPlainObject(first) && Array.isArray(first.parameters) && isPlainObject(first.parameters[0])) {
      const [firstParams, ...otherParams] = first.parameters;
      return [{ ...first, parameters: [{ ...firstParams, seeds: address }, ...otherParams] }, ...rest];
    }
  }

  const entry: SeedProviderEntry = { class_name: SIMPLE_SEED_PROVIDER, parameters: [{ seeds: address }] };
  return [entry];
}

export const MERGE_RULES: readonly MergeRule[] = [
  {
    key: 'cluster_name',
    description: 'generated per run',
    apply: (_current, { generateId }) => `${CLUSTER_NAME_PREFIX}${generateId()}`
  },
  {
    key: 'experimental',
    description: 'experimental features off',
    apply: () => false
  },
  {
    key: 'auto_bootstrap',
    description: 'join the ring on start',
    apply: () => true
  },
  {
    key: 'listen_address',
    description: 'private IPv4',
    apply: (_current, { metadata }) => metadata.privateIpv4
  },
  {
    key: 'broadcast_rpc_address',
    description: 'private IPv4',
    apply: (_current, { metadata }) => metadata.privateIpv4
  },
  {
    key: 'endpoint_snitch',
    description: 'cloud-aware snitch',
    apply: () => EC2_SNITCH
  },
  {
    key: 'rpc_address',
    description: 'listen on all interfaces',
    apply: () => DEFAULT_RPC_ADDRESS
  },
  {
    key: 'seed_provider',
    description: 'template seed set to private IPv4',
    apply: (current, { metadata }) => patchSeedProvider(current, metadata.privateIpv4)
  }
];

export const RULE_KEYS: ReadonlySet<string> = new Set(MERGE_RULES.map(rule => rule.key));
