/**
 * Instance facts read from the metadata endpoint, fetched once per run
 */
export interface InstanceMetadata {
  readonly privateIpv4: string;
  /** Raw user-data body; absent when the endpoint answered 404 */
  readonly rawUserData?: string;
}

/**
 * Parsed scylla.yaml document. Key order follows the template file.
 */
export type ServiceConfig = Record<string, unknown>;

/** Seed provider entry in Cassandra-style layout */
export interface SeedProviderEntry {
  class_name: string;
  parameters: Array<{ seeds: string } & Record<string, unknown>>;
}

export const SIMPLE_SEED_PROVIDER = 'org.apache.cassandra.locator.SimpleSeedProvider';
export const EC2_SNITCH = 'org.apache.cassandra.locator.Ec2Snitch';
export const CLUSTER_NAME_PREFIX = 'scylladb-cluster-';
export const DEFAULT_RPC_ADDRESS = '0.0.0.0';

/** Keys the merge guarantees to be present and non-null after a run */
export const REQUIRED_KEYS = [
  'cluster_name',
  'listen_address',
  'broadcast_rpc_address',
  'rpc_address',
  'endpoint_snitch',
  'seed_provider'
] as const;

export type RequiredKey = typeof REQUIRED_KEYS[number];
