/**
 * Cluster snapshot types
 *
 * A snapshot is an immutable, point-in-time description of a cluster's declared
 * and observed topology. Phases never modify one in place; they hand back a
 * snapshot (often the very same value) for the next step.
 */

export interface PublicSubnet {
  readonly name: string;
  /** Provider subnet id, empty until the subnet exists */
  readonly identifier: string;
  readonly cidr?: string | undefined;
  readonly zone?: string | undefined;
}

export interface ClusterNetwork {
  /** Provider VPC id */
  readonly identifier: string;
  readonly cidr?: string | undefined;
  readonly publicSubnets: readonly PublicSubnet[];
}

export interface ClusterSnapshot {
  readonly name: string;
  readonly network: ClusterNetwork;
}
