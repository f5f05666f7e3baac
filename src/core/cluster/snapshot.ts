/**
 * Immutable cluster snapshots
 */

import { type } from 'arktype';
import { ClusterValidationError } from '../errors.js';
import type { ClusterSnapshot, PublicSubnet } from '../types/cluster.js';
import { ClusterDeclarationSchema } from './schema.js';

/**
 * Recursively freeze a value so later writes throw instead of leaking into
 * snapshots other steps still hold
 */
export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

/**
 * Validate a cluster declaration and return it as a frozen snapshot.
 * The input is copied, never frozen itself.
 */
export function createClusterSnapshot(input: unknown, source?: string): ClusterSnapshot {
  const result = ClusterDeclarationSchema(input);

  if (result instanceof type.errors) {
    throw new ClusterValidationError(
      `Invalid cluster declaration${source ? ` in ${source}` : ''}: ${result.summary}`,
      result.map((problem) => problem.message),
      source
    );
  }

  const seen = new Set<string>();
  const duplicates: string[] = [];
  for (const subnet of result.network.publicSubnets) {
    if (seen.has(subnet.name)) {
      duplicates.push(subnet.name);
    }
    seen.add(subnet.name);
  }
  if (duplicates.length > 0) {
    throw new ClusterValidationError(
      `Duplicate public subnet names in cluster '${result.name}': ${duplicates.join(', ')}`,
      duplicates.map((name) => `network.publicSubnets: duplicate name '${name}'`),
      source
    );
  }

  const publicSubnets: PublicSubnet[] = result.network.publicSubnets.map((subnet) => ({
    name: subnet.name,
    identifier: subnet.identifier ?? '',
    cidr: subnet.cidr,
    zone: subnet.zone,
  }));

  return deepFreeze({
    name: result.name,
    network: {
      identifier: result.network.identifier ?? '',
      cidr: result.network.cidr,
      publicSubnets,
    },
  });
}

/**
 * Look a public subnet up by its logical name
 */
export function findPublicSubnet(
  snapshot: ClusterSnapshot,
  name: string
): PublicSubnet | undefined {
  return snapshot.network.publicSubnets.find((subnet) => subnet.name === name);
}
