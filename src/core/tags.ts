/**
 * Tag convention shared by every resource kind.
 *
 * Provider objects carry no foreign keys to each other, so these tags are the
 * only durable link between a route table, its subnet and the cluster. The key
 * strings are part of the wire contract and must round-trip unchanged.
 */

import type { ProviderTag, TagFilter } from './provider/types.js';

export const NAME_TAG = 'Name';
export const CLUSTER_TAG = 'KubernetesCluster';
export const PUBLIC_ROUTE_TABLE_SUBNET_PAIR_TAG = 'kubicorn-public-route-table-subnet-pair';
export const INTERNET_GATEWAY_NAME_TAG = 'kubicorn-internet-gateway-name';

export type TagMap = Readonly<Record<string, string>>;

/**
 * Build a provider list filter matching objects tagged `key=value`
 */
export function tagFilter(key: string, value: string): TagFilter {
  return { name: `tag:${key}`, values: [value] };
}

/**
 * Collapse a provider tag list into a map. Later duplicates win.
 */
export function tagsFromProvider(tags: readonly ProviderTag[] | undefined): Record<string, string> {
  const result: Record<string, string> = {};
  for (const tag of tags ?? []) {
    result[tag.key] = tag.value;
  }
  return result;
}

export function tagsToProvider(tags: TagMap): ProviderTag[] {
  return Object.entries(tags).map(([key, value]) => ({ key, value }));
}
