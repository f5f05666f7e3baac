/**
 * Structural comparison of actual and expected resource states
 */

import { ComparisonError } from './errors.js';
import type { TagMap } from './tags.js';
import type { ResourceShared } from './types/resource.js';

export type ComparableResource = ResourceShared & { readonly kind: string };

export function tagsEqual(left: TagMap, right: TagMap): boolean {
  const leftKeys = Object.keys(left);
  if (leftKeys.length !== Object.keys(right).length) {
    return false;
  }
  return leftKeys.every((key) => Object.hasOwn(right, key) && right[key] === left[key]);
}

/**
 * Report whether two states of the same kind describe the same provider object.
 * Throws {@link ComparisonError} when the kinds differ.
 */
export function compareResources(
  actual: ComparableResource,
  expected: ComparableResource
): boolean {
  if (actual.kind !== expected.kind) {
    throw new ComparisonError(
      `Cannot compare ${actual.kind} '${actual.name}' with ${expected.kind} '${expected.name}'`,
      actual.kind,
      expected.kind
    );
  }

  return (
    actual.name === expected.name &&
    actual.identifier === expected.identifier &&
    tagsEqual(actual.tags, expected.tags)
  );
}
