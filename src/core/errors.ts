/**
 * Error types raised by the reconciliation core.
 *
 * Provider transport and API errors are never wrapped: they reach the caller
 * exactly as the gateway raised them. Everything below describes a failure the
 * core itself detected.
 */

export class ReconcileError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ReconcileError';
  }
}

/**
 * A lookup that must resolve exactly one provider object matched zero or several.
 */
export class AmbiguousLookupError extends ReconcileError {
  constructor(
    message: string,
    public readonly count: number,
    public readonly filterKey: string,
    public readonly filterValue: string
  ) {
    super(message, 'AMBIGUOUS_LOOKUP', { count, filterKey, filterValue });
    this.name = 'AmbiguousLookupError';
  }
}

/**
 * An operation that needs a provider identifier was handed a resource without one.
 */
export class MissingIdentifierError extends ReconcileError {
  constructor(
    message: string,
    public readonly resourceKind: string,
    public readonly resourceName: string,
    public readonly operation: string
  ) {
    super(message, 'MISSING_IDENTIFIER', { resourceKind, resourceName, operation });
    this.name = 'MissingIdentifierError';
  }
}

/**
 * A sibling resource could not be found in the cluster snapshot.
 */
export class DependencyResolutionError extends ReconcileError {
  constructor(
    message: string,
    public readonly fromResource: string,
    public readonly dependencyKind: string,
    public readonly dependencyName: string,
    public readonly available: string[] = []
  ) {
    super(message, 'DEPENDENCY_RESOLUTION', {
      fromResource,
      dependencyKind,
      dependencyName,
      available,
    });
    this.name = 'DependencyResolutionError';
  }
}

export class ResourceTagError extends ReconcileError {
  constructor(
    message: string,
    public readonly identifier: string,
    public override readonly cause: unknown
  ) {
    super(message, 'TAG_FAILED', { identifier });
    this.name = 'ResourceTagError';
  }
}

export class ComparisonError extends ReconcileError {
  constructor(
    message: string,
    public readonly actualKind: string,
    public readonly expectedKind: string
  ) {
    super(message, 'COMPARISON_FAILED', { actualKind, expectedKind });
    this.name = 'ComparisonError';
  }
}

/**
 * The provider answered, but without a field the gateway cannot do without.
 */
export class ProviderResponseError extends ReconcileError {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly field: string
  ) {
    super(message, 'PROVIDER_RESPONSE', { operation, field });
    this.name = 'ProviderResponseError';
  }
}

export class ClusterValidationError extends ReconcileError {
  constructor(
    message: string,
    public readonly problems: string[],
    public readonly source?: string
  ) {
    super(message, 'CLUSTER_VALIDATION', { problems, source });
    this.name = 'ClusterValidationError';
  }
}

export class ConfigurationError extends ReconcileError {
  constructor(
    message: string,
    public readonly setting: string
  ) {
    super(message, 'CONFIGURATION', { setting });
    this.name = 'ConfigurationError';
  }
}

/**
 * Format a lookup that found the wrong number of provider objects
 */
export function formatAmbiguousLookupError(
  objectKind: string,
  count: number,
  filterKey: string,
  filterValue: string
): AmbiguousLookupError {
  return new AmbiguousLookupError(
    `Found [${count}] ${objectKind} for tag [${filterKey}=${filterValue}], expected exactly 1`,
    count,
    filterKey,
    filterValue
  );
}

/**
 * Normalize anything thrown into an Error instance
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
