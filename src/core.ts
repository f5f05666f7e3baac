/**
 * Core reconciliation functionality
 */

// =============================================================================
// Cluster Snapshots
// =============================================================================
export {
  type ClusterDeclaration,
  ClusterDeclarationSchema,
  createClusterSnapshot,
  deepFreeze,
  findPublicSubnet,
  loadClusterDeclaration,
  parseClusterDeclaration,
  PublicSubnetSchema,
} from './core/cluster/index.js';
// =============================================================================
// Comparison
// =============================================================================
export { type ComparableResource, compareResources, tagsEqual } from './core/compare.js';
// =============================================================================
// Configuration
// =============================================================================
export {
  getReconcilerConfigFromEnv,
  type ReconcilerConfig,
  resolveReconcilerConfig,
  validateReconcilerConfig,
} from './core/config/index.js';
// =============================================================================
// Error Classes and Utilities
// =============================================================================
export {
  AmbiguousLookupError,
  ClusterValidationError,
  ComparisonError,
  ConfigurationError,
  DependencyResolutionError,
  formatAmbiguousLookupError,
  MissingIdentifierError,
  ProviderResponseError,
  ReconcileError,
  ResourceTagError,
  toError,
} from './core/errors.js';
// =============================================================================
// Logging Module
// =============================================================================
export {
  createContextLogger,
  createLogger,
  getComponentLogger,
  getReconcileLogger,
  getResourceLogger,
  type LogLevel,
  type LoggerConfig,
  type LoggerContext,
  logger,
  type ReconcilerLogger,
} from './core/logging/index.js';
// =============================================================================
// Provider Gateway
// =============================================================================
export * from './core/provider/index.js';
// =============================================================================
// Reconciliation Engine
// =============================================================================
export { ClusterReconciler, createClusterReconciler, resourceIdOf } from './core/reconciler/index.js';
// =============================================================================
// Resources
// =============================================================================
export * from './core/resources/index.js';
// =============================================================================
// Tag Convention
// =============================================================================
export {
  CLUSTER_TAG,
  INTERNET_GATEWAY_NAME_TAG,
  NAME_TAG,
  PUBLIC_ROUTE_TABLE_SUBNET_PAIR_TAG,
  type TagMap,
  tagFilter,
  tagsFromProvider,
  tagsToProvider,
} from './core/tags.js';
// =============================================================================
// Core Types and Interfaces
// =============================================================================
export type * from './core/types/index.js';
