export type { ClusterNetwork, ClusterSnapshot, PublicSubnet } from './cluster.js';
export type {
  ReconcileAction,
  ReconcileEvent,
  ReconcileFailure,
  ReconcileOptions,
  ReconcileOutcome,
  ReconcileResult,
} from './reconcile.js';
export type {
  PhaseResult,
  PublicRouteTableState,
  Resource,
  ResourceContext,
  ResourceKind,
  ResourceShared,
  ResourceState,
} from './resource.js';
