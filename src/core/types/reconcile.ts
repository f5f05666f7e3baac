/**
 * Reconciliation run types
 */

import type { ClusterSnapshot } from './cluster.js';
import type { ResourceKind, ResourceState } from './resource.js';

export type ReconcileAction = 'unchanged' | 'applied' | 'deleted' | 'absent';

export interface ReconcileOutcome<S extends ResourceState = ResourceState> {
  resourceId: string;
  action: ReconcileAction;
  resource: S;
  snapshot: ClusterSnapshot;
}

export interface ReconcileEvent {
  type:
    | 'started'
    | 'progress'
    | 'unchanged'
    | 'applied'
    | 'deleted'
    | 'absent'
    | 'failed'
    | 'completed';
  resourceId?: string | undefined;
  message: string;
  timestamp: Date;
  error?: Error | undefined;
}

export interface ReconcileFailure {
  resourceId: string;
  kind: ResourceKind;
  phase: 'actual' | 'expected' | 'apply' | 'delete';
  error: Error;
  timestamp: Date;
}

export interface ReconcileOptions {
  progressCallback?: ((event: ReconcileEvent) => void) | undefined;
}

export interface ReconcileResult {
  clusterName: string;
  operation: 'reconcile' | 'teardown';
  status: 'success' | 'partial' | 'failed';
  outcomes: ReconcileOutcome[];
  errors: ReconcileFailure[];
  snapshot: ClusterSnapshot;
  duration: number;
}
