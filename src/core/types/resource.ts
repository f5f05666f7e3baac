/**
 * Resource state and handler types
 */

import type { ReconcilerLogger } from '../logging/index.js';
import type { Ec2Gateway } from '../provider/types.js';
import type { TagMap } from '../tags.js';
import type { ClusterSnapshot } from './cluster.js';

export interface ResourceShared {
  /** Logical name, stable across reconciliation passes */
  readonly name: string;
  /** Provider handle; empty iff the object is not known to exist */
  readonly identifier: string;
  readonly tags: TagMap;
}

export interface PublicRouteTableState extends ResourceShared {
  readonly kind: 'PublicRouteTable';
}

/**
 * Every resource kind the reconciler knows, discriminated by `kind`
 */
export type ResourceState = PublicRouteTableState;

export type ResourceKind = ResourceState['kind'];

/**
 * Capabilities injected into each phase call
 */
export interface ResourceContext {
  gateway: Ec2Gateway;
  logger?: ReconcilerLogger | undefined;
}

export interface PhaseResult<S extends ResourceState> {
  snapshot: ClusterSnapshot;
  resource: S;
}

/**
 * Reconciliation logic for one infrastructure object.
 *
 * Handlers hold only their declaration (name and the names of what they depend
 * on). All live state comes from the provider or the snapshot on each call.
 */
export interface Resource<S extends ResourceState = ResourceState> {
  readonly kind: S['kind'];
  readonly name: string;

  /** Observe what currently exists on the provider */
  actual(snapshot: ClusterSnapshot, context: ResourceContext): Promise<PhaseResult<S>>;

  /** Compute the desired state from the declaration alone */
  expected(snapshot: ClusterSnapshot): PhaseResult<S>;

  /** Converge the provider from `actual` toward `expected` */
  apply(
    actual: S,
    expected: S,
    snapshot: ClusterSnapshot,
    context: ResourceContext
  ): Promise<PhaseResult<S>>;

  /** Remove the provider object described by `actual` */
  delete(actual: S, snapshot: ClusterSnapshot, context: ResourceContext): Promise<PhaseResult<S>>;

  /** Fold a phase outcome into the snapshot used by the next step */
  render(outcome: S, snapshot: ClusterSnapshot): ClusterSnapshot;
}
