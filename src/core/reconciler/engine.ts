/**
 * Reconciliation Engine
 *
 * Drives resources through the actual → expected → apply lifecycle, or through
 * actual → delete for teardown, one resource at a time. The snapshot returned
 * by each step is the one handed to the next.
 */

import { compareResources } from '../compare.js';
import { toError } from '../errors.js';
import { getComponentLogger, type ReconcilerLogger } from '../logging/index.js';
import type { Ec2Gateway } from '../provider/types.js';
import type { ClusterSnapshot } from '../types/cluster.js';
import type {
  ReconcileEvent,
  ReconcileFailure,
  ReconcileOptions,
  ReconcileOutcome,
  ReconcileResult,
} from '../types/reconcile.js';
import type { Resource, ResourceContext, ResourceState } from '../types/resource.js';

type Phase = ReconcileFailure['phase'];

/**
 * Wraps a failure with the phase it happened in so batch runs can report it.
 * The original error is kept untouched on `error`.
 */
class PhaseFailure extends Error {
  constructor(
    public readonly phase: Phase,
    public readonly error: Error
  ) {
    super(error.message);
    this.name = 'PhaseFailure';
  }
}

async function inPhase<T>(phase: Phase, run: () => Promise<T> | T): Promise<T> {
  try {
    return await run();
  } catch (error) {
    throw new PhaseFailure(phase, toError(error));
  }
}

export class ClusterReconciler {
  private logger: ReconcilerLogger;

  constructor(
    private readonly gateway: Ec2Gateway,
    logger?: ReconcilerLogger
  ) {
    this.logger = logger ?? getComponentLogger('reconciler');
  }

  /**
   * Converge one resource. Provider errors propagate unchanged.
   */
  async reconcile<S extends ResourceState>(
    resource: Resource<S>,
    snapshot: ClusterSnapshot
  ): Promise<ReconcileOutcome<S>> {
    try {
      return await this.reconcileInPhases(resource, snapshot);
    } catch (error) {
      throw error instanceof PhaseFailure ? error.error : error;
    }
  }

  /**
   * Remove one resource if it exists. Provider errors propagate unchanged.
   */
  async teardown<S extends ResourceState>(
    resource: Resource<S>,
    snapshot: ClusterSnapshot
  ): Promise<ReconcileOutcome<S>> {
    try {
      return await this.teardownInPhases(resource, snapshot);
    } catch (error) {
      throw error instanceof PhaseFailure ? error.error : error;
    }
  }

  /**
   * Reconcile resources in declaration order, stopping at the first failure
   */
  async reconcileAll(
    resources: Resource[],
    snapshot: ClusterSnapshot,
    options: ReconcileOptions = {}
  ): Promise<ReconcileResult> {
    return this.runAll('reconcile', resources, snapshot, options, (resource, current) =>
      this.reconcileInPhases(resource, current)
    );
  }

  /**
   * Tear resources down in reverse declaration order, stopping at the first failure
   */
  async teardownAll(
    resources: Resource[],
    snapshot: ClusterSnapshot,
    options: ReconcileOptions = {}
  ): Promise<ReconcileResult> {
    return this.runAll('teardown', [...resources].reverse(), snapshot, options, (resource, current) =>
      this.teardownInPhases(resource, current)
    );
  }

  private async reconcileInPhases<S extends ResourceState>(
    resource: Resource<S>,
    snapshot: ClusterSnapshot
  ): Promise<ReconcileOutcome<S>> {
    const context = this.contextFor(resource, snapshot);
    const resourceId = resourceIdOf(resource);

    const actual = await inPhase('actual', () => resource.actual(snapshot, context));
    const expected = await inPhase('expected', () => resource.expected(actual.snapshot));

    const unchanged =
      actual.resource.identifier !== '' &&
      (await inPhase('apply', () => compareResources(actual.resource, expected.resource)));
    if (unchanged) {
      context.logger?.debug('Resource already converged', { resourceId });
      return {
        resourceId,
        action: 'unchanged',
        resource: expected.resource,
        snapshot: expected.snapshot,
      };
    }

    const applied = await inPhase('apply', () =>
      resource.apply(actual.resource, expected.resource, expected.snapshot, context)
    );
    return {
      resourceId,
      action: 'applied',
      resource: applied.resource,
      snapshot: applied.snapshot,
    };
  }

  private async teardownInPhases<S extends ResourceState>(
    resource: Resource<S>,
    snapshot: ClusterSnapshot
  ): Promise<ReconcileOutcome<S>> {
    const context = this.contextFor(resource, snapshot);
    const resourceId = resourceIdOf(resource);

    const actual = await inPhase('actual', () => resource.actual(snapshot, context));
    if (actual.resource.identifier === '') {
      context.logger?.debug('Nothing to delete', { resourceId });
      return { resourceId, action: 'absent', resource: actual.resource, snapshot: actual.snapshot };
    }

    const deleted = await inPhase('delete', () =>
      resource.delete(actual.resource, actual.snapshot, context)
    );
    return {
      resourceId,
      action: 'deleted',
      resource: deleted.resource,
      snapshot: deleted.snapshot,
    };
  }

  private async runAll(
    operation: ReconcileResult['operation'],
    resources: Resource[],
    snapshot: ClusterSnapshot,
    options: ReconcileOptions,
    step: (resource: Resource, snapshot: ClusterSnapshot) => Promise<ReconcileOutcome>
  ): Promise<ReconcileResult> {
    const startTime = Date.now();
    const outcomes: ReconcileOutcome[] = [];
    const errors: ReconcileFailure[] = [];
    const runLogger = this.logger.child({ clusterName: snapshot.name, operation });
    let current = snapshot;

    this.emitEvent(options, {
      type: 'started',
      message: `Starting ${operation} of ${resources.length} resources in cluster ${snapshot.name}`,
      timestamp: new Date(),
    });

    for (const resource of resources) {
      const resourceId = resourceIdOf(resource);
      this.emitEvent(options, {
        type: 'progress',
        resourceId,
        message: `${operation === 'reconcile' ? 'Reconciling' : 'Tearing down'} ${resourceId}`,
        timestamp: new Date(),
      });

      try {
        const outcome = await step(resource, current);
        outcomes.push(outcome);
        current = outcome.snapshot;
        this.emitEvent(options, {
          type: outcome.action,
          resourceId,
          message: `${resourceId} ${outcome.action}`,
          timestamp: new Date(),
        });
      } catch (caught) {
        const failure: ReconcileFailure = {
          resourceId,
          kind: resource.kind,
          phase: caught instanceof PhaseFailure ? caught.phase : 'actual',
          error: caught instanceof PhaseFailure ? caught.error : toError(caught),
          timestamp: new Date(),
        };
        errors.push(failure);
        runLogger.error(`Failed to ${operation} resource`, failure.error, {
          resourceId,
          phase: failure.phase,
        });
        this.emitEvent(options, {
          type: 'failed',
          resourceId,
          message: `Failed to ${operation} ${resourceId} during ${failure.phase}: ${failure.error.message}`,
          timestamp: new Date(),
          error: failure.error,
        });
        break;
      }
    }

    const duration = Date.now() - startTime;
    const status =
      errors.length === 0 ? 'success' : outcomes.length > 0 ? 'partial' : 'failed';

    this.emitEvent(options, {
      type: 'completed',
      message: `${operation} completed: ${outcomes.length} succeeded, ${errors.length} failed`,
      timestamp: new Date(),
    });
    runLogger.info(`${operation} finished`, { status, duration, succeeded: outcomes.length });

    return {
      clusterName: snapshot.name,
      operation,
      status,
      outcomes,
      errors,
      snapshot: current,
      duration,
    };
  }

  private contextFor(resource: Resource, snapshot: ClusterSnapshot): ResourceContext {
    return {
      gateway: this.gateway,
      logger: this.logger.child({
        clusterName: snapshot.name,
        resourceId: resourceIdOf(resource),
      }),
    };
  }

  private emitEvent(options: ReconcileOptions, event: ReconcileEvent): void {
    if (options.progressCallback) {
      options.progressCallback(event);
    }
  }
}

export function resourceIdOf(resource: Resource): string {
  return `${resource.kind}/${resource.name}`;
}

/**
 * Factory function for creating reconcilers
 */
export function createClusterReconciler(
  gateway: Ec2Gateway,
  logger?: ReconcilerLogger
): ClusterReconciler {
  return new ClusterReconciler(gateway, logger);
}
