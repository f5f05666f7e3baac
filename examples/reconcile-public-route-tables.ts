/**
 * Reconcile (or tear down) the public route tables of a declared cluster.
 *
 * RECONCILER_AWS_REGION=us-east-1 npx tsx examples/reconcile-public-route-tables.ts examples/cluster.yaml [--teardown]
 */

import {
  createAwsEc2Gateway,
  createClusterReconciler,
  getComponentLogger,
  loadClusterDeclaration,
  publicRouteTablesFor,
  type ReconcileOptions,
  resolveReconcilerConfig,
} from '../src/index.js';

const logger = getComponentLogger('example');

async function main(): Promise<number> {
  const [path, flag] = process.argv.slice(2);
  if (!path) {
    logger.error('Usage: reconcile-public-route-tables <cluster.yaml> [--teardown]');
    return 2;
  }

  const snapshot = await loadClusterDeclaration(path);
  const reconciler = createClusterReconciler(createAwsEc2Gateway(resolveReconcilerConfig()));
  const resources = publicRouteTablesFor(snapshot);
  const options: ReconcileOptions = {
    progressCallback: (event) => logger.info(event.message, { event: event.type }),
  };

  const result =
    flag === '--teardown'
      ? await reconciler.teardownAll(resources, snapshot, options)
      : await reconciler.reconcileAll(resources, snapshot, options);

  for (const outcome of result.outcomes) {
    logger.info('Outcome', {
      resourceId: outcome.resourceId,
      action: outcome.action,
      identifier: outcome.resource.identifier,
    });
  }
  return result.status === 'success' ? 0 : 1;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    logger.error('Reconciliation failed', error instanceof Error ? error : new Error(String(error)));
    process.exitCode = 1;
  }
);
