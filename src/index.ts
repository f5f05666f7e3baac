/**
 * cluster-reconciler - Converge AWS networking objects toward a declared cluster.
 */

export * from './core.js';
