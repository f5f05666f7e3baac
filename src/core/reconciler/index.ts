export { ClusterReconciler, createClusterReconciler, resourceIdOf } from './engine.js';
