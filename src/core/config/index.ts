export {
  getReconcilerConfigFromEnv,
  type ReconcilerConfig,
  resolveReconcilerConfig,
  validateReconcilerConfig,
} from './reconciler-config.js';
