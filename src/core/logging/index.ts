export { DEFAULT_LOGGER_CONFIG, getLoggerConfigFromEnv, LOG_LEVELS, validateLoggerConfig } from './config.js';
export {
  createContextLogger,
  createLogger,
  getComponentLogger,
  getReconcileLogger,
  getResourceLogger,
  logger,
} from './logger.js';
export type { LogLevel, LoggerConfig, LoggerContext, ReconcilerLogger } from './types.js';
