import pino from 'pino';
import { getLoggerConfigFromEnv, validateLoggerConfig } from './config.js';
import type { LoggerConfig, LoggerContext, ReconcilerLogger } from './types.js';

function serializeError(error: Error): Record<string, unknown> {
  return {
    name: error.name,
    message: error.message,
    stack: error.stack,
  };
}

/**
 * Pino-based implementation of ReconcilerLogger
 */
class PinoLogger implements ReconcilerLogger {
  constructor(private readonly pinoLogger: pino.Logger) {}

  trace(msg: string, meta?: Record<string, unknown>): void {
    this.pinoLogger.trace(meta ?? {}, msg);
  }

  debug(msg: string, meta?: Record<string, unknown>): void {
    this.pinoLogger.debug(meta ?? {}, msg);
  }

  info(msg: string, meta?: Record<string, unknown>): void {
    this.pinoLogger.info(meta ?? {}, msg);
  }

  warn(msg: string, meta?: Record<string, unknown>): void {
    this.pinoLogger.warn(meta ?? {}, msg);
  }

  error(msg: string, error?: Error, meta?: Record<string, unknown>): void {
    const logData: Record<string, unknown> = { ...meta };
    if (error) {
      logData.error = serializeError(error);
    }
    this.pinoLogger.error(logData, msg);
  }

  fatal(msg: string, error?: Error, meta?: Record<string, unknown>): void {
    const logData: Record<string, unknown> = { ...meta };
    if (error) {
      logData.error = serializeError(error);
    }
    this.pinoLogger.fatal(logData, msg);
  }

  child(bindings: Record<string, unknown>): ReconcilerLogger {
    return new PinoLogger(this.pinoLogger.child(bindings));
  }
}

/**
 * Create a logger with the specified configuration, layered over the environment
 */
export function createLogger(config?: Partial<LoggerConfig>): ReconcilerLogger {
  const finalConfig: LoggerConfig = { ...getLoggerConfigFromEnv(), ...config };
  validateLoggerConfig(finalConfig);

  const pinoOptions: pino.LoggerOptions = {
    level: finalConfig.level,
    timestamp: finalConfig.options?.timestamp !== false,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  let transport: pino.TransportSingleOptions | undefined;

  if (finalConfig.pretty) {
    transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    };
  } else if (finalConfig.destination && finalConfig.destination !== 'stdout') {
    transport = {
      target: 'pino/file',
      options: {
        destination: finalConfig.destination,
      },
    };
  }

  const pinoLogger = transport ? pino(pinoOptions, pino.transport(transport)) : pino(pinoOptions);

  return new PinoLogger(pinoLogger);
}

/**
 * Create a logger bound to the given context
 */
export function createContextLogger(
  context: LoggerContext,
  config?: Partial<LoggerConfig>
): ReconcilerLogger {
  return createLogger(config).child(context);
}

/**
 * Default logger instance using environment configuration
 */
export const logger: ReconcilerLogger = createLogger();

/**
 * Create a component-specific logger
 */
export function getComponentLogger(
  component: string,
  additionalContext?: Record<string, unknown>
): ReconcilerLogger {
  return logger.child({ component, ...additionalContext });
}

/**
 * Create a resource-specific logger
 */
export function getResourceLogger(
  resourceId: string,
  additionalContext?: Record<string, unknown>
): ReconcilerLogger {
  return logger.child({ resourceId, ...additionalContext });
}

/**
 * Create a logger scoped to one reconciliation run of a cluster
 */
export function getReconcileLogger(
  clusterName: string,
  additionalContext?: Record<string, unknown>
): ReconcilerLogger {
  return logger.child({ clusterName, ...additionalContext });
}
