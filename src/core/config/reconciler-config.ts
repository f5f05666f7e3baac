import { ConfigurationError } from '../errors.js';

/**
 * Settings for the provider client used by a reconciliation run
 */
export interface ReconcilerConfig {
  /** AWS region the cluster lives in */
  region: string;
  /** Override the EC2 endpoint, e.g. for a local emulator */
  endpoint?: string | undefined;
  /** Attempts the SDK client makes per call; the core itself never retries */
  maxAttempts?: number | undefined;
}

/**
 * Get reconciler configuration from environment variables
 */
export function getReconcilerConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ReconcilerConfig {
  const config: ReconcilerConfig = {
    region: env.RECONCILER_AWS_REGION ?? env.AWS_REGION ?? '',
  };

  if (env.RECONCILER_AWS_ENDPOINT) {
    config.endpoint = env.RECONCILER_AWS_ENDPOINT;
  }

  if (env.RECONCILER_AWS_MAX_ATTEMPTS) {
    config.maxAttempts = Number(env.RECONCILER_AWS_MAX_ATTEMPTS);
  }

  return config;
}

/**
 * Validate reconciler configuration
 */
export function validateReconcilerConfig(config: ReconcilerConfig): void {
  if (config.region.trim() === '') {
    throw new ConfigurationError(
      'AWS region is required. Set RECONCILER_AWS_REGION or AWS_REGION',
      'region'
    );
  }

  if (config.endpoint !== undefined) {
    try {
      new URL(config.endpoint);
    } catch {
      throw new ConfigurationError(`Invalid endpoint URL: ${config.endpoint}`, 'endpoint');
    }
  }

  if (
    config.maxAttempts !== undefined &&
    (!Number.isInteger(config.maxAttempts) || config.maxAttempts < 1)
  ) {
    throw new ConfigurationError(
      `maxAttempts must be a positive integer, got ${config.maxAttempts}`,
      'maxAttempts'
    );
  }
}

/**
 * Resolve configuration from the environment, apply overrides and validate
 */
export function resolveReconcilerConfig(overrides: Partial<ReconcilerConfig> = {}): ReconcilerConfig {
  const config: ReconcilerConfig = { ...getReconcilerConfigFromEnv(), ...overrides };
  validateReconcilerConfig(config);
  return config;
}
