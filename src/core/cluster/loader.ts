import { readFile } from 'node:fs/promises';
import * as yaml from 'js-yaml';
import { ClusterValidationError } from '../errors.js';
import { getComponentLogger } from '../logging/index.js';
import type { ClusterSnapshot } from '../types/cluster.js';
import { createClusterSnapshot } from './snapshot.js';

const logger = getComponentLogger('cluster-loader');

/**
 * Parse a YAML cluster declaration into a frozen snapshot
 */
export function parseClusterDeclaration(content: string, source?: string): ClusterSnapshot {
  let document: unknown;
  try {
    document = yaml.load(content, source ? { filename: source } : {});
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ClusterValidationError(
      `Failed to parse cluster declaration${source ? ` ${source}` : ''}: ${message}`,
      [message],
      source
    );
  }

  return createClusterSnapshot(document, source);
}

/**
 * Read and parse a YAML cluster declaration from disk
 */
export async function loadClusterDeclaration(path: string): Promise<ClusterSnapshot> {
  logger.debug('Loading cluster declaration', { path });
  const content = await readFile(path, 'utf8');
  const snapshot = parseClusterDeclaration(content, path);
  logger.info('Loaded cluster declaration', {
    path,
    clusterName: snapshot.name,
    publicSubnets: snapshot.network.publicSubnets.length,
  });
  return snapshot;
}
