import { MissingIdentifierError } from '../errors.js';
import type { ReconcilerLogger } from '../logging/index.js';
import type { Ec2Gateway } from '../provider/types.js';
import { type TagMap, tagsToProvider } from '../tags.js';
import type { ResourceKind } from '../types/resource.js';

export interface TagTarget {
  kind: ResourceKind;
  name: string;
  identifier: string;
}

/**
 * Apply every pair in `tags` to the target in a single provider call
 */
export async function tagResource(
  gateway: Ec2Gateway,
  target: TagTarget,
  tags: TagMap,
  logger?: ReconcilerLogger
): Promise<void> {
  if (target.identifier === '') {
    throw new MissingIdentifierError(
      `Unable to tag ${target.kind} without identifier [${target.name}]`,
      target.kind,
      target.name,
      'tag'
    );
  }

  const providerTags = tagsToProvider(tags);
  for (const tag of providerTags) {
    logger?.debug('Registering tag', { identifier: target.identifier, key: tag.key, value: tag.value });
  }
  await gateway.createTags([target.identifier], providerTags);
}
