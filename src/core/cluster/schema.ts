import { type } from 'arktype';

export const PublicSubnetSchema = type({
  name: 'string > 0',
  'identifier?': 'string',
  'cidr?': 'string',
  'zone?': 'string',
});

/**
 * Shape of a cluster declaration as written by hand or produced by config loading
 */
export const ClusterDeclarationSchema = type({
  name: 'string > 0',
  network: {
    'identifier?': 'string',
    'cidr?': 'string',
    publicSubnets: PublicSubnetSchema.array(),
  },
});

export type ClusterDeclaration = typeof ClusterDeclarationSchema.infer;
