export { loadClusterDeclaration, parseClusterDeclaration } from './loader.js';
export { type ClusterDeclaration, ClusterDeclarationSchema, PublicSubnetSchema } from './schema.js';
export { createClusterSnapshot, deepFreeze, findPublicSubnet } from './snapshot.js';
