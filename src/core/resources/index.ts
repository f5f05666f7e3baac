export {
  DEFAULT_ROUTE_CIDR,
  PublicRouteTable,
  type PublicRouteTableDeclaration,
  publicRouteTablesFor,
} from './public-route-table.js';
export { type TagTarget, tagResource } from './tag.js';
