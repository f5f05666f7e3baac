/**
 * Provider-facing records exchanged with an {@link Ec2Gateway}.
 */

export interface ProviderTag {
  key: string;
  value: string;
}

/**
 * A list filter, e.g. `{ name: 'tag:Name', values: ['public-a'] }`
 */
export interface TagFilter {
  name: string;
  values: string[];
}

export interface RouteTableAssociation {
  associationId?: string | undefined;
  subnetId?: string | undefined;
  main: boolean;
}

export interface RouteTableRecord {
  routeTableId: string;
  vpcId?: string | undefined;
  tags: ProviderTag[];
  associations: RouteTableAssociation[];
}

export interface InternetGatewayRecord {
  internetGatewayId: string;
  tags: ProviderTag[];
}

export interface CreateRouteInput {
  routeTableId: string;
  gatewayId: string;
  destinationCidrBlock: string;
}

export interface AssociateRouteTableInput {
  routeTableId: string;
  subnetId: string;
}

/**
 * The networking operations the reconciliation core consumes.
 *
 * Every method may reject with the underlying transport or API error; callers
 * propagate it unchanged.
 */
export interface Ec2Gateway {
  describeRouteTables(filters: TagFilter[]): Promise<RouteTableRecord[]>;
  describeInternetGateways(filters: TagFilter[]): Promise<InternetGatewayRecord[]>;
  createRouteTable(vpcId: string): Promise<RouteTableRecord>;
  createRoute(input: CreateRouteInput): Promise<void>;
  /** Resolves to the new association id */
  associateRouteTable(input: AssociateRouteTableInput): Promise<string>;
  disassociateRouteTable(associationId: string): Promise<void>;
  deleteRouteTable(routeTableId: string): Promise<void>;
  createTags(resourceIds: string[], tags: ProviderTag[]): Promise<void>;
}
