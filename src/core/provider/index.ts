export { AwsEc2Gateway, createAwsEc2Gateway, toEc2ClientConfig } from './aws-gateway.js';
export type {
  AssociateRouteTableInput,
  CreateRouteInput,
  Ec2Gateway,
  InternetGatewayRecord,
  ProviderTag,
  RouteTableAssociation,
  RouteTableRecord,
  TagFilter,
} from './types.js';
