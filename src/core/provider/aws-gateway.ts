/**
 * Ec2Gateway backed by the AWS SDK v3 EC2 client.
 */

import {
  AssociateRouteTableCommand,
  CreateRouteCommand,
  CreateRouteTableCommand,
  CreateTagsCommand,
  DeleteRouteTableCommand,
  DisassociateRouteTableCommand,
  EC2Client,
  type EC2ClientConfig,
  type InternetGateway,
  paginateDescribeInternetGateways,
  paginateDescribeRouteTables,
  type RouteTable,
  type Tag,
} from '@aws-sdk/client-ec2';
import type { ReconcilerConfig } from '../config/reconciler-config.js';
import { ProviderResponseError } from '../errors.js';
import { getComponentLogger } from '../logging/index.js';
import type {
  AssociateRouteTableInput,
  CreateRouteInput,
  Ec2Gateway,
  InternetGatewayRecord,
  ProviderTag,
  RouteTableRecord,
  TagFilter,
} from './types.js';

function toProviderTags(tags: Tag[] | undefined): ProviderTag[] {
  const result: ProviderTag[] = [];
  for (const tag of tags ?? []) {
    if (tag.Key !== undefined) {
      result.push({ key: tag.Key, value: tag.Value ?? '' });
    }
  }
  return result;
}

function toRouteTableRecord(routeTable: RouteTable, operation: string): RouteTableRecord {
  if (!routeTable.RouteTableId) {
    throw new ProviderResponseError(
      `${operation} returned a route table without an id`,
      operation,
      'RouteTableId'
    );
  }
  return {
    routeTableId: routeTable.RouteTableId,
    vpcId: routeTable.VpcId,
    tags: toProviderTags(routeTable.Tags),
    associations: (routeTable.Associations ?? []).map((association) => ({
      associationId: association.RouteTableAssociationId,
      subnetId: association.SubnetId,
      main: association.Main === true,
    })),
  };
}

function toInternetGatewayRecord(gateway: InternetGateway): InternetGatewayRecord {
  if (!gateway.InternetGatewayId) {
    throw new ProviderResponseError(
      'DescribeInternetGateways returned a gateway without an id',
      'DescribeInternetGateways',
      'InternetGatewayId'
    );
  }
  return {
    internetGatewayId: gateway.InternetGatewayId,
    tags: toProviderTags(gateway.Tags),
  };
}

function toSdkFilters(filters: TagFilter[]) {
  return filters.map((filter) => ({ Name: filter.name, Values: filter.values }));
}

export class AwsEc2Gateway implements Ec2Gateway {
  private logger = getComponentLogger('aws-ec2-gateway');

  constructor(private readonly client: EC2Client) {}

  async describeRouteTables(filters: TagFilter[]): Promise<RouteTableRecord[]> {
    this.logger.trace('DescribeRouteTables', { filters });
    const records: RouteTableRecord[] = [];
    const pages = paginateDescribeRouteTables(
      { client: this.client },
      { Filters: toSdkFilters(filters) }
    );
    for await (const page of pages) {
      for (const routeTable of page.RouteTables ?? []) {
        records.push(toRouteTableRecord(routeTable, 'DescribeRouteTables'));
      }
    }
    return records;
  }

  async describeInternetGateways(filters: TagFilter[]): Promise<InternetGatewayRecord[]> {
    this.logger.trace('DescribeInternetGateways', { filters });
    const records: InternetGatewayRecord[] = [];
    const pages = paginateDescribeInternetGateways(
      { client: this.client },
      { Filters: toSdkFilters(filters) }
    );
    for await (const page of pages) {
      for (const gateway of page.InternetGateways ?? []) {
        records.push(toInternetGatewayRecord(gateway));
      }
    }
    return records;
  }

  async createRouteTable(vpcId: string): Promise<RouteTableRecord> {
    const output = await this.client.send(new CreateRouteTableCommand({ VpcId: vpcId }));
    if (!output.RouteTable) {
      throw new ProviderResponseError(
        'CreateRouteTable returned no route table',
        'CreateRouteTable',
        'RouteTable'
      );
    }
    return toRouteTableRecord(output.RouteTable, 'CreateRouteTable');
  }

  async createRoute(input: CreateRouteInput): Promise<void> {
    await this.client.send(
      new CreateRouteCommand({
        RouteTableId: input.routeTableId,
        GatewayId: input.gatewayId,
        DestinationCidrBlock: input.destinationCidrBlock,
      })
    );
  }

  async associateRouteTable(input: AssociateRouteTableInput): Promise<string> {
    const output = await this.client.send(
      new AssociateRouteTableCommand({
        RouteTableId: input.routeTableId,
        SubnetId: input.subnetId,
      })
    );
    if (!output.AssociationId) {
      throw new ProviderResponseError(
        'AssociateRouteTable returned no association id',
        'AssociateRouteTable',
        'AssociationId'
      );
    }
    return output.AssociationId;
  }

  async disassociateRouteTable(associationId: string): Promise<void> {
    await this.client.send(new DisassociateRouteTableCommand({ AssociationId: associationId }));
  }

  async deleteRouteTable(routeTableId: string): Promise<void> {
    await this.client.send(new DeleteRouteTableCommand({ RouteTableId: routeTableId }));
  }

  async createTags(resourceIds: string[], tags: ProviderTag[]): Promise<void> {
    await this.client.send(
      new CreateTagsCommand({
        Resources: resourceIds,
        Tags: tags.map((tag) => ({ Key: tag.key, Value: tag.value })),
      })
    );
  }
}

/**
 * Build the SDK client options for a reconciler configuration
 */
export function toEc2ClientConfig(config: ReconcilerConfig): EC2ClientConfig {
  const clientConfig: EC2ClientConfig = { region: config.region };
  if (config.endpoint !== undefined) {
    clientConfig.endpoint = config.endpoint;
  }
  if (config.maxAttempts !== undefined) {
    clientConfig.maxAttempts = config.maxAttempts;
  }
  return clientConfig;
}

/**
 * Factory function for creating an SDK-backed gateway
 */
export function createAwsEc2Gateway(config: ReconcilerConfig): AwsEc2Gateway {
  return new AwsEc2Gateway(new EC2Client(toEc2ClientConfig(config)));
}
