/**
 * Tests for the SDK-backed gateway.
 *
 * Requests are answered by a middleware at the front of the client's stack,
 * so nothing leaves the process.
 */

import { EC2Client, type ServiceOutputTypes } from '@aws-sdk/client-ec2';
import { describe, expect, it } from 'vitest';
import { AwsEc2Gateway, toEc2ClientConfig } from '../../src/core/provider/aws-gateway.js';
import { ProviderResponseError } from '../../src/core/errors.js';

interface SentCommand {
  command: string;
  input: unknown;
}

function stubbedClient(responses: Record<string, ServiceOutputTypes[]>): {
  client: EC2Client;
  sent: SentCommand[];
} {
  const client = new EC2Client({
    region: 'us-east-1',
    credentials: { accessKeyId: 'test', secretAccessKey: 'test-secret' },
  });
  const sent: SentCommand[] = [];

  client.middlewareStack.add(
    (_next, context) => async (args) => {
      const command = context.commandName ?? 'unknown';
      sent.push({ command, input: args.input });
      const output = responses[command]?.shift();
      if (!output) {
        throw new Error(`No stubbed response for ${command}`);
      }
      return { output, response: {} };
    },
    { step: 'initialize', priority: 'high', name: 'stubResponses' }
  );

  return { client, sent };
}

describe('AwsEc2Gateway', () => {
  it('maps route tables across every page', async () => {
    const { client, sent } = stubbedClient({
      DescribeRouteTablesCommand: [
        {
          $metadata: {},
          NextToken: 'page-2',
          RouteTables: [
            {
              RouteTableId: 'rtb-0001',
              VpcId: 'vpc-0001',
              Tags: [{ Key: 'Name', Value: 'public-a' }],
              Associations: [
                { RouteTableAssociationId: 'rtbassoc-0001', SubnetId: 'subnet-aaaa', Main: false },
              ],
            },
          ],
        },
        {
          $metadata: {},
          RouteTables: [{ RouteTableId: 'rtb-0002', Tags: [{ Key: 'Owner' }] }],
        },
      ],
    });
    const gateway = new AwsEc2Gateway(client);

    const routeTables = await gateway.describeRouteTables([
      { name: 'tag:kubicorn-public-route-table-subnet-pair', values: ['public-a'] },
    ]);

    expect(routeTables).toEqual([
      {
        routeTableId: 'rtb-0001',
        vpcId: 'vpc-0001',
        tags: [{ key: 'Name', value: 'public-a' }],
        associations: [{ associationId: 'rtbassoc-0001', subnetId: 'subnet-aaaa', main: false }],
      },
      {
        routeTableId: 'rtb-0002',
        vpcId: undefined,
        tags: [{ key: 'Owner', value: '' }],
        associations: [],
      },
    ]);
    expect(sent).toHaveLength(2);
    expect(sent[0]?.input).toMatchObject({
      Filters: [{ Name: 'tag:kubicorn-public-route-table-subnet-pair', Values: ['public-a'] }],
    });
    expect(sent[1]?.input).toMatchObject({ NextToken: 'page-2' });
  });

  it('maps internet gateways', async () => {
    const { client } = stubbedClient({
      DescribeInternetGatewaysCommand: [
        {
          $metadata: {},
          InternetGateways: [
            {
              InternetGatewayId: 'igw-0001',
              Tags: [{ Key: 'kubicorn-internet-gateway-name', Value: 'demo' }],
            },
          ],
        },
      ],
    });

    const gateways = await new AwsEc2Gateway(client).describeInternetGateways([]);

    expect(gateways).toEqual([
      {
        internetGatewayId: 'igw-0001',
        tags: [{ key: 'kubicorn-internet-gateway-name', value: 'demo' }],
      },
    ]);
  });

  it('creates a route table in the given VPC', async () => {
    const { client, sent } = stubbedClient({
      CreateRouteTableCommand: [{ $metadata: {}, RouteTable: { RouteTableId: 'rtb-0009' } }],
    });

    const routeTable = await new AwsEc2Gateway(client).createRouteTable('vpc-0001');

    expect(routeTable.routeTableId).toBe('rtb-0009');
    expect(sent).toMatchObject([{ command: 'CreateRouteTableCommand', input: { VpcId: 'vpc-0001' } }]);
  });

  it('rejects a created route table without an id', async () => {
    const { client } = stubbedClient({
      CreateRouteTableCommand: [{ $metadata: {}, RouteTable: {} }],
    });

    const pending = new AwsEc2Gateway(client).createRouteTable('vpc-0001');

    await expect(pending).rejects.toBeInstanceOf(ProviderResponseError);
    await expect(pending).rejects.toMatchObject({ field: 'RouteTableId' });
  });

  it('sends route, association and teardown commands', async () => {
    const { client, sent } = stubbedClient({
      CreateRouteCommand: [{ $metadata: {}, Return: true }],
      AssociateRouteTableCommand: [{ $metadata: {}, AssociationId: 'rtbassoc-0002' }],
      DisassociateRouteTableCommand: [{ $metadata: {} }],
      DeleteRouteTableCommand: [{ $metadata: {} }],
      CreateTagsCommand: [{ $metadata: {} }],
    });
    const gateway = new AwsEc2Gateway(client);

    await gateway.createRoute({
      routeTableId: 'rtb-0001',
      gatewayId: 'igw-0001',
      destinationCidrBlock: '0.0.0.0/0',
    });
    const associationId = await gateway.associateRouteTable({
      routeTableId: 'rtb-0001',
      subnetId: 'subnet-aaaa',
    });
    await gateway.createTags(['rtb-0001'], [{ key: 'Name', value: 'public-a' }]);
    await gateway.disassociateRouteTable(associationId);
    await gateway.deleteRouteTable('rtb-0001');

    expect(associationId).toBe('rtbassoc-0002');
    expect(sent).toMatchObject([
      {
        command: 'CreateRouteCommand',
        input: { RouteTableId: 'rtb-0001', GatewayId: 'igw-0001', DestinationCidrBlock: '0.0.0.0/0' },
      },
      {
        command: 'AssociateRouteTableCommand',
        input: { RouteTableId: 'rtb-0001', SubnetId: 'subnet-aaaa' },
      },
      {
        command: 'CreateTagsCommand',
        input: { Resources: ['rtb-0001'], Tags: [{ Key: 'Name', Value: 'public-a' }] },
      },
      { command: 'DisassociateRouteTableCommand', input: { AssociationId: 'rtbassoc-0002' } },
      { command: 'DeleteRouteTableCommand', input: { RouteTableId: 'rtb-0001' } },
    ]);
  });

  it('rejects an association without an id', async () => {
    const { client } = stubbedClient({ AssociateRouteTableCommand: [{ $metadata: {} }] });

    await expect(
      new AwsEc2Gateway(client).associateRouteTable({ routeTableId: 'rtb-0001', subnetId: 'subnet-aaaa' })
    ).rejects.toMatchObject({ code: 'PROVIDER_RESPONSE', field: 'AssociationId' });
  });
});

describe('toEc2ClientConfig', () => {
  it('passes only the settings that were given', () => {
    expect(toEc2ClientConfig({ region: 'us-east-1' })).toEqual({ region: 'us-east-1' });
    expect(
      toEc2ClientConfig({ region: 'us-east-1', endpoint: 'http://localhost:4566', maxAttempts: 3 })
    ).toEqual({ region: 'us-east-1', endpoint: 'http://localhost:4566', maxAttempts: 3 });
  });
});
