/**
 * Public route table reconciliation
 *
 * Each public subnet gets its own route table with a default route to the
 * cluster's internet gateway. The table is found again on later passes through
 * the subnet-pair tag, never through a cached id.
 */

import { compareResources } from '../compare.js';
import { findPublicSubnet } from '../cluster/snapshot.js';
import {
  DependencyResolutionError,
  formatAmbiguousLookupError,
  MissingIdentifierError,
  ResourceTagError,
} from '../errors.js';
import { getComponentLogger, type ReconcilerLogger } from '../logging/index.js';
import {
  CLUSTER_TAG,
  INTERNET_GATEWAY_NAME_TAG,
  NAME_TAG,
  PUBLIC_ROUTE_TABLE_SUBNET_PAIR_TAG,
  tagFilter,
  tagsFromProvider,
} from '../tags.js';
import type { ClusterSnapshot } from '../types/cluster.js';
import type {
  PhaseResult,
  PublicRouteTableState,
  Resource,
  ResourceContext,
} from '../types/resource.js';
import { tagResource } from './tag.js';

export const DEFAULT_ROUTE_CIDR = '0.0.0.0/0';

export interface PublicRouteTableDeclaration {
  /** Logical name; also the name of the public subnet the table is associated with */
  name: string;
  /** Public subnet whose name correlates the table on the provider */
  subnetName: string;
}

export class PublicRouteTable implements Resource<PublicRouteTableState> {
  readonly kind = 'PublicRouteTable' as const;
  readonly name: string;
  readonly subnetName: string;
  private logger = getComponentLogger('public-route-table');

  constructor(declaration: PublicRouteTableDeclaration) {
    this.name = declaration.name;
    this.subnetName = declaration.subnetName;
  }

  async actual(
    snapshot: ClusterSnapshot,
    context: ResourceContext
  ): Promise<PhaseResult<PublicRouteTableState>> {
    const logger = this.loggerFor(context);
    logger.debug('publicroutetable.actual');

    let resource = this.zeroState();
    const subnet = findPublicSubnet(snapshot, this.subnetName);

    // Nothing can be paired with a subnet that does not exist yet.
    if (subnet && subnet.identifier !== '') {
      const routeTables = await context.gateway.describeRouteTables([
        tagFilter(PUBLIC_ROUTE_TABLE_SUBNET_PAIR_TAG, this.subnetName),
      ]);
      const routeTable = routeTables[0];
      if (routeTable) {
        if (routeTables.length > 1) {
          logger.warn('Multiple public route tables share a subnet pair tag, using the first', {
            count: routeTables.length,
            routeTableId: routeTable.routeTableId,
          });
        }
        resource = {
          kind: this.kind,
          name: this.subnetName,
          identifier: this.subnetName,
          tags: tagsFromProvider(routeTable.tags),
        };
      }
    }

    return { snapshot: this.render(resource, snapshot), resource };
  }

  expected(snapshot: ClusterSnapshot): PhaseResult<PublicRouteTableState> {
    this.logger.debug('publicroutetable.expected', { resourceName: this.name });
    const resource: PublicRouteTableState = {
      kind: this.kind,
      name: this.subnetName,
      identifier: this.subnetName,
      tags: {
        [NAME_TAG]: this.name,
        [CLUSTER_TAG]: snapshot.name,
        [PUBLIC_ROUTE_TABLE_SUBNET_PAIR_TAG]: this.subnetName,
      },
    };
    return { snapshot: this.render(resource, snapshot), resource };
  }

  async apply(
    actual: PublicRouteTableState,
    expected: PublicRouteTableState,
    snapshot: ClusterSnapshot,
    context: ResourceContext
  ): Promise<PhaseResult<PublicRouteTableState>> {
    const logger = this.loggerFor(context);
    logger.debug('publicroutetable.apply');

    if (actual.identifier !== '' && compareResources(actual, expected)) {
      return { snapshot, resource: expected };
    }

    const { gateway } = context;

    const routeTable = await gateway.createRouteTable(snapshot.network.identifier);
    const routeTableId = routeTable.routeTableId;
    logger.info('Created public route table', { routeTableId });

    const gatewayFilterValue = snapshot.name;
    const internetGateways = await gateway.describeInternetGateways([
      tagFilter(INTERNET_GATEWAY_NAME_TAG, gatewayFilterValue),
    ]);
    const internetGateway = internetGateways[0];
    if (internetGateways.length !== 1 || !internetGateway) {
      throw formatAmbiguousLookupError(
        'internet gateways',
        internetGateways.length,
        INTERNET_GATEWAY_NAME_TAG,
        gatewayFilterValue
      );
    }
    logger.info('Mapping public route table to internet gateway', {
      routeTableId,
      internetGatewayId: internetGateway.internetGatewayId,
    });

    await gateway.createRoute({
      routeTableId,
      gatewayId: internetGateway.internetGatewayId,
      destinationCidrBlock: DEFAULT_ROUTE_CIDR,
    });

    const subnet = findPublicSubnet(snapshot, this.name);
    if (!subnet || subnet.identifier === '') {
      throw new DependencyResolutionError(
        `Unable to find public subnet id for '${this.name}'`,
        this.name,
        'PublicSubnet',
        this.name,
        snapshot.network.publicSubnets.map((candidate) => candidate.name)
      );
    }

    await gateway.associateRouteTable({ routeTableId, subnetId: subnet.identifier });
    logger.info('Associated route table with public subnet', {
      routeTableId,
      subnetId: subnet.identifier,
    });

    const resource: PublicRouteTableState = {
      kind: this.kind,
      name: expected.name,
      identifier: routeTableId,
      tags: expected.tags,
    };

    try {
      await tagResource(gateway, resource, expected.tags, logger);
    } catch (error) {
      throw new ResourceTagError(
        `Unable to tag new public route table [${routeTableId}]: ${error instanceof Error ? error.message : String(error)}`,
        routeTableId,
        error
      );
    }

    return { snapshot: this.render(resource, snapshot), resource };
  }

  async delete(
    actual: PublicRouteTableState,
    snapshot: ClusterSnapshot,
    context: ResourceContext
  ): Promise<PhaseResult<PublicRouteTableState>> {
    const logger = this.loggerFor(context);
    logger.debug('publicroutetable.delete');

    if (actual.identifier === '') {
      throw new MissingIdentifierError(
        `Unable to delete public route table without identifier [${actual.name}]`,
        this.kind,
        actual.name,
        'delete'
      );
    }

    const { gateway } = context;
    const routeTables = await gateway.describeRouteTables([
      tagFilter(PUBLIC_ROUTE_TABLE_SUBNET_PAIR_TAG, this.subnetName),
    ]);
    const routeTable = routeTables[0];
    if (routeTables.length !== 1 || !routeTable) {
      throw formatAmbiguousLookupError(
        'public route tables',
        routeTables.length,
        PUBLIC_ROUTE_TABLE_SUBNET_PAIR_TAG,
        this.subnetName
      );
    }

    // The main association belongs to the VPC and cannot be removed.
    const association = routeTable.associations.find(
      (candidate) => candidate.associationId !== undefined && !candidate.main
    );
    if (association?.associationId !== undefined) {
      await gateway.disassociateRouteTable(association.associationId);
      logger.debug('Disassociated public route table', {
        routeTableId: routeTable.routeTableId,
        associationId: association.associationId,
      });
    } else {
      logger.debug('Public route table has no subnet association', {
        routeTableId: routeTable.routeTableId,
      });
    }

    await gateway.deleteRouteTable(routeTable.routeTableId);
    logger.info('Deleted public route table', { routeTableId: routeTable.routeTableId });

    const resource: PublicRouteTableState = {
      kind: this.kind,
      name: actual.name,
      identifier: '',
      tags: actual.tags,
    };
    return { snapshot: this.render(resource, snapshot), resource };
  }

  /**
   * Route tables add nothing to the declarative tree: their outcome lives in
   * the returned state alone.
   */
  render(_outcome: PublicRouteTableState, snapshot: ClusterSnapshot): ClusterSnapshot {
    return snapshot;
  }

  private zeroState(): PublicRouteTableState {
    return { kind: this.kind, name: this.name, identifier: '', tags: {} };
  }

  private loggerFor(context: ResourceContext): ReconcilerLogger {
    return (context.logger ?? this.logger).child({ resourceName: this.name });
  }
}

/**
 * One route table handler per public subnet declared in the snapshot
 */
export function publicRouteTablesFor(snapshot: ClusterSnapshot): PublicRouteTable[] {
  return snapshot.network.publicSubnets.map(
    (subnet) => new PublicRouteTable({ name: subnet.name, subnetName: subnet.name })
  );
}
