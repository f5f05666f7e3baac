/**
 * Tests for cluster snapshot creation and declaration loading
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { loadClusterDeclaration, parseClusterDeclaration } from '../../src/core/cluster/loader.js';
import { createClusterSnapshot, findPublicSubnet } from '../../src/core/cluster/snapshot.js';
import { ClusterValidationError } from '../../src/core/errors.js';

const declaration = {
  name: 'demo',
  network: {
    identifier: 'vpc-0001',
    publicSubnets: [
      { name: 'public-a', identifier: 'subnet-aaaa' },
      { name: 'public-b' },
    ],
  },
};

describe('createClusterSnapshot', () => {
  it('fills identifiers that are not known yet with empty strings', () => {
    const snapshot = createClusterSnapshot(declaration);

    expect(snapshot.name).toBe('demo');
    expect(snapshot.network.identifier).toBe('vpc-0001');
    expect(snapshot.network.publicSubnets.map((subnet) => subnet.identifier)).toEqual([
      'subnet-aaaa',
      '',
    ]);
  });

  it('freezes the snapshot all the way down', () => {
    const snapshot = createClusterSnapshot(declaration);

    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.network)).toBe(true);
    expect(Object.isFrozen(snapshot.network.publicSubnets)).toBe(true);
    expect(Object.isFrozen(snapshot.network.publicSubnets[0])).toBe(true);
    expect(Reflect.set(snapshot, 'name', 'other')).toBe(false);
    expect(snapshot.name).toBe('demo');
  });

  it('leaves the input declaration mutable', () => {
    const input = structuredClone(declaration);

    createClusterSnapshot(input);

    expect(Object.isFrozen(input)).toBe(false);
    expect(Object.isFrozen(input.network.publicSubnets)).toBe(false);
  });

  it('rejects a declaration without a cluster name', () => {
    let caught: unknown;
    try {
      createClusterSnapshot({ network: declaration.network }, 'cluster.yaml');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ClusterValidationError);
    if (caught instanceof ClusterValidationError) {
      expect(caught.code).toBe('CLUSTER_VALIDATION');
      expect(caught.source).toBe('cluster.yaml');
      expect(caught.problems.length).toBeGreaterThan(0);
      expect(caught.message.startsWith('Invalid cluster declaration in cluster.yaml:')).toBe(true);
    }
  });

  it('rejects public subnets with non-string identifiers', () => {
    expect(() =>
      createClusterSnapshot({
        name: 'demo',
        network: { publicSubnets: [{ name: 'public-a', identifier: 42 }] },
      })
    ).toThrow(ClusterValidationError);
  });

  it('rejects duplicate public subnet names', () => {
    expect(() =>
      createClusterSnapshot({
        name: 'demo',
        network: { publicSubnets: [{ name: 'public-a' }, { name: 'public-a' }] },
      })
    ).toThrow("Duplicate public subnet names in cluster 'demo': public-a");
  });
});

describe('findPublicSubnet', () => {
  it('looks subnets up by logical name', () => {
    const snapshot = createClusterSnapshot(declaration);

    expect(findPublicSubnet(snapshot, 'public-a')?.identifier).toBe('subnet-aaaa');
    expect(findPublicSubnet(snapshot, 'public-z')).toBeUndefined();
  });
});

describe('parseClusterDeclaration', () => {
  it('parses a YAML declaration', () => {
    const snapshot = parseClusterDeclaration(
      [
        'name: demo',
        'network:',
        '  identifier: vpc-0001',
        '  cidr: 10.0.0.0/16',
        '  publicSubnets:',
        '    - name: public-a',
        '      identifier: subnet-aaaa',
        '      zone: us-east-1a',
      ].join('\n')
    );

    expect(snapshot).toEqual({
      name: 'demo',
      network: {
        identifier: 'vpc-0001',
        cidr: '10.0.0.0/16',
        publicSubnets: [
          { name: 'public-a', identifier: 'subnet-aaaa', cidr: undefined, zone: 'us-east-1a' },
        ],
      },
    });
  });

  it('reports malformed YAML as a validation error', () => {
    expect(() => parseClusterDeclaration('name: [demo', 'broken.yaml')).toThrow(
      /^Failed to parse cluster declaration broken\.yaml:/
    );
  });
});

describe('loadClusterDeclaration', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'cluster-reconciler-'));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('reads a declaration from disk', async () => {
    const path = join(directory, 'cluster.yaml');
    await writeFile(
      path,
      'name: demo\nnetwork:\n  identifier: vpc-0001\n  publicSubnets:\n    - name: public-a\n'
    );

    const snapshot = await loadClusterDeclaration(path);

    expect(snapshot.name).toBe('demo');
    expect(snapshot.network.publicSubnets).toEqual([
      { name: 'public-a', identifier: '', cidr: undefined, zone: undefined },
    ]);
  });

  it('rejects when the file does not exist', async () => {
    await expect(loadClusterDeclaration(join(directory, 'missing.yaml'))).rejects.toMatchObject({
      code: 'ENOENT',
    });
  });
});
