/**
 * Test fixtures and mock data factories.
 *
 * Provides reusable test data and an in-memory ClusterApi for unit tests.
 */

import { vi } from 'vitest';
import type { ClusterApi } from '@core/clusterApi';
import type {
  ContainerInstanceRecord,
  DescribeResult,
  IdentifierPage,
  ServiceRecord,
} from '@/types';

export const ACCOUNT_ID = '123456789012';
export const REGION = 'us-east-1';

export function serviceArn(cluster: string, name: string): string {
  return `arn:aws:ecs:${REGION}:${ACCOUNT_ID}:service/${cluster}/${name}`;
}

export function containerInstanceArn(cluster: string, id: string): string {
  return `arn:aws:ecs:${REGION}:${ACCOUNT_ID}:container-instance/${cluster}/${id}`;
}

/**
 * Creates a mock ServiceRecord.
 *
 * @param name - Service name
 * @param overrides - Optional overrides for specific properties
 */
export function createServiceRecord(
  name: string,
  overrides: Partial<ServiceRecord> = {}
): ServiceRecord {
  return {
    name,
    desiredCount: 2,
    runningCount: 2,
    pendingCount: 0,
    ...overrides,
  };
}

/**
 * Creates a mock ContainerInstanceRecord with CPU and MEMORY resources.
 *
 * @param ec2InstanceId - EC2 instance id
 * @param overrides - Optional overrides for specific properties
 */
export function createInstanceRecord(
  ec2InstanceId: string,
  overrides: Partial<ContainerInstanceRecord> = {}
): ContainerInstanceRecord {
  return {
    ec2InstanceId,
    runningTasksCount: 3,
    pendingTasksCount: 1,
    registeredResources: { CPU: 2048, MEMORY: 7982 },
    remainingResources: { CPU: 1024, MEMORY: 3886 },
    ...overrides,
  };
}

/**
 * Contents of one fake cluster.
 */
export interface FakeCluster {
  /** Services keyed by ARN, listed and described in insertion order */
  services?: Record<string, ServiceRecord>;
  /** Container instances keyed by ARN */
  instances?: Record<string, ContainerInstanceRecord>;
  /** ARNs that are listed but reported as failures when described */
  missing?: string[];
}

function page(identifiers: string[], pageSize: number, nextToken?: string): IdentifierPage {
  const start = nextToken ? Number(nextToken) : 0;
  const end = start + pageSize;
  return {
    identifiers: identifiers.slice(start, end),
    nextToken: end < identifiers.length ? String(end) : undefined,
  };
}

function describeRecords<R>(records: Record<string, R>, arns: string[]): DescribeResult<R> {
  const result: DescribeResult<R> = { records: [], failures: [] };
  for (const arn of arns) {
    const record = records[arn];
    if (record) {
      result.records.push(record);
    } else {
      result.failures.push({ arn, reason: 'MISSING' });
    }
  }
  return result;
}

function clusterOf(clusters: Record<string, FakeCluster>, name: string): FakeCluster {
  const cluster = clusters[name];
  if (!cluster) {
    throw new Error(`ClusterNotFoundException: ${name}`);
  }
  return cluster;
}

/**
 * In-memory ClusterApi with spied methods.
 *
 * Unknown clusters reject every call, like the real API does.
 */
export function createFakeClusterApi(clusters: Record<string, FakeCluster>, pageSize = 10) {
  const serviceArns = (name: string): string[] => {
    const cluster = clusterOf(clusters, name);
    return [...Object.keys(cluster.services ?? {}), ...(cluster.missing ?? [])];
  };
  const instanceArns = (name: string): string[] =>
    Object.keys(clusterOf(clusters, name).instances ?? {});

  return {
    listServices: vi.fn(async (cluster: string, nextToken?: string) =>
      page(serviceArns(cluster), pageSize, nextToken)
    ),
    describeServices: vi.fn(async (cluster: string, arns: string[]) =>
      describeRecords(clusterOf(clusters, cluster).services ?? {}, arns)
    ),
    listContainerInstances: vi.fn(async (cluster: string, nextToken?: string) =>
      page(instanceArns(cluster), pageSize, nextToken)
    ),
    describeContainerInstances: vi.fn(async (cluster: string, arns: string[]) =>
      describeRecords(clusterOf(clusters, cluster).instances ?? {}, arns)
    ),
  } satisfies ClusterApi;
}

/**
 * Builds a cluster with `count` services named svc-01, svc-02, ...
 */
export function createServices(cluster: string, count: number): Record<string, ServiceRecord> {
  const services: Record<string, ServiceRecord> = {};
  for (let i = 1; i <= count; i++) {
    const name = `svc-${String(i).padStart(2, '0')}`;
    services[serviceArn(cluster, name)] = createServiceRecord(name, {
      desiredCount: i,
      runningCount: i,
      pendingCount: 0,
    });
  }
  return services;
}
