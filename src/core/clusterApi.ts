/**
 * Cluster API adapter.
 *
 * Defines the four list/describe calls the collection pipeline depends on,
 * and implements them on top of the AWS SDK v3 ECS client.
 */

import {
  ECSClient,
  ListServicesCommand,
  DescribeServicesCommand,
  ListContainerInstancesCommand,
  DescribeContainerInstancesCommand,
  type ContainerInstance,
  type Failure,
  type Resource,
  type Service,
} from '@aws-sdk/client-ecs';
import type {
  ClusterName,
  ContainerInstanceRecord,
  DescribeResult,
  IdentifierPage,
  NamedFailure,
  ResourceAmounts,
  ResourceKind,
  ServiceRecord,
} from '@/types';

/**
 * Capabilities the collector needs from the orchestration API.
 *
 * Implementations hold no per-call state; one instance is shared by every
 * pipeline and every concurrent scrape.
 */
export interface ClusterApi {
  listServices(cluster: ClusterName, nextToken?: string): Promise<IdentifierPage>;
  describeServices(
    cluster: ClusterName,
    serviceArns: string[]
  ): Promise<DescribeResult<ServiceRecord>>;
  listContainerInstances(cluster: ClusterName, nextToken?: string): Promise<IdentifierPage>;
  describeContainerInstances(
    cluster: ClusterName,
    containerInstanceArns: string[]
  ): Promise<DescribeResult<ContainerInstanceRecord>>;
}

const RESOURCE_KINDS: ReadonlySet<string> = new Set<ResourceKind>([
  'CPU',
  'MEMORY',
  'GPU',
  'PORTS',
  'PORTS_UDP',
]);

function isResourceKind(name: string): name is ResourceKind {
  return RESOURCE_KINDS.has(name);
}

/**
 * Convert an ECS resource list into amounts keyed by resource kind.
 *
 * Entries with an unknown name or without an integer value are dropped.
 */
export function toResourceAmounts(resources: Resource[] | undefined): ResourceAmounts {
  const amounts: ResourceAmounts = {};
  for (const resource of resources ?? []) {
    if (resource.name && isResourceKind(resource.name) && resource.integerValue !== undefined) {
      amounts[resource.name] = resource.integerValue;
    }
  }
  return amounts;
}

export function toServiceRecord(service: Service): ServiceRecord {
  return {
    name: service.serviceName,
    desiredCount: service.desiredCount ?? 0,
    runningCount: service.runningCount ?? 0,
    pendingCount: service.pendingCount ?? 0,
  };
}

export function toContainerInstanceRecord(instance: ContainerInstance): ContainerInstanceRecord {
  return {
    ec2InstanceId: instance.ec2InstanceId,
    runningTasksCount: instance.runningTasksCount ?? 0,
    pendingTasksCount: instance.pendingTasksCount ?? 0,
    registeredResources: toResourceAmounts(instance.registeredResources),
    remainingResources: toResourceAmounts(instance.remainingResources),
  };
}

function toNamedFailures(failures: Failure[] | undefined): NamedFailure[] {
  return (failures ?? []).map((failure) => ({
    arn: failure.arn,
    reason: failure.reason,
    detail: failure.detail,
  }));
}

/**
 * {@link ClusterApi} backed by an `ECSClient`.
 *
 * SDK errors (network, credentials, throttling) are not caught here; they
 * reach the caller as rejected promises.
 */
export class EcsClusterApi implements ClusterApi {
  constructor(private readonly client: ECSClient) {}

  async listServices(cluster: ClusterName, nextToken?: string): Promise<IdentifierPage> {
    const response = await this.client.send(new ListServicesCommand({ cluster, nextToken }));
    return {
      identifiers: response.serviceArns ?? [],
      nextToken: response.nextToken,
    };
  }

  async describeServices(
    cluster: ClusterName,
    serviceArns: string[]
  ): Promise<DescribeResult<ServiceRecord>> {
    const response = await this.client.send(
      new DescribeServicesCommand({ cluster, services: serviceArns })
    );
    return {
      records: (response.services ?? []).map(toServiceRecord),
      failures: toNamedFailures(response.failures),
    };
  }

  async listContainerInstances(cluster: ClusterName, nextToken?: string): Promise<IdentifierPage> {
    const response = await this.client.send(
      new ListContainerInstancesCommand({ cluster, nextToken })
    );
    return {
      identifiers: response.containerInstanceArns ?? [],
      nextToken: response.nextToken,
    };
  }

  async describeContainerInstances(
    cluster: ClusterName,
    containerInstanceArns: string[]
  ): Promise<DescribeResult<ContainerInstanceRecord>> {
    const response = await this.client.send(
      new DescribeContainerInstancesCommand({ cluster, containerInstances: containerInstanceArns })
    );
    return {
      records: (response.containerInstances ?? []).map(toContainerInstanceRecord),
      failures: toNamedFailures(response.failures),
    };
  }
}
