/**
 * Metric derivation.
 *
 * Pure translation of cluster snapshots into metric samples. No I/O.
 * Records without their identifying field are skipped and logged.
 */

import type {
  ClusterName,
  ClusterSnapshot,
  ContainerInstanceRecord,
  MetricFamilyName,
  MetricSample,
  ResourceAmounts,
  ResourceKind,
  ServiceRecord,
} from '@/types';
import { setupLogger } from '@shared/utils/logger';

const logger = setupLogger('ecs-exporter:metrics');

export interface MetricFamilyDefinition {
  name: MetricFamilyName;
  help: string;
  labelNames: readonly string[];
}

/**
 * Families derived from cluster snapshots. Every scrape registers all of them,
 * including those without samples.
 */
export const METRIC_FAMILIES: readonly MetricFamilyDefinition[] = [
  {
    name: 'aws_ecs_service_desired_count',
    help: 'Desired number of tasks of the service',
    labelNames: ['cluster', 'service'],
  },
  {
    name: 'aws_ecs_service_current_count',
    help: 'Current number of tasks of the service, by state',
    labelNames: ['cluster', 'service', 'state'],
  },
  {
    name: 'aws_ecs_container_instance_tasks_count',
    help: 'Number of tasks on the container instance, by state',
    labelNames: ['cluster', 'instance', 'state'],
  },
  {
    name: 'aws_ecs_container_instance_registered_resources',
    help: 'Resources registered by the container instance',
    labelNames: ['cluster', 'instance', 'resource'],
  },
  {
    name: 'aws_ecs_container_instance_remaining_resources',
    help: 'Resources of the container instance not allocated to tasks',
    labelNames: ['cluster', 'instance', 'resource'],
  },
];

/**
 * Label values for the resource kinds that are exported.
 * Kinds missing here produce no sample.
 */
export const RESOURCE_LABELS: ReadonlyMap<ResourceKind, string> = new Map<ResourceKind, string>([
  ['CPU', 'cpu'],
  ['MEMORY', 'ram'],
]);

function resourceSamples(
  family: MetricFamilyName,
  clusterName: ClusterName,
  instanceId: string,
  amounts: ResourceAmounts
): MetricSample[] {
  const samples: MetricSample[] = [];
  for (const [kind, label] of RESOURCE_LABELS) {
    const value = amounts[kind];
    if (value !== undefined) {
      samples.push({
        family,
        labels: { cluster: clusterName, instance: instanceId, resource: label },
        value,
      });
    }
  }
  return samples;
}

/**
 * Desired and current (running, pending) task counts per service.
 */
export function deriveServiceSamples(
  clusterName: ClusterName,
  services: readonly ServiceRecord[]
): MetricSample[] {
  if (!clusterName) {
    logger.warn({ count: services.length }, 'Skipping services without cluster name');
    return [];
  }

  const samples: MetricSample[] = [];
  for (const service of services) {
    if (!service.name) {
      logger.warn({ cluster: clusterName }, 'Skipping service without name');
      continue;
    }
    const labels = { cluster: clusterName, service: service.name };
    samples.push(
      { family: 'aws_ecs_service_desired_count', labels, value: service.desiredCount },
      {
        family: 'aws_ecs_service_current_count',
        labels: { ...labels, state: 'running' },
        value: service.runningCount,
      },
      {
        family: 'aws_ecs_service_current_count',
        labels: { ...labels, state: 'pending' },
        value: service.pendingCount,
      }
    );
  }
  return samples;
}

/**
 * Task counts and registered/remaining CPU and memory per container instance.
 */
export function deriveInstanceSamples(
  clusterName: ClusterName,
  instances: readonly ContainerInstanceRecord[]
): MetricSample[] {
  if (!clusterName) {
    logger.warn({ count: instances.length }, 'Skipping container instances without cluster name');
    return [];
  }

  const samples: MetricSample[] = [];
  for (const instance of instances) {
    if (!instance.ec2InstanceId) {
      logger.warn({ cluster: clusterName }, 'Skipping container instance without EC2 instance id');
      continue;
    }
    const instanceId = instance.ec2InstanceId;
    samples.push(
      {
        family: 'aws_ecs_container_instance_tasks_count',
        labels: { cluster: clusterName, instance: instanceId, state: 'running' },
        value: instance.runningTasksCount,
      },
      {
        family: 'aws_ecs_container_instance_tasks_count',
        labels: { cluster: clusterName, instance: instanceId, state: 'pending' },
        value: instance.pendingTasksCount,
      },
      ...resourceSamples(
        'aws_ecs_container_instance_registered_resources',
        clusterName,
        instanceId,
        instance.registeredResources
      ),
      ...resourceSamples(
        'aws_ecs_container_instance_remaining_resources',
        clusterName,
        instanceId,
        instance.remainingResources
      )
    );
  }
  return samples;
}

export function deriveSnapshotSamples(snapshot: ClusterSnapshot): MetricSample[] {
  return [
    ...deriveServiceSamples(snapshot.clusterName, snapshot.services),
    ...deriveInstanceSamples(snapshot.clusterName, snapshot.instances),
  ];
}
