/**
 * Core type definitions for the ECS cluster exporter.
 *
 * Centralizes shared types to avoid circular dependencies.
 */

/**
 * Name of an ECS cluster as given on the command line.
 */
export type ClusterName = string;

/**
 * Resource kinds enumerated by the exporter, named after the
 * `scraped_resource` label they are reported under.
 */
export type ResourceType = 'services' | 'cluster_instances';

/**
 * Capacity dimensions ECS reports on a container instance.
 * Only CPU and MEMORY are turned into metrics.
 */
export type ResourceKind = 'CPU' | 'MEMORY' | 'GPU' | 'PORTS' | 'PORTS_UDP';

export type ResourceAmounts = Partial<Record<ResourceKind, number>>;

/**
 * One ECS service, as seen at scrape time.
 */
export interface ServiceRecord {
  /** Absent when the API omitted the service name. */
  name?: string;
  desiredCount: number;
  runningCount: number;
  pendingCount: number;
}

/**
 * One container instance (EC2 host) registered to a cluster.
 */
export interface ContainerInstanceRecord {
  /** Absent when the API omitted the EC2 instance id. */
  ec2InstanceId?: string;
  runningTasksCount: number;
  pendingTasksCount: number;
  registeredResources: ResourceAmounts;
  remainingResources: ResourceAmounts;
}

/**
 * Record type produced by a describe call for each resource type.
 */
export interface DetailRecordByType {
  services: ServiceRecord;
  cluster_instances: ContainerInstanceRecord;
}

export type DetailRecord<T extends ResourceType> = DetailRecordByType[T];

/**
 * Per-identifier failure returned next to an otherwise successful describe call.
 */
export interface NamedFailure {
  arn?: string;
  reason?: string;
  detail?: string;
}

/**
 * One page of a list call.
 */
export interface IdentifierPage {
  identifiers: string[];
  nextToken?: string;
}

/**
 * Result of one describe call.
 */
export interface DescribeResult<R> {
  records: R[];
  failures: NamedFailure[];
}

/**
 * The state of one cluster collected during a single scrape.
 * A list is empty when its pipeline failed; see {@link ScrapeOutcome}.
 */
export interface ClusterSnapshot {
  readonly clusterName: ClusterName;
  readonly services: readonly ServiceRecord[];
  readonly instances: readonly ContainerInstanceRecord[];
}

/**
 * Whether the pipeline of one resource type succeeded for one cluster.
 */
export interface PipelineOutcome {
  clusterName: ClusterName;
  resourceType: ResourceType;
  success: boolean;
}

export type ScrapeOutcome = PipelineOutcome[];

/**
 * Result of a collection pass over one or more clusters.
 */
export interface CollectionResult {
  snapshots: Map<ClusterName, ClusterSnapshot>;
  outcome: ScrapeOutcome;
}

/**
 * A single metric value with its labels.
 */
export interface MetricSample {
  family: MetricFamilyName;
  labels: Record<string, string>;
  value: number;
}

export type MetricFamilyName =
  | 'aws_ecs_service_desired_count'
  | 'aws_ecs_service_current_count'
  | 'aws_ecs_container_instance_tasks_count'
  | 'aws_ecs_container_instance_registered_resources'
  | 'aws_ecs_container_instance_remaining_resources';

/**
 * TLS material for the HTTP listener.
 */
export interface TlsConfig {
  keyPath: string;
  certPath: string;
}

/**
 * Role assumed before talking to ECS.
 */
export interface RoleConfig {
  arn: string;
  externalId?: string;
  sessionName: string;
}

/**
 * Validated exporter configuration.
 */
export interface Config {
  clusterNames: ClusterName[];
  region?: string;
  role?: RoleConfig;
  listen: {
    host: string;
    port: number;
  };
  tls?: TlsConfig;
  logLevel: string;
}
