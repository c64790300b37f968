/**
 * Cluster collector.
 *
 * Runs the list-then-describe pipeline for services and container instances
 * of every requested cluster. A failing pipeline is logged and recorded in
 * the outcome; it never interrupts the other pipelines.
 */

import type { ClusterApi } from '@core/clusterApi';
import { listIdentifiers } from '@core/lister';
import { describeDetails } from '@core/describer';
import type {
  ClusterName,
  ClusterSnapshot,
  CollectionResult,
  DetailRecord,
  PipelineOutcome,
  ResourceType,
} from '@/types';
import { setupLogger } from '@shared/utils/logger';

const logger = setupLogger('ecs-exporter:collector');

interface PipelineResult<T extends ResourceType> {
  records: DetailRecord<T>[];
  outcome: PipelineOutcome;
}

export class ClusterCollector {
  constructor(private readonly api: ClusterApi) {}

  /**
   * Lists and describes every resource of one type in one cluster.
   *
   * @throws The underlying API error if any list or describe call fails
   */
  async collectResources<T extends ResourceType>(
    clusterName: ClusterName,
    resourceType: T
  ): Promise<DetailRecord<T>[]> {
    const identifiers = await listIdentifiers(this.api, clusterName, resourceType);
    return describeDetails(this.api, clusterName, resourceType, identifiers);
  }

  private async runPipeline<T extends ResourceType>(
    clusterName: ClusterName,
    resourceType: T
  ): Promise<PipelineResult<T>> {
    try {
      const records = await this.collectResources(clusterName, resourceType);
      return { records, outcome: { clusterName, resourceType, success: true } };
    } catch (error) {
      logger.error(
        {
          cluster: clusterName,
          resourceType,
          error: String(error),
        },
        'Failed to collect cluster resources'
      );
      return { records: [], outcome: { clusterName, resourceType, success: false } };
    }
  }

  /**
   * Collects a snapshot of a single cluster.
   *
   * Services and container instances are collected concurrently and
   * independently of each other.
   */
  async collectCluster(
    clusterName: ClusterName
  ): Promise<{ snapshot: ClusterSnapshot; outcome: PipelineOutcome[] }> {
    const [services, instances] = await Promise.all([
      this.runPipeline(clusterName, 'services'),
      this.runPipeline(clusterName, 'cluster_instances'),
    ]);

    return {
      snapshot: {
        clusterName,
        services: services.records,
        instances: instances.records,
      },
      outcome: [services.outcome, instances.outcome],
    };
  }

  /**
   * Collects snapshots of all given clusters concurrently.
   *
   * Duplicate names are collected once. The returned outcome has one entry
   * per (cluster, resource type) pair, in cluster order.
   *
   * @param clusterNames - Clusters to collect
   * @returns Snapshots keyed by cluster name, plus per-pipeline outcome
   */
  async collect(clusterNames: readonly ClusterName[]): Promise<CollectionResult> {
    const uniqueNames = [...new Set(clusterNames)];

    logger.debug({ clusters: uniqueNames }, 'Starting collection');

    const clusters = await Promise.all(uniqueNames.map((name) => this.collectCluster(name)));

    const result: CollectionResult = { snapshots: new Map(), outcome: [] };
    for (const { snapshot, outcome } of clusters) {
      result.snapshots.set(snapshot.clusterName, snapshot);
      result.outcome.push(...outcome);
    }

    const failed = result.outcome.filter((entry) => !entry.success).length;
    logger.debug(
      {
        clusters: uniqueNames.length,
        pipelines: result.outcome.length,
        failed,
      },
      'Collection completed'
    );

    return result;
  }
}
