/**
 * Scrapers.
 *
 * A scraper produces a fresh, self-contained Prometheus registry on every
 * call. Nothing is cached between calls, so concurrent scrapes never register
 * the same metric object twice.
 */

import { Gauge, Registry } from 'prom-client';
import type { ClusterCollector } from '@core/collector';
import { METRIC_FAMILIES, deriveSnapshotSamples } from '@core/metrics';
import type { ClusterName, CollectionResult, MetricFamilyName } from '@/types';

/**
 * Name of the per-pipeline success gauge.
 */
export const SUCCESS_METRIC_NAME = 'aws_ecs_exporter_success';

/**
 * Anything able to produce the metrics of one scrape.
 */
export interface Scraper {
  scrape(): Promise<Registry>;
}

/**
 * Builds a new registry holding the derived samples of every snapshot and
 * the success gauge of every pipeline in the outcome.
 *
 * The success gauge is written for every (cluster, resource type) pair,
 * including failed ones, so it is present even when nothing was collected.
 */
export function buildScrapeRegistry(result: CollectionResult): Registry {
  const registry = new Registry();

  const gauges = new Map<MetricFamilyName, Gauge>(
    METRIC_FAMILIES.map((family) => [
      family.name,
      new Gauge({
        name: family.name,
        help: family.help,
        labelNames: family.labelNames,
        registers: [registry],
      }),
    ])
  );

  for (const snapshot of result.snapshots.values()) {
    for (const sample of deriveSnapshotSamples(snapshot)) {
      const gauge = gauges.get(sample.family);
      if (!gauge) {
        throw new Error(`Unknown metric family: ${sample.family}`);
      }
      gauge.set(sample.labels, sample.value);
    }
  }

  const successGauge = new Gauge({
    name: SUCCESS_METRIC_NAME,
    help: 'Whether retrieval of the ECS resources of a cluster from the AWS API was successful',
    labelNames: ['cluster', 'scraped_resource'],
    registers: [registry],
  });
  for (const entry of result.outcome) {
    successGauge.set(
      { cluster: entry.clusterName, scraped_resource: entry.resourceType },
      entry.success ? 1 : 0
    );
  }

  return registry;
}

/**
 * Scrapes any number of clusters concurrently.
 */
export class MultiClusterScraper implements Scraper {
  private readonly clusterNames: readonly ClusterName[];

  constructor(
    private readonly collector: ClusterCollector,
    clusterNames: readonly ClusterName[]
  ) {
    if (clusterNames.length === 0) {
      throw new Error('At least one cluster name is required');
    }
    this.clusterNames = [...clusterNames];
  }

  async scrape(): Promise<Registry> {
    const result = await this.collector.collect(this.clusterNames);
    return buildScrapeRegistry(result);
  }
}

/**
 * Scrapes exactly one cluster.
 */
export class SingleClusterScraper implements Scraper {
  constructor(
    private readonly collector: ClusterCollector,
    private readonly clusterName: ClusterName
  ) {
    if (!clusterName) {
      throw new Error('Cluster name must not be empty');
    }
  }

  async scrape(): Promise<Registry> {
    const { snapshot, outcome } = await this.collector.collectCluster(this.clusterName);
    return buildScrapeRegistry({
      snapshots: new Map([[snapshot.clusterName, snapshot]]),
      outcome,
    });
  }
}
