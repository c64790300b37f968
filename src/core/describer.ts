/**
 * Batched detail lookup for listed identifiers.
 *
 * ECS accepts at most ten identifiers per describe call. Identifiers are
 * split into consecutive batches and described one batch at a time.
 */

import type { ClusterApi } from '@core/clusterApi';
import type {
  ClusterName,
  DescribeResult,
  DetailRecord,
  NamedFailure,
  ResourceType,
} from '@/types';
import { setupLogger } from '@shared/utils/logger';

const logger = setupLogger('ecs-exporter:describer');

/**
 * Maximum number of identifiers per describe call (ECS API limit).
 */
export const DESCRIBE_BATCH_SIZE = 10;

type BatchDescriber<T extends ResourceType> = (
  api: ClusterApi,
  clusterName: ClusterName,
  identifiers: string[]
) => Promise<DescribeResult<DetailRecord<T>>>;

const BATCH_DESCRIBERS: { [T in ResourceType]: BatchDescriber<T> } = {
  services: (api, clusterName, identifiers) => api.describeServices(clusterName, identifiers),
  cluster_instances: (api, clusterName, identifiers) =>
    api.describeContainerInstances(clusterName, identifiers),
};

/**
 * Splits a list into consecutive chunks of at most `size` items, keeping order.
 */
export function chunk<T>(items: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`Chunk size must be a positive integer, got ${size}`);
  }
  const chunks: T[][] = [];
  for (let start = 0; start < items.length; start += size) {
    chunks.push(items.slice(start, start + size));
  }
  return chunks;
}

function logFailures(
  clusterName: ClusterName,
  resourceType: ResourceType,
  failures: NamedFailure[]
): void {
  for (const failure of failures) {
    logger.warn(
      {
        cluster: clusterName,
        resourceType,
        arn: failure.arn,
        reason: failure.reason,
        detail: failure.detail,
      },
      'Failed to describe resource'
    );
  }
}

/**
 * Describes the given identifiers in batches of {@link DESCRIBE_BATCH_SIZE}.
 *
 * Rejects only if a describe call itself fails, in which case records from
 * earlier batches are discarded. Resources the API reports as failures are
 * logged and left out of the result.
 *
 * @param api - Shared cluster API
 * @param clusterName - Cluster the identifiers belong to
 * @param resourceType - Services or container instances
 * @param identifiers - Identifiers to describe, usually from `listIdentifiers`
 * @returns Records of every resolved resource, in batch order
 */
export async function describeDetails<T extends ResourceType>(
  api: ClusterApi,
  clusterName: ClusterName,
  resourceType: T,
  identifiers: readonly string[]
): Promise<DetailRecord<T>[]> {
  const describeBatch = BATCH_DESCRIBERS[resourceType];
  const records: DetailRecord<T>[] = [];

  for (const batch of chunk(identifiers, DESCRIBE_BATCH_SIZE)) {
    const result = await describeBatch(api, clusterName, batch);
    logFailures(clusterName, resourceType, result.failures);
    records.push(...result.records);
  }

  logger.debug(
    {
      cluster: clusterName,
      resourceType,
      requested: identifiers.length,
      resolved: records.length,
    },
    'Described resources'
  );
  return records;
}
