/**
 * Paginated enumeration of resource identifiers within one cluster.
 */

import type { ClusterApi } from '@core/clusterApi';
import type { ClusterName, IdentifierPage, ResourceType } from '@/types';
import { setupLogger } from '@shared/utils/logger';

const logger = setupLogger('ecs-exporter:lister');

function listPage(
  api: ClusterApi,
  clusterName: ClusterName,
  resourceType: ResourceType,
  nextToken: string | undefined
): Promise<IdentifierPage> {
  switch (resourceType) {
    case 'services':
      return api.listServices(clusterName, nextToken);
    case 'cluster_instances':
      return api.listContainerInstances(clusterName, nextToken);
  }
}

/**
 * Lists every identifier of one resource type in a cluster.
 *
 * Follows the continuation token until a page comes back without one.
 * A failed page rejects the whole listing; no partial list is returned.
 *
 * @param api - Shared cluster API
 * @param clusterName - Cluster to enumerate
 * @param resourceType - Services or container instances
 * @returns Identifiers (ARNs) in the order the API returned them
 */
export async function listIdentifiers(
  api: ClusterApi,
  clusterName: ClusterName,
  resourceType: ResourceType
): Promise<string[]> {
  const identifiers: string[] = [];
  let nextToken: string | undefined;
  let pages = 0;

  do {
    const page = await listPage(api, clusterName, resourceType, nextToken);
    identifiers.push(...page.identifiers);
    nextToken = page.nextToken;
    pages++;
  } while (nextToken);

  logger.debug(
    { cluster: clusterName, resourceType, pages, count: identifiers.length },
    'Listed identifiers'
  );
  return identifiers;
}
