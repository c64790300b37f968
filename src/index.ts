/**
 * Entry point of the ECS cluster exporter.
 *
 * Loads the configuration, creates the shared AWS clients and starts the
 * HTTP exporter.
 */

import { ECSClient } from '@aws-sdk/client-ecs';
import { STSClient } from '@aws-sdk/client-sts';
import { hideBin } from 'yargs/helpers';
import type { FastifyInstance } from 'fastify';
import { EcsClusterApi } from '@core/clusterApi';
import { ClusterCollector } from '@core/collector';
import { ConfigError, loadConfig } from '@core/config';
import { createAssumeRoleProvider, logCallerIdentity } from '@core/credentials';
import { MultiClusterScraper, SingleClusterScraper, type Scraper } from '@core/scraper';
import { startExporter } from '@server/exporter';
import type { Config } from '@/types';
import { setLogLevel, setupLogger } from '@shared/utils/logger';

const logger = setupLogger('ecs-exporter:main');

/**
 * Creates the scraper for the configured clusters.
 *
 * One ECS client is shared by every scrape.
 */
async function createScraper(config: Config): Promise<Scraper> {
  const credentials = config.role
    ? createAssumeRoleProvider(config.role, config.region)
    : undefined;

  await logCallerIdentity(new STSClient({ region: config.region, credentials }));

  const ecsClient = new ECSClient({ region: config.region, credentials });
  const collector = new ClusterCollector(new EcsClusterApi(ecsClient));

  return config.clusterNames.length === 1
    ? new SingleClusterScraper(collector, config.clusterNames[0])
    : new MultiClusterScraper(collector, config.clusterNames);
}

async function main(argv: string[] = hideBin(process.argv)): Promise<FastifyInstance> {
  const config = loadConfig(argv);
  setLogLevel(config.logLevel);

  logger.info(
    {
      clusters: config.clusterNames,
      region: config.region ?? 'default',
      role: config.role?.arn,
    },
    'Starting ECS cluster exporter'
  );

  const scraper = await createScraper(config);
  const app = await startExporter(config, scraper);

  const shutdown = (signal: string): void => {
    logger.info({ signal }, 'Shutting down');
    app.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error({ error: String(error) }, 'Failed to close server');
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  return app;
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    logger.error({ error: error.message }, 'Invalid configuration');
  } else {
    logger.error({ error: String(error) }, 'Exporter failed');
  }
  process.exit(1);
});
