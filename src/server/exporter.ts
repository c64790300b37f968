/**
 * HTTP exporter.
 *
 * Serves a home page, a liveness page and the Prometheus metrics of a fresh
 * scrape on every request to /metrics.
 */

import { createServer } from 'node:https';
import { readFile } from 'node:fs/promises';
import Fastify, {
  type FastifyInstance,
  type FastifyPluginAsync,
  type FastifyServerFactory,
} from 'fastify';
import { Registry } from 'prom-client';
import type { Scraper } from '@core/scraper';
import type { Config, TlsConfig } from '@/types';
import {
  getProcessExporterMetrics,
  type ExporterMetrics,
  type RequestStatus,
} from '@shared/utils/exporterMetrics';
import { setupLogger } from '@shared/utils/logger';

const logger = setupLogger('ecs-exporter:server');

export const EXPORTER_TITLE = 'AWS ECS Exporter';

export const STATUS_PAGE = `<html><head><title>${EXPORTER_TITLE}</title></head><body>Ok</body></html>`;

export function renderHomePage(version: string): string {
  return `<html>
<head><title>${EXPORTER_TITLE}</title></head>
<body>
  ${EXPORTER_TITLE} v${version}
  <ul>
    <li><a href="/status">Exporter status</a></li>
    <li><a href="/metrics">Metrics</a></li>
  </ul>
</body>
</html>
`;
}

export interface TlsMaterial {
  key: string | Buffer;
  cert: string | Buffer;
}

export interface ExporterOptions {
  scraper: Scraper;
  /** Defaults to the process-wide exporter metrics */
  exporterMetrics?: ExporterMetrics;
  /** Serve over HTTPS with this key and certificate */
  tls?: TlsMaterial;
  version?: string;
}

export interface MetricsPayload {
  status: RequestStatus;
  contentType: string;
  body: string;
}

/**
 * Runs one scrape and renders it together with the exporter metrics.
 *
 * Never rejects because of the scrape: a scrape that fails, or whose
 * registry cannot be merged with the exporter metrics, is logged, counted
 * as an error and rendered as the exporter metrics alone.
 */
export async function renderMetrics(
  scraper: Scraper,
  exporterMetrics: ExporterMetrics
): Promise<MetricsPayload> {
  let merged: Registry | undefined;

  try {
    const registry = await scraper.scrape();
    merged = Registry.merge([exporterMetrics.registry, registry]);
  } catch (error) {
    logger.warn({ error: String(error) }, 'Scrape failed');
  }

  const status: RequestStatus = merged ? 'success' : 'error';
  exporterMetrics.httpRequests.inc({ status });

  if (merged) {
    try {
      return { status, contentType: merged.contentType, body: await merged.metrics() };
    } catch (error) {
      logger.warn({ error: String(error) }, 'Failed to render scrape metrics');
    }
  }

  return {
    status,
    contentType: exporterMetrics.registry.contentType,
    body: await exporterMetrics.registry.metrics(),
  };
}

interface ExporterRoutesOptions {
  scraper: Scraper;
  exporterMetrics: ExporterMetrics;
  version: string;
}

export const exporterRoutes: FastifyPluginAsync<ExporterRoutesOptions> = async (app, opts) => {
  const homePage = renderHomePage(opts.version);

  app.get('/', async (_request, reply) => {
    return reply.type('text/html; charset=utf-8').send(homePage);
  });

  app.get('/status', async (_request, reply) => {
    return reply.type('text/html; charset=utf-8').send(STATUS_PAGE);
  });

  app.get('/metrics', async (_request, reply) => {
    const payload = await renderMetrics(opts.scraper, opts.exporterMetrics);
    return reply.status(200).type(payload.contentType).send(payload.body);
  });
};

/**
 * Build and configure the Fastify application.
 * Exported separately from the server start so tests can use `app.inject()`.
 */
export async function buildExporterApp(options: ExporterOptions): Promise<FastifyInstance> {
  const { tls } = options;
  const serverFactory: FastifyServerFactory | undefined = tls
    ? (handler) => createServer({ key: tls.key, cert: tls.cert }, handler)
    : undefined;

  const app = Fastify({ logger: false, serverFactory });

  await app.register(exporterRoutes, {
    scraper: options.scraper,
    exporterMetrics: options.exporterMetrics ?? getProcessExporterMetrics(),
    version: options.version ?? process.env.npm_package_version ?? '0.0.0',
  });

  return app;
}

export async function loadTlsMaterial(tls: TlsConfig): Promise<TlsMaterial> {
  const [key, cert] = await Promise.all([readFile(tls.keyPath), readFile(tls.certPath)]);
  return { key, cert };
}

/**
 * Starts the exporter on the configured address.
 *
 * @returns The listening Fastify instance
 */
export async function startExporter(config: Config, scraper: Scraper): Promise<FastifyInstance> {
  const tls = config.tls ? await loadTlsMaterial(config.tls) : undefined;
  const app = await buildExporterApp({ scraper, tls });

  await app.listen({ host: config.listen.host, port: config.listen.port });

  logger.info(
    {
      host: config.listen.host,
      port: config.listen.port,
      tls: tls !== undefined,
      clusters: config.clusterNames,
    },
    'Exporter listening, metrics exposed on /metrics'
  );
  return app;
}
