/**
 * Metrics about the exporter itself.
 *
 * These live in a process-wide registry that is populated once at startup,
 * read on every request to /metrics and never reset. Per-scrape metrics are
 * kept out of it; see `buildScrapeRegistry`.
 */

import client, { Counter, Registry } from 'prom-client';

export type RequestStatus = 'success' | 'error';

export interface ExporterMetrics {
  registry: Registry;
  httpRequests: Counter<'status'>;
}

/**
 * Registers the exporter metrics in the given registry.
 *
 * @param registry - Registry to populate
 * @param collectDefaults - Also register the Node.js process metrics
 */
export function createExporterMetrics(
  registry: Registry = new Registry(),
  collectDefaults = false
): ExporterMetrics {
  if (collectDefaults) {
    client.collectDefaultMetrics({ register: registry });
  }

  const httpRequests = new Counter({
    name: 'http_requests',
    help: 'Number of HTTP requests received by the exporter',
    labelNames: ['status'] as const,
    registers: [registry],
  });

  return { registry, httpRequests };
}

let processMetrics: ExporterMetrics | undefined;

/**
 * Exporter metrics registered in prom-client's global registry, together
 * with the default process metrics. Created on first use.
 */
export function getProcessExporterMetrics(): ExporterMetrics {
  if (!processMetrics) {
    processMetrics = createExporterMetrics(client.register, true);
  }
  return processMetrics;
}
