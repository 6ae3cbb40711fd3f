/**
 * Per-run Prometheus metrics using `prom-client`.
 *
 * Each run gets its own Registry so nothing leaks between runs (or tests).
 * The CLI serialises it with `registry.metrics()` when `--metrics-file` is set,
 * which suits the node_exporter textfile collector for scheduled runs.
 *
 * Metrics:
 * - `cdn_reporter_api_requests_total{status}` (Counter)
 * - `cdn_reporter_fetch_failures_total{resource}` (Counter)
 * - `cdn_reporter_hostnames` (Gauge)
 */

import { Counter, Gauge, Registry } from 'prom-client';

export interface RunMetrics {
  registry: Registry;
  apiRequests: Counter<'status'>;
  fetchFailures: Counter<'resource'>;
  hostnames: Gauge;
}

export function createRunMetrics(): RunMetrics {
  const registry = new Registry();
  return {
    registry,
    apiRequests: new Counter({
      name: 'cdn_reporter_api_requests_total',
      help: 'Signed API requests issued, by HTTP status (or "error" when no response)',
      labelNames: ['status'],
      registers: [registry],
    }),
    fetchFailures: new Counter({
      name: 'cdn_reporter_fetch_failures_total',
      help: 'Best-effort resource fetches that degraded to an empty result',
      labelNames: ['resource'],
      registers: [registry],
    }),
    hostnames: new Gauge({
      name: 'cdn_reporter_hostnames',
      help: 'Hostnames discovered in the last run',
      registers: [registry],
    }),
  };
}

export function recordApiRequest(metrics: RunMetrics | undefined, status: number | 'error'): void {
  metrics?.apiRequests.inc({ status: String(status) });
}

export function recordFetchFailure(metrics: RunMetrics | undefined, resource: string): void {
  metrics?.fetchFailures.inc({ resource });
}
