import type { ApiClient } from './net/edgegridClient';
import { errorMessage, HttpError } from './errors';
import logger from './logger';

export type ProbeStatus = 'accessible' | 'forbidden' | 'bad-request' | 'failed';

export interface ProbeResult {
  api: string;
  path: string;
  status: ProbeStatus;
  detail?: string;
}

export const PROBE_ENDPOINTS: ReadonlyArray<{ api: string; path: string }> = [
  { api: 'Contracts API', path: 'papi/v1/contracts' },
  { api: 'Groups API', path: 'papi/v1/groups' },
  { api: 'Properties API (PAPI)', path: 'papi/v1/properties' },
  { api: 'Certificate Provisioning System (CPS)', path: 'cps/v2/enrollments' },
  { api: 'Application Security (AppSec)', path: 'appsec/v1/configs' },
  { api: 'Global Traffic Management (GTM)', path: 'gtm/v1/domains' },
  { api: 'Edge DNS', path: 'edgedns/v1/zones' },
  { api: 'EdgeWorkers', path: 'edgeworkers/v1/ids' },
  { api: 'Cloudlets', path: 'cloudlets/v2/policies' },
  { api: 'Cloud Wrapper', path: 'cloud-wrapper/v1/locations' },
];

export function classifyProbeError(err: unknown): { status: ProbeStatus; detail: string } {
  if (err instanceof HttpError) {
    if (err.status === 403) return { status: 'forbidden', detail: 'HTTP 403' };
    if (err.status === 400) return { status: 'bad-request', detail: 'HTTP 400' };
    return { status: 'failed', detail: `HTTP ${err.status}` };
  }
  return { status: 'failed', detail: errorMessage(err) };
}

/** Call each list endpoint once, without parameters, and classify the answer. */
export async function probeApis(client: ApiClient, endpoints = PROBE_ENDPOINTS): Promise<ProbeResult[]> {
  const results: ProbeResult[] = [];
  for (const { api, path } of endpoints) {
    try {
      await client.get(path);
      results.push({ api, path, status: 'accessible' });
    } catch (err) {
      const { status, detail } = classifyProbeError(err);
      logger.debug({ err, api }, 'probe failed');
      results.push({ api, path, status, detail });
    }
  }
  return results;
}

export function formatProbeResults(results: ProbeResult[]): string {
  return results
    .map((r) => `${r.status.padEnd(11)} ${r.api}${r.detail ? ` (${r.detail})` : ''}`)
    .join('\n');
}
