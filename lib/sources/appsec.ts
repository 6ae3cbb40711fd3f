import type { FetchOutcome } from '../result';
import { fetchSource, SourceContext } from './fetchSource';
import { JsonObject, listAt, recordsOf } from './envelope';

/**
 * Application Security — WAF configurations and their security policies.
 */
export async function listSecurityConfigs(ctx: SourceContext): Promise<FetchOutcome<JsonObject[]>> {
  return fetchSource(ctx, 'appsec/v1/configs', (data) => recordsOf(listAt(data, 'configs')), [], 'appsec-configs');
}

export async function listSecurityPolicies(
  ctx: SourceContext,
  configId: string | number,
  version: number,
): Promise<FetchOutcome<JsonObject[]>> {
  return fetchSource(
    ctx,
    `appsec/v1/configs/${encodeURIComponent(String(configId))}/versions/${version}/security-policies`,
    (data) => recordsOf(listAt(data, 'policies')),
    [],
    'appsec-policies',
  );
}
