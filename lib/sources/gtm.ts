/**
 * Global Traffic Management — domains and their datacenters, properties,
 * liveness tests and cidr/geo/as maps. List endpoints answer either
 * `{ items: [] }` or a bare array depending on the account.
 */
import type { FetchOutcome } from '../result';
import { fetchSource, SourceContext } from './fetchSource';
import { isRecord, JsonObject, normalizeItems, recordsOf, stringField } from './envelope';

export type GtmSubResource = 'datacenters' | 'properties' | 'liveness-tests' | 'cidr-maps' | 'geo-maps' | 'as-maps';

const domainPath = (domain: string) => `gtm/v1/domains/${encodeURIComponent(domain)}`;

/** Domain entries may be bare names or objects carrying `name`. */
function domainName(entry: unknown): string | undefined {
  if (typeof entry === 'string') return entry || undefined;
  if (isRecord(entry)) return stringField(entry, 'name');
  return undefined;
}

export async function listGtmDomains(ctx: SourceContext): Promise<FetchOutcome<string[]>> {
  return fetchSource(
    ctx,
    'gtm/v1/domains',
    (data) => normalizeItems(data).map(domainName).filter((d): d is string => d !== undefined),
    [],
    'gtm-domains',
  );
}

export async function listGtmResource(
  ctx: SourceContext,
  domain: string,
  resource: GtmSubResource,
): Promise<FetchOutcome<JsonObject[]>> {
  return fetchSource(
    ctx,
    `${domainPath(domain)}/${resource}`,
    (data) => recordsOf(normalizeItems(data)),
    [],
    `gtm-${resource}`,
  );
}

/** Full property document, including `trafficTargets`. */
export async function getGtmProperty(ctx: SourceContext, domain: string, propertyName: string): Promise<FetchOutcome<JsonObject>> {
  return fetchSource(
    ctx,
    `${domainPath(domain)}/properties/${encodeURIComponent(propertyName)}`,
    (data) => (isRecord(data) ? data : {}),
    {},
    'gtm-property',
  );
}
