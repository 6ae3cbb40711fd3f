import type { FetchOutcome } from '../result';
import { fetchSource, SourceContext } from './fetchSource';
import { JsonObject, listAt, recordsOf } from './envelope';

/**
 * Edge DNS zones. The v2 Config DNS API is asked first; an error or an empty
 * answer falls back to v1.
 */
export async function listZones(ctx: SourceContext): Promise<FetchOutcome<JsonObject[]>> {
  const parse = (data: unknown) => recordsOf(listAt(data, 'zones'));
  const v2 = await fetchSource(ctx, 'config-dns/v2/zones', parse, [], 'edgedns-zones-v2');
  if (v2.value.length) return v2;
  return fetchSource(ctx, 'config-dns/v1/zones', parse, [], 'edgedns-zones');
}

export default listZones;
