import type { FetchOutcome } from '../result';
import { fetchSource, SourceContext } from './fetchSource';
import { isRecord, JsonObject, listAt, recordsOf } from './envelope';

/**
 * Cloudlets policies (edge redirectors, phased release, ...). Some accounts
 * answer with a bare array instead of `{ policies: [] }`.
 */
export async function listCloudletPolicies(ctx: SourceContext): Promise<FetchOutcome<JsonObject[]>> {
  return fetchSource(
    ctx,
    'cloudlets/v2/policies',
    (data) => recordsOf(isRecord(data) ? listAt(data, 'policies') : listAt(data)),
    [],
    'cloudlets-policies',
  );
}

export default listCloudletPolicies;
