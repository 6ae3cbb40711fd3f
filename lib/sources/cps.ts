import type { FetchOutcome } from '../result';
import { fetchSource, SourceContext } from './fetchSource';
import { JsonObject, listAt, recordsOf } from './envelope';

/**
 * Certificate Provisioning System — enrollments with their CSR/SAN data.
 */
export async function listEnrollments(ctx: SourceContext): Promise<FetchOutcome<JsonObject[]>> {
  return fetchSource(ctx, 'cps/v2/enrollments', (data) => recordsOf(listAt(data, 'enrollments')), [], 'cps-enrollments');
}

export default listEnrollments;
