import type { FetchOutcome } from '../result';
import { fetchSource, SourceContext } from './fetchSource';
import { JsonObject, listAt, recordsOf } from './envelope';

export async function listEdgeWorkers(ctx: SourceContext): Promise<FetchOutcome<JsonObject[]>> {
  return fetchSource(ctx, 'edgeworkers/v1/edgeworkers', (data) => recordsOf(listAt(data, 'edgeworkers')), [], 'edgeworkers');
}

export default listEdgeWorkers;
