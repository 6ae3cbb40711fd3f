import type { FetchOutcome } from '../result';
import { degraded, ok } from '../result';
import { fetchSource, SourceContext } from './fetchSource';
import { isRecord, JsonObject, listAt, recordsOf } from './envelope';

const CLOUD_WRAPPER_PATHS = ['cloud-wrapper/v1/containers', 'cloud-wrapper/v1/configurations'];

function wrapperItems(data: unknown): JsonObject[] {
  if (isRecord(data)) {
    for (const key of ['items', 'containers', 'configurations']) {
      const items = recordsOf(listAt(data, key));
      if (items.length) return items;
    }
    return [];
  }
  return recordsOf(listAt(data));
}

/**
 * Cloud Wrapper containers. Each known endpoint is tried in turn and the first
 * non-empty answer wins.
 */
export async function listCloudWrapper(ctx: SourceContext): Promise<FetchOutcome<JsonObject[]>> {
  const reasons: string[] = [];
  for (const path of CLOUD_WRAPPER_PATHS) {
    const outcome = await fetchSource(ctx, path, wrapperItems, [], 'cloud-wrapper');
    if (outcome.value.length) return outcome;
    if (!outcome.ok) reasons.push(`${path}: ${outcome.reason}`);
  }
  return reasons.length === CLOUD_WRAPPER_PATHS.length ? degraded([], reasons.join('; ')) : ok([]);
}

export default listCloudWrapper;
