import type { ApiClient, QueryParams } from '../net/edgegridClient';
import logger from '../logger';
import { errorMessage } from '../errors';
import { recordFetchFailure, RunMetrics } from '../metrics';
import { degraded, FetchOutcome, ok } from '../result';

/** What every fetcher needs: the signed client and, optionally, run metrics. */
export interface SourceContext {
  client: ApiClient;
  metrics?: RunMetrics;
}

export interface FetchSourceOptions {
  params?: QueryParams;
}

/**
 * Common wrapper for best-effort resource fetches.
 * Any failure (transport, non-2xx, malformed body, parser throw) is logged at
 * debug level and becomes a degraded outcome carrying `empty`.
 */
export async function fetchSource<T>(
  ctx: SourceContext,
  path: string,
  parser: (data: unknown) => T,
  empty: T,
  resource: string,
  opts?: FetchSourceOptions,
): Promise<FetchOutcome<T>> {
  try {
    const data = await ctx.client.get(path, opts?.params);
    return ok(parser(data));
  } catch (err) {
    logger.debug({ err, resource, path }, `${resource} fetch error`);
    recordFetchFailure(ctx.metrics, resource);
    return degraded(empty, errorMessage(err));
  }
}

export default fetchSource;
