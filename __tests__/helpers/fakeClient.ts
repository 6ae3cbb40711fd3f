import type { ApiClient, QueryParams } from '../../lib/net/edgegridClient';
import { HttpError } from '../../lib/errors';

export type Route = unknown | Error | ((params: QueryParams) => unknown);

export interface RecordedCall {
  path: string;
  params: QueryParams;
}

/**
 * In-process ApiClient answering from a route table keyed by path.
 * Functions are called with the query params; Errors are thrown; a path with
 * no route answers HTTP 404.
 */
export class FakeApiClient implements ApiClient {
  readonly calls: RecordedCall[] = [];

  constructor(private readonly routes: Record<string, Route> = {}) {}

  async get(path: string, params: QueryParams = {}): Promise<unknown> {
    this.calls.push({ path, params });
    if (!(path in this.routes)) throw new HttpError(404, `/${path}`, 'not found');
    const route = this.routes[path];
    if (route instanceof Error) throw route;
    if (typeof route === 'function') return route(params);
    return route;
  }

  paths(): string[] {
    return this.calls.map((c) => c.path);
  }
}
