import EdgeGrid from 'akamai-edgegrid';
import type { ReporterConfig, Timeouts } from '../config';
import { CONFIG } from '../config';
import { HttpError, ReporterError, TimeoutError } from '../errors';
import logger from '../logger';
import { recordApiRequest, RunMetrics } from '../metrics';
import { withTimeout } from './timeout';

export type QueryValue = string | number | boolean | undefined;
export type QueryParams = Record<string, QueryValue>;

/** The only seam the fetchers depend on; tests substitute an in-process fake. */
export interface ApiClient {
  get(path: string, params?: QueryParams): Promise<unknown>;
}

/** Produces the Authorization header for a relative path (query included). */
export interface RequestSigner {
  sign(relativePath: string): string;
}

/**
 * Signs with `akamai-edgegrid`. The library computes the EG1-HMAC-SHA256
 * header over host, path and query; transport stays with `fetch`.
 */
export class EdgeGridSigner implements RequestSigner {
  private readonly eg: EdgeGrid;

  constructor(config: Pick<ReporterConfig, 'host' | 'clientToken' | 'clientSecret' | 'accessToken'>) {
    this.eg = new EdgeGrid(config.clientToken, config.clientSecret, config.accessToken, `https://${config.host}`);
  }

  sign(relativePath: string): string {
    const signed = this.eg.auth({ path: relativePath, method: 'GET', headers: {}, body: {} }).request;
    const header = signed.headers.Authorization;
    if (!header) {
      throw new ReporterError(`EdgeGrid produced no Authorization header for ${relativePath}`, 'SIGNING_FAILED');
    }
    return header;
  }
}

export interface EdgeGridClientOptions {
  signer?: RequestSigner;
  fetchImpl?: typeof fetch;
  metrics?: RunMetrics;
}

/**
 * Build `/<path>?<query>` with the account switch key appended when set.
 * Undefined values are dropped; key order follows insertion order.
 */
export function buildRelativePath(path: string, params: QueryParams = {}, accountSwitchKey?: string): string {
  const query = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined) continue;
    query.append(key, String(value));
  }
  if (accountSwitchKey) query.append('accountSwitchKey', accountSwitchKey);
  const qs = query.toString();
  const clean = `/${path.replace(/^\/+/, '')}`;
  return qs ? `${clean}?${qs}` : clean;
}

export class EdgeGridClient implements ApiClient {
  private readonly baseUrl: string;
  private readonly accountSwitchKey?: string;
  private readonly timeouts: Timeouts;
  private readonly signer: RequestSigner;
  private readonly fetchImpl?: typeof fetch;
  private readonly metrics?: RunMetrics;

  constructor(config: ReporterConfig, opts: EdgeGridClientOptions = {}) {
    this.baseUrl = `https://${config.host}`;
    this.accountSwitchKey = config.accountSwitchKey;
    this.timeouts = { ...config.timeouts };
    this.signer = opts.signer ?? new EdgeGridSigner(config);
    this.fetchImpl = opts.fetchImpl;
    this.metrics = opts.metrics;
  }

  /**
   * Signed GET returning the parsed JSON body.
   * The connect timeout covers the wait for response headers, the read
   * timeout the body download. Non-2xx responses raise HttpError.
   */
  async get(path: string, params?: QueryParams): Promise<unknown> {
    const relative = buildRelativePath(path, params, this.accountSwitchKey);
    const url = `${this.baseUrl}${relative}`;
    const headers = {
      Authorization: this.signer.sign(relative),
      Accept: 'application/json',
      'User-Agent': CONFIG.USER_AGENT,
    };
    const runtimeFetch = this.fetchImpl ?? globalThis.fetch;
    const controller = new AbortController();

    logger.debug({ path: relative }, 'GET');

    const connectTimer = setTimeout(() => controller.abort(), this.timeouts.connectMs);
    let res: Response;
    try {
      res = await runtimeFetch(url, { method: 'GET', headers, signal: controller.signal });
    } catch (err) {
      recordApiRequest(this.metrics, 'error');
      if (controller.signal.aborted) throw new TimeoutError('connect', relative, this.timeouts.connectMs);
      throw err;
    } finally {
      clearTimeout(connectTimer);
    }

    recordApiRequest(this.metrics, res.status);

    let text: string;
    try {
      text = await withTimeout(res.text(), this.timeouts.readMs, () => new TimeoutError('read', relative, this.timeouts.readMs));
    } catch (err) {
      controller.abort();
      throw err;
    }

    if (!res.ok) {
      throw new HttpError(res.status, relative, text);
    }
    if (!text.trim()) return {};
    try {
      return JSON.parse(text);
    } catch {
      throw new ReporterError(`Malformed JSON body from ${relative}`, 'MALFORMED_BODY', { path: relative });
    }
  }
}

export default EdgeGridClient;
