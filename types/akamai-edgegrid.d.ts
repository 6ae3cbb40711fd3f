declare module 'akamai-edgegrid' {
  interface EdgeGridRequest {
    path: string;
    method?: string;
    headers?: Record<string, string>;
    body?: string | Record<string, unknown>;
  }

  interface SignedRequest {
    url?: string;
    method?: string;
    headers: Record<string, string | undefined>;
  }

  class EdgeGrid {
    constructor(clientToken: string, clientSecret: string, accessToken: string, host: string, debug?: boolean);
    request: SignedRequest;
    auth(req: EdgeGridRequest): EdgeGrid;
    send(callback: (error: Error | null, response?: unknown, body?: string) => void): EdgeGrid;
  }

  export = EdgeGrid;
}
