export interface HttpRequest {
  url: string;
  method: string;
  headers: Record<string, string>;
  body?: string;
}

export interface HttpResponse {
  status: number;
  headers: Record<string, string>;
  body: string;
}

/**
 * The HTTP exchange the client depends on. Implementations own connection
 * reuse and the per-call timeout, and report a timeout by throwing
 * {@link TransportTimeoutError}.
 */
export interface Transport {
  send(request: HttpRequest): Promise<HttpResponse>;
}

export class TransportTimeoutError extends Error {
  constructor(readonly timeoutMs: number, options?: { cause?: unknown }) {
    super(`Transport timed out after ${timeoutMs}ms`, options);
    this.name = 'TransportTimeoutError';
  }
}
