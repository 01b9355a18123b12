import type { HttpRequest, HttpResponse, Transport } from './types.js';
import { TransportTimeoutError } from './types.js';

export interface FetchTransportOptions {
  timeoutMs: number;
  fetch?: typeof fetch;
}

export class FetchTransport implements Transport {
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: FetchTransportOptions) {
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    try {
      const response = await this.fetchImpl(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      const headers: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        headers[key] = value;
      });

      return {
        status: response.status,
        headers,
        body: await response.text(),
      };
    } catch (error) {
      // AbortSignal.timeout rejects with a DOMException named TimeoutError
      if (error instanceof Error && error.name === 'TimeoutError') {
        throw new TransportTimeoutError(this.timeoutMs, { cause: error });
      }
      throw error;
    }
  }
}
