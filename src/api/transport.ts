import { RequestTimeoutError, TransportError } from '../errors';

export type HttpMethod = 'GET' | 'POST' | 'PATCH';

export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: string;
}

export interface TransportResponse {
  status: number;
  headers: Record<string, string>;
  body: Uint8Array;
}

/**
 * Performs one request/response round trip. Status codes are returned as-is;
 * interpreting them is the caller's job.
 */
export interface Transport {
  request(req: TransportRequest): Promise<TransportResponse>;
}

export type FetchLike = typeof fetch;

export interface FetchTransportOptions {
  fetch?: FetchLike;
  timeoutMs?: number;
}

export const DEFAULT_TIMEOUT_MS = 30_000;

export class FetchTransport implements Transport {
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number;

  constructor(options: FetchTransportOptions = {}) {
    this.fetchImpl = options.fetch ?? globalThis.fetch;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    if (!this.fetchImpl) {
      throw new TransportError('fetch API is not available. Provide options.fetch or run on Node 18+');
    }
  }

  async request(req: TransportRequest): Promise<TransportResponse> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const resp = await this.fetchImpl(req.url, {
        method: req.method,
        headers: req.headers,
        body: req.body,
        signal: controller.signal
      });
      const headers: Record<string, string> = {};
      resp.headers.forEach((value, key) => {
        headers[key] = value;
      });
      const body = new Uint8Array(await resp.arrayBuffer());
      return { status: resp.status, headers, body };
    } catch (error) {
      if (controller.signal.aborted) {
        throw new RequestTimeoutError(req.url, this.timeoutMs);
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new TransportError(`${req.method} ${req.url} failed: ${reason}`, { cause: error });
    } finally {
      clearTimeout(timeout);
    }
  }
}
