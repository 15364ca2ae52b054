import { ZOOM_API_URL } from '../config/index.js';
import type { Transport, TransportRequest, TransportResponse } from '../providers/zoom/transport.js';
import type { HttpMethod } from '../providers/zoom/types.js';

export type FakeReply = { status?: number; json?: unknown; body?: string } | Error;
export type FakeHandler = (request: TransportRequest) => FakeReply;

export interface RecordedCall {
  method: HttpMethod;
  path: string;
  params?: Record<string, unknown>;
  headers: Record<string, string>;
  body?: unknown;
}

/**
 * In-process stand-in for the Zoom API. Routes are matched on method and the
 * path relative to the API base URL; unknown routes answer 404.
 */
export class FakeTransport implements Transport {
  readonly requests: TransportRequest[] = [];
  private readonly routes = new Map<string, FakeHandler>();

  on(method: HttpMethod, path: string, reply: FakeReply | FakeHandler): this {
    this.routes.set(`${method} ${path}`, typeof reply === 'function' ? reply : () => reply);
    return this;
  }

  async send(request: TransportRequest): Promise<TransportResponse> {
    // Params are snapshotted because the paginator reuses its params object.
    this.requests.push({ ...request, params: request.params && { ...request.params } });
    const handler = this.routes.get(`${request.method} ${relativePath(request.url)}`);
    const reply = handler ? handler(request) : { status: 404, json: { code: 404, message: 'Not routed' } };
    if (reply instanceof Error) {
      throw reply;
    }
    return {
      status: reply.status ?? 200,
      body: reply.body ?? (reply.json === undefined ? '' : JSON.stringify(reply.json))
    };
  }

  calls(): RecordedCall[] {
    return this.requests.map((request) => ({
      method: request.method,
      path: relativePath(request.url),
      params: request.params,
      headers: request.headers,
      body: request.body === undefined ? undefined : JSON.parse(request.body)
    }));
  }

  /** "METHOD path" for every request, in order. */
  trace(): string[] {
    return this.calls().map((call) => `${call.method} ${call.path}`);
  }
}

function relativePath(url: string): string {
  return url.startsWith(ZOOM_API_URL) ? url.slice(ZOOM_API_URL.length) : url;
}
