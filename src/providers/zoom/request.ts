import { mcpLogger, type Logger } from '../../utils/logger.js';
import type { z } from 'zod';
import { ApiError, TransportError, ZoomError } from './errors.js';
import { nowEpoch, signToken } from './token.js';
import type { Transport } from './transport.js';
import type { HttpMethod, RequestData, ZoomCredentials } from './types.js';

export interface RequestExecutorOptions {
  credentials: ZoomCredentials;
  baseUrl: string;
  transport: Transport;
  logger?: Logger;
  clock?: () => number;
}

/**
 * Sends one authenticated call to the Zoom REST API and decodes the JSON answer.
 */
export class ZoomRequestExecutor {
  private readonly credentials: ZoomCredentials;
  private readonly baseUrl: string;
  private readonly transport: Transport;
  private readonly logger: Logger;
  private readonly clock: () => number;

  constructor(options: RequestExecutorOptions) {
    this.credentials = options.credentials;
    this.baseUrl = options.baseUrl;
    this.transport = options.transport;
    this.logger = options.logger ?? mcpLogger;
    this.clock = options.clock ?? nowEpoch;
  }

  async call(path: string, data?: RequestData | string | null, method: HttpMethod = 'GET'): Promise<unknown> {
    const token = signToken(this.credentials.key, this.credentials.secret, this.clock());
    const headers: Record<string, string> = { Authorization: `Bearer ${token}` };
    let params: Record<string, unknown> | undefined;
    let body: string | undefined;

    if (method === 'GET') {
      if (data && typeof data === 'object') {
        params = data;
      }
    } else {
      headers['Content-Type'] = 'application/json';
      if (typeof data === 'string') {
        body = data;
      } else if (data) {
        body = JSON.stringify(data);
      }
    }

    let status: number;
    let rawBody: string;
    try {
      ({ status, body: rawBody } = await this.transport.send({
        method,
        url: this.baseUrl + path,
        headers,
        params,
        body
      }));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error({ method, path, error: message }, 'Zoom transport failure');
      throw new TransportError(message, { cause: error });
    }

    const decoded = this.decode(rawBody, status, path);

    if (status >= 400) {
      const apiError = toApiError(decoded, status);
      this.logger.error({ method, path, status, code: apiError.code, message: apiError.message }, 'Zoom API Error');
      throw apiError;
    }

    return decoded;
  }

  private decode(rawBody: string, status: number, path: string): unknown {
    if (!rawBody.trim()) {
      return null;
    }
    try {
      const parsed: unknown = JSON.parse(rawBody);
      return parsed;
    } catch {
      this.logger.warn({ path, status }, 'Zoom response body is not JSON');
      return null;
    }
  }
}

function toApiError(decoded: unknown, status: number): ApiError {
  if (decoded && typeof decoded === 'object' && 'message' in decoded && typeof decoded.message === 'string') {
    const code = 'code' in decoded && typeof decoded.code === 'number' ? decoded.code : undefined;
    return new ApiError(decoded.message, status, code);
  }
  return new ApiError(`HTTP Status ${status}`, status);
}

/**
 * Checks a decoded response against the shape the caller relies on.
 */
export function parseResponse<S extends z.ZodTypeAny>(schema: S, value: unknown, path: string): z.infer<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ZoomError(`Unexpected response from Zoom for ${path}`, { cause: result.error });
  }
  return result.data;
}
