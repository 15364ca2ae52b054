import axios, { AxiosInstance } from 'axios';
import type { HttpMethod } from './types.js';

export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  params?: Record<string, unknown>;
  body?: string;
}

export interface TransportResponse {
  status: number;
  body: string;
}

/**
 * Performs a single HTTP exchange. Resolves with whatever status the server
 * returned; rejects only when no response was received.
 */
export interface Transport {
  send(request: TransportRequest): Promise<TransportResponse>;
}

export class AxiosTransport implements Transport {
  private client: AxiosInstance;

  constructor(timeout: number = 10000) {
    this.client = axios.create({
      timeout,
      // Status handling and JSON decoding happen in ZoomRequestExecutor.
      validateStatus: () => true,
      responseType: 'text',
      transformResponse: [(data: unknown) => data]
    });
  }

  async send(request: TransportRequest): Promise<TransportResponse> {
    const response = await this.client.request<string>({
      method: request.method,
      url: request.url,
      headers: request.headers,
      params: request.params,
      data: request.body
    });
    return {
      status: response.status,
      body: typeof response.data === 'string' ? response.data : ''
    };
  }
}
