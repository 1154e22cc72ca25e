import axios, { AxiosInstance } from 'axios';
import type { HttpMethod } from '../config/serviceConfig';
import { HttpStatusError, TransportError, clip } from '../errors';

export interface TransportResponse {
  status: number;
  headers: Record<string, string>;
  body: string;
}

/**
 * Performs one HTTP exchange. Retries, redirects and timeouts are the
 * transport's own business.
 */
export interface Transport {
  perform(method: HttpMethod, url: string, body?: string): Promise<TransportResponse>;
}

export interface AxiosTransportOptions {
  timeoutMs?: number;
  userAgent?: string;
  headers?: Record<string, string>;
}

/**
 * Default transport. Bodies are always read as text; a status of 400 or
 * above raises HttpStatusError.
 */
export class AxiosTransport implements Transport {
  private readonly client: AxiosInstance;

  constructor(options: AxiosTransportOptions = {}) {
    this.client = axios.create({
      timeout: options.timeoutMs,
      headers: {
        Accept: 'application/xml, text/xml, */*;q=0.8',
        ...(options.userAgent ? { 'User-Agent': options.userAgent } : {}),
        ...options.headers,
      },
      responseType: 'text',
      transformResponse: [(data: unknown) => data],
      validateStatus: () => true,
    });
  }

  async perform(method: HttpMethod, url: string, body?: string): Promise<TransportResponse> {
    let status: number;
    let headers: Record<string, string>;
    let text: string;

    try {
      const response = await this.client.request<unknown>({
        method,
        url,
        data: body,
        headers: body === undefined ? undefined : { 'Content-Type': 'application/x-www-form-urlencoded' },
      });
      status = response.status;
      headers = flattenHeaders(response.headers);
      text = typeof response.data === 'string' ? response.data : String(response.data ?? '');
    } catch (err) {
      const message = err instanceof Error ? err.message : 'request failed';
      throw new TransportError(`${method} ${url} failed: ${message}`, url, err);
    }

    if (status >= 400) {
      throw new HttpStatusError(url, status, clip(text));
    }
    return { status, headers, body: text };
  }
}

function flattenHeaders(raw: object): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value === 'string') {
      headers[key.toLowerCase()] = value;
    } else if (Array.isArray(value)) {
      headers[key.toLowerCase()] = value.join(', ');
    }
  }
  return headers;
}
