/**
 * Pooled HTTP transport for the hosting API.
 *
 * @module transport/http-transport
 */

import { Pool } from 'undici';
import type { Dispatcher } from 'undici';
import { DatasetVersioningError, toDatasetError } from '../errors/index.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export interface HttpRequest {
  method: HttpMethod;
  /** Path relative to the transport's base URL, starting with `/`. */
  path: string;
  query?: Record<string, string | number>;
  headers?: Record<string, string>;
  /** Serialized as JSON when present. */
  body?: unknown;
}

export interface HttpResponse {
  status: number;
  headers: Record<string, string>;
  /** Parsed JSON, the raw text when it is not JSON, or undefined when empty. */
  body: unknown;
}

/**
 * HTTP transport interface
 */
export interface HttpTransport {
  request(request: HttpRequest): Promise<HttpResponse>;
  close(): Promise<void>;
}

export interface UndiciTransportOptions {
  connections: number;
  keepAliveTimeoutMs: number;
  timeoutMs: number;
}

/**
 * Transport backed by one keep-alive undici `Pool`.
 *
 * Network failures surface as transient errors (`connection`, `timeout` or
 * `io`). Status codes are returned as-is; interpreting them is the caller's job.
 */
export class UndiciHttpTransport implements HttpTransport {
  private readonly pool: Pool;
  private readonly basePath: string;
  private closed = false;

  constructor(baseUrl: string, options: UndiciTransportOptions) {
    const url = new URL(baseUrl);
    this.basePath = url.pathname.replace(/\/+$/, '');
    this.pool = new Pool(url.origin, {
      connections: options.connections,
      pipelining: 1,
      keepAliveTimeout: options.keepAliveTimeoutMs,
      headersTimeout: options.timeoutMs,
      bodyTimeout: options.timeoutMs,
    });
  }

  async request(request: HttpRequest): Promise<HttpResponse> {
    if (this.closed) {
      throw new DatasetVersioningError('configuration', 'HTTP transport is closed');
    }

    const headers: Record<string, string> = { accept: 'application/json', ...request.headers };
    let body: string | undefined;
    if (request.body !== undefined) {
      headers['content-type'] = 'application/json';
      body = JSON.stringify(request.body);
    }

    try {
      const response = await this.pool.request({
        method: request.method,
        path: this.basePath + request.path + buildQuery(request.query),
        headers,
        body,
      });
      const text = await response.body.text();
      return {
        status: response.statusCode,
        headers: flattenHeaders(response.headers),
        body: parseBody(text),
      };
    } catch (error) {
      throw toDatasetError(error, `${request.method} ${request.path}`);
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.pool.close();
  }
}

function buildQuery(query?: Record<string, string | number>): string {
  if (!query) return '';
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    params.set(key, String(value));
  }
  const serialized = params.toString();
  return serialized ? `?${serialized}` : '';
}

function flattenHeaders(headers: Dispatcher.ResponseData['headers']): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    result[key] = Array.isArray(value) ? value.join(', ') : value;
  }
  return result;
}

function parseBody(text: string): unknown {
  if (text.length === 0) return undefined;
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return text;
  }
}
