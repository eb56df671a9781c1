// HTTP transport types and interfaces

import type { HTTPResponse } from './response';

export type HTTPMethod = 'GET' | 'POST' | 'PUT' | 'DELETE' | 'PATCH' | 'HEAD' | 'OPTIONS';

/**
 * Options passed through to the transport untouched, apart from the headers
 * the client merges in.
 */
export interface RequestOptions {
  headers?: Record<string, string>;
  params?: Record<string, string | number | boolean>;
  /** Structured body, sent as JSON */
  json?: unknown;
  /** Raw body, sent as is. Ignored when `json` is set. */
  data?: string;
  /** Milliseconds before the request is aborted */
  timeout?: number;
  signal?: AbortSignal;
}

export interface Transport {
  send(method: HTTPMethod, url: string, options?: RequestOptions): Promise<HTTPResponse>;
}

export interface FetchTransportConfig {
  timeout?: number;
  headers?: Record<string, string>;
}
