// src/core/http/types.ts

import type { QueryValue } from '../fetch/types';

export interface HttpRequestConfig {
  url: string;
  headers?: Record<string, string>;
  query?: Record<string, QueryValue>;
  timeout?: number;
}

export interface HttpResponse<T = unknown> {
  data: T;
  status: number;
  headers: Record<string, string>;
}

/**
 * A single GET against the API. Non-2xx statuses are returned, not thrown;
 * only transport-level faults reject.
 */
export interface Transport {
  get(request: HttpRequestConfig): Promise<HttpResponse>;
}

export interface RetryConfig {
  maxRetries: number; // Attempts per candidate, first call included
  baseDelay: number; // milliseconds
  backoffFactor: number;
  maxDelay: number;
}

export interface RateLimitConfig {
  defaultRps: number;
  table: Record<string, number>; // Path substring -> requests per second
}

export interface HttpCoreConfig {
  timeout?: number;
  keepAlive?: boolean;
  userAgent?: string;
}
