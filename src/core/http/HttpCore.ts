// src/core/http/HttpCore.ts

import axios, { AxiosInstance, AxiosResponse } from 'axios';
import * as http from 'http';
import * as https from 'https';
import { v4 as uuidv4 } from 'uuid';
import type { HttpCoreConfig, HttpRequestConfig, HttpResponse, Transport } from './types';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import type { Logger } from '../../observability/Logger';
import { NetworkTimeoutError, NetworkError, describeError } from '../../utils/errors';
import { withHttpSpan } from '../../observability/tracing';

export const DEFAULT_TIMEOUT_MS = 30000;

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

/**
 * axios-backed transport. Every status comes back as a value so the
 * retriever can classify it; the body is returned as raw text.
 */
export class HttpCore implements Transport {
  private axiosInstance: AxiosInstance;

  constructor(
    private config: HttpCoreConfig,
    private metrics: MetricsCollector,
    private logger: Logger
  ) {
    const keepAlive = config.keepAlive ?? true;
    this.axiosInstance = axios.create({
      timeout: config.timeout ?? DEFAULT_TIMEOUT_MS,
      httpAgent: new http.Agent({ keepAlive }),
      httpsAgent: new https.Agent({ keepAlive }),
      responseType: 'text',
      validateStatus: () => true,
    });
  }

  async get(config: HttpRequestConfig): Promise<HttpResponse> {
    const host = this.extractHost(config.url);
    const requestId = uuidv4();

    this.logger.debug('HTTP request', {
      requestId,
      url: config.url,
      query: config.query,
      headerKeys: Object.keys(config.headers ?? {}),
    });

    const headers: Record<string, string> = {
      'X-Request-ID': requestId,
      'User-Agent': this.config.userAgent ?? 'console-collector/1.0',
      Accept: 'application/json',
      ...config.headers,
    };

    return withHttpSpan('GET', config.url, async (span) => {
      const startTime = Date.now();

      let axiosResponse: AxiosResponse<unknown>;
      try {
        axiosResponse = await this.axiosInstance.get<unknown>(config.url, {
          headers,
          params: config.query,
          timeout: config.timeout,
        });
      } catch (error: unknown) {
        this.metrics.incrementCounter('http_requests_total', {
          host,
          method: 'GET',
          status: 'error',
        });
        this.metrics.incrementCounter('http_errors', { host, status: 'transport' });
        throw this.transformError(error, config.url);
      }

      const status = axiosResponse.status;
      span?.setAttribute('http.status_code', status);

      this.metrics.incrementCounter('http_requests_total', {
        host,
        method: 'GET',
        status: status.toString(),
      });
      this.metrics.recordLatency('http_request_duration', Date.now() - startTime, {
        host,
        status,
      });

      if (status >= 400) {
        this.metrics.incrementCounter('http_errors', { host, status });
        this.logger.debug('HTTP error response', {
          requestId,
          status,
          statusText: axiosResponse.statusText,
        });
      }

      return {
        data: axiosResponse.data,
        status,
        headers: this.toHeaderRecord(axiosResponse.headers),
      };
    });
  }

  private extractHost(url: string): string {
    try {
      return new URL(url).host;
    } catch {
      return 'unknown';
    }
  }

  private toHeaderRecord(headers: object): Record<string, string> {
    const record: Record<string, string> = {};
    for (const [key, value] of Object.entries(headers)) {
      if (typeof value === 'string') {
        record[key.toLowerCase()] = value;
      }
    }
    return record;
  }

  private transformError(error: unknown, url: string): Error {
    if (axios.isAxiosError(error) && error.code && TIMEOUT_CODES.has(error.code)) {
      return new NetworkTimeoutError('Request timeout', { url });
    }
    const code = axios.isAxiosError(error) ? error.code : undefined;
    return new NetworkError(`Network error: ${describeError(error)}`, { url, code });
  }
}
