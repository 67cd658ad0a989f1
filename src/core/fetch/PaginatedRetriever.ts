// src/core/fetch/PaginatedRetriever.ts

import type { Transport } from '../http/types';
import type { Throttle } from '../http/RateGovernor';
import type { RetryPolicy } from '../http/RetryPolicy';
import type { Logger } from '../../observability/Logger';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import type {
  Clock,
  DatasetDescriptor,
  EndpointCandidate,
  FetchAttemptResult,
  QueryValue,
  RetrievalResult,
  RetrievalStatus,
} from './types';
import { classifyResponse } from './classify';
import { joinUrl } from './EndpointResolver';
import { NetworkError, describeError } from '../../utils/errors';
import { addSpanEvent } from '../../observability/tracing';

export const DEFAULT_MAX_PAGES = 100;

export interface RetrieverOptions {
  headers: Record<string, string>;
  timeout?: number;
  cursorParam: string;
  maxPages: number;
  minPageDelay: number; // milliseconds
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

/**
 * Drives one (base URL, path) candidate to completion: retries transient
 * faults with exponential backoff, follows cursors, and stops at the page
 * ceiling. Never throws for fetch failures; the status says what happened.
 */
export class PaginatedRetriever {
  constructor(
    private transport: Transport,
    private retryPolicy: RetryPolicy,
    private options: RetrieverOptions,
    private logger: Logger,
    private metrics: MetricsCollector,
    private clock: Clock = systemClock
  ) {}

  async retrieve(
    descriptor: DatasetDescriptor,
    candidate: EndpointCandidate,
    throttle: Throttle
  ): Promise<RetrievalResult> {
    const url = joinUrl(candidate.baseUrl, candidate.path);
    const dataset = descriptor.name;
    const records: unknown[] = [];
    let cursor: string | undefined;
    let pages = 0;
    let attempts = 0;
    let failures = 0; // Reset after every successful page

    const finish = (status: RetrievalStatus, reason?: string): RetrievalResult => {
      const kept = status === 'completed' || status === 'truncated';
      return { candidate, status, records: kept ? records : [], pages, attempts, reason };
    };

    while (true) {
      attempts++;
      const result = await this.attempt(url, descriptor, cursor);

      switch (result.kind) {
        case 'success': {
          pages++;
          failures = 0;
          for (const record of result.envelope.records) {
            records.push(record);
          }
          this.metrics.incrementCounter('pages_fetched', { dataset });
          this.logger.debug('Page fetched', {
            dataset,
            url,
            page: pages,
            records: result.envelope.records.length,
            totalItems: result.envelope.totalItems,
          });

          const nextCursor = result.envelope.nextCursor;
          if (!descriptor.paginate || !nextCursor) {
            return finish('completed');
          }

          if (pages >= this.options.maxPages) {
            this.logger.warn('Page ceiling reached, returning partial dataset', {
              dataset,
              url,
              pages,
              records: records.length,
              totalItems: result.envelope.totalItems,
            });
            return finish('truncated', `stopped after ${pages} pages`);
          }

          cursor = nextCursor;
          await this.clock.sleep(Math.max(throttle.delay, this.options.minPageDelay));
          continue;
        }

        case 'fatal': {
          const status = result.auth ? 'auth_failed' : 'fatal';
          this.logger.error('Request failed, not retrying', {
            dataset,
            url,
            status: result.status,
            reason: result.reason,
          });
          return finish(status, result.reason);
        }

        case 'not_found':
        case 'retryable': {
          failures++;

          let retryAfterMs: number | undefined;
          if (result.kind === 'retryable' && result.rateLimited) {
            retryAfterMs = result.retryAfterMs;
            const escalated = throttle.escalate();
            this.metrics.incrementCounter('rate_limit_hits', { dataset });
            this.logger.warn('Rate limited, escalating request delay', {
              dataset,
              url,
              delay: escalated,
            });
          }

          if (this.retryPolicy.isExhausted(failures)) {
            const status = result.kind === 'not_found' ? 'not_found' : 'exhausted';
            this.logger.warn('Giving up on endpoint', {
              dataset,
              url,
              attempts: failures,
              reason: result.reason,
            });
            return finish(status, result.reason);
          }

          const delay = this.retryPolicy.backoffDelay(failures, retryAfterMs);
          this.metrics.incrementCounter('fetch_retries', { dataset, reason: result.kind });
          addSpanEvent('retry', { url, attempt: failures, delay });
          this.logger.warn('Retrying request', {
            dataset,
            url,
            attempt: failures,
            maxAttempts: this.retryPolicy.maxAttempts,
            delay,
            reason: result.reason,
          });
          await this.clock.sleep(delay);
          continue;
        }
      }
    }
  }

  private async attempt(
    url: string,
    descriptor: DatasetDescriptor,
    cursor: string | undefined
  ): Promise<FetchAttemptResult> {
    const query: Record<string, QueryValue> = { ...descriptor.params };
    if (cursor !== undefined) {
      query[this.options.cursorParam] = cursor;
    }

    try {
      const response = await this.transport.get({
        url,
        headers: this.options.headers,
        query,
        timeout: this.options.timeout,
      });
      return classifyResponse(response, this.clock.now());
    } catch (error: unknown) {
      if (error instanceof NetworkError) {
        return { kind: 'retryable', reason: error.message, rateLimited: false };
      }
      return { kind: 'fatal', reason: describeError(error), auth: false };
    }
  }
}
