// src/core/fetch/FetchOrchestrator.ts

import type { EndpointResolver } from './EndpointResolver';
import type { PaginatedRetriever } from './PaginatedRetriever';
import type { RateGovernor } from '../http/RateGovernor';
import type { Logger } from '../../observability/Logger';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import type { DatasetDescriptor, FetchOutcome, RetrievalResult } from './types';
import { joinUrl } from './EndpointResolver';

/**
 * Walks the resolver's candidates until one returns data.
 *
 * Auth failures and unexpected faults stop the walk: a rejected credential
 * is rejected on every path. A candidate that fails part-way through
 * pagination contributes nothing; pages from different endpoints are never
 * mixed.
 */
export class FetchOrchestrator {
  constructor(
    private resolver: EndpointResolver,
    private retriever: PaginatedRetriever,
    private governor: RateGovernor,
    private logger: Logger,
    private metrics: MetricsCollector
  ) {}

  async fetch(descriptor: DatasetDescriptor): Promise<FetchOutcome> {
    const dataset = descriptor.name;
    const candidates = this.resolver.candidates(descriptor);
    // One throttle per dataset, shared by its candidates only
    const throttle = this.governor.throttleFor(descriptor);
    const attempts: RetrievalResult[] = [];

    for (const candidate of candidates) {
      if (candidate.index > 0) {
        this.logger.info('Trying next endpoint', {
          dataset,
          source: candidate.source,
          url: joinUrl(candidate.baseUrl, candidate.path),
        });
      }

      const result = await this.retriever.retrieve(descriptor, candidate, throttle);
      attempts.push(result);
      this.metrics.incrementCounter('candidate_attempts', {
        dataset,
        source: candidate.source,
        status: result.status,
      });

      if (result.status === 'auth_failed' || result.status === 'fatal') {
        this.logger.error('Aborting dataset', {
          dataset,
          status: result.status,
          reason: result.reason,
        });
        return {
          dataset,
          records: [],
          provenance: 'none',
          truncated: false,
          attempts,
          aborted: result.status,
        };
      }

      if (result.records.length > 0) {
        return {
          dataset,
          records: result.records,
          provenance: candidate.source,
          candidate,
          truncated: result.status === 'truncated',
          attempts,
        };
      }

      if (result.status === 'completed') {
        this.logger.info('Endpoint returned no records', {
          dataset,
          url: joinUrl(candidate.baseUrl, candidate.path),
        });
      }
    }

    this.logger.warn('All endpoints exhausted without data', {
      dataset,
      candidates: candidates.length,
    });
    return { dataset, records: [], provenance: 'none', truncated: false, attempts };
  }
}
