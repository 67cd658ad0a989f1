// src/collector.ts

import type { Clock, DatasetDescriptor, FetchOutcome } from './core/fetch/types';
import type { Transport } from './core/http/types';
import type { TabularDataset } from './core/normalizer/types';
import type { Sink } from './sinks/CsvSink';
import type { CollectorConfig } from './config/ConfigValidator';
import { validateConfig } from './config/ConfigValidator';
import { selectDatasets } from './config/catalog';
import { HttpCore } from './core/http/HttpCore';
import { RateGovernor } from './core/http/RateGovernor';
import { RetryPolicy } from './core/http/RetryPolicy';
import { EndpointResolver } from './core/fetch/EndpointResolver';
import { PaginatedRetriever, systemClock } from './core/fetch/PaginatedRetriever';
import { FetchOrchestrator } from './core/fetch/FetchOrchestrator';
import { Normalizer } from './core/normalizer/Normalizer';
import { CsvSink } from './sinks/CsvSink';
import { Logger } from './observability/Logger';
import { MetricsCollector } from './observability/MetricsCollector';
import { generateCorrelationId, withDatasetSpan } from './observability/tracing';
import { NoDatasetsSelectedError, describeError } from './utils/errors';

export interface CollectorDeps {
  logger: Logger;
  metrics: MetricsCollector;
  transport: Transport;
  normalizer: Normalizer;
  sink?: Sink;
  clock: Clock;
}

/**
 * Collaborators a caller may swap out, typically for tests.
 * `sink: null` disables writing.
 */
export interface CollectorOverrides {
  logger?: Logger;
  metrics?: MetricsCollector;
  transport?: Transport;
  sink?: Sink | null;
  clock?: Clock;
}

export interface DatasetResult {
  dataset: string;
  success: boolean;
  records: number;
  table: TabularDataset;
  outcome: FetchOutcome;
  artifact?: string;
  error?: string;
  durationMs: number;
}

export interface CollectionRun {
  runId: string;
  startedAt: Date;
  finishedAt: Date;
  results: Map<string, DatasetResult>;
  succeeded: number;
  total: number;
}

export class DatasetCollector {
  private fetcher: FetchOrchestrator;

  /**
   * Build every dependency before wiring the fetch engine
   */
  private constructor(
    private config: CollectorConfig,
    private core: CollectorDeps
  ) {
    const retriever = new PaginatedRetriever(
      core.transport,
      new RetryPolicy(config.retry),
      {
        headers: {
          Authorization: `${config.api.authScheme} ${config.api.token}`,
          'Content-Type': 'application/json',
        },
        timeout: config.api.timeout,
        cursorParam: config.pagination.cursorParam,
        maxPages: config.pagination.maxPages,
        minPageDelay: config.pagination.minPageDelay,
      },
      core.logger,
      core.metrics,
      core.clock
    );

    this.fetcher = new FetchOrchestrator(
      new EndpointResolver(config.api),
      retriever,
      new RateGovernor(config.rateLimits),
      core.logger,
      core.metrics
    );
  }

  /**
   * Create a collector from a configuration object
   *
   * @param config - Collector configuration; defaults fill in anything omitted
   * @param overrides - Replacement collaborators (transport, clock, sink, ...)
   * @throws {z.ZodError} If the configuration is invalid
   *
   * @example
   * ```typescript
   * const collector = DatasetCollector.create({
   *   api: { baseUrl: 'https://console.example.net/web/api/v2.1', token: process.env.API_TOKEN },
   *   output: { dir: 'data_output' },
   * });
   * const run = await collector.run(['sites', 'agents']);
   * ```
   */
  static create(config: unknown, overrides: CollectorOverrides = {}): DatasetCollector {
    const validated = validateConfig(config);

    const logger = overrides.logger ?? new Logger(validated.logging);
    const metrics = overrides.metrics ?? new MetricsCollector(validated.metrics, logger);
    const transport =
      overrides.transport ?? new HttpCore({ timeout: validated.api.timeout }, metrics, logger);
    const sink =
      overrides.sink === null
        ? undefined
        : (overrides.sink ??
          new CsvSink(
            {
              dir: validated.output.dir,
              filePrefix: validated.output.filePrefix,
              writeEmpty: validated.output.writeEmpty,
            },
            logger
          ));

    return new DatasetCollector(validated, {
      logger,
      metrics,
      transport,
      normalizer: new Normalizer(logger),
      sink,
      clock: overrides.clock ?? systemClock,
    });
  }

  get datasets(): DatasetDescriptor[] {
    return [...this.config.datasets];
  }

  get logger(): Logger {
    return this.core.logger;
  }

  /**
   * Collect the named datasets (all of them when none are named), one at a
   * time in catalog order. A failed dataset never stops the run.
   *
   * @throws {NoDatasetsSelectedError} If none of the names is in the catalog
   */
  async run(names?: readonly string[]): Promise<CollectionRun> {
    const { selected, unknown } = selectDatasets(this.config.datasets, names);

    for (const name of unknown) {
      this.core.logger.warn('Unknown dataset requested, skipping', {
        dataset: name,
        available: this.config.datasets.map((dataset) => dataset.name),
      });
    }

    if (selected.length === 0) {
      throw new NoDatasetsSelectedError(undefined, { requested: names ? [...names] : [] });
    }

    const runId = generateCorrelationId();
    const startedAt = new Date(this.core.clock.now());
    const results = new Map<string, DatasetResult>();

    this.core.logger.info('Collection started', {
      runId,
      datasets: selected.map((dataset) => dataset.name),
    });

    for (const [position, descriptor] of selected.entries()) {
      this.core.logger.info(`Collecting dataset ${position + 1}/${selected.length}`, {
        runId,
        dataset: descriptor.name,
      });
      results.set(descriptor.name, await this.collectDataset(descriptor, runId));
    }

    const succeeded = [...results.values()].filter((result) => result.success).length;
    const run: CollectionRun = {
      runId,
      startedAt,
      finishedAt: new Date(this.core.clock.now()),
      results,
      succeeded,
      total: results.size,
    };

    this.core.logger.info('Collection finished', {
      runId,
      succeeded,
      total: run.total,
      failed: [...results.values()].filter((result) => !result.success).map((result) => result.dataset),
    });

    return run;
  }

  /**
   * Fetch, normalize and write one dataset
   */
  async collectDataset(descriptor: DatasetDescriptor, runId: string): Promise<DatasetResult> {
    const dataset = descriptor.name;

    return withDatasetSpan(dataset, runId, async (span) => {
      const startTime = this.core.clock.now();
      const outcome = await this.fetcher.fetch(descriptor);
      const durationMs = this.core.clock.now() - startTime;
      const table = this.core.normalizer.normalize(outcome.records, dataset);
      const success = outcome.records.length > 0;

      this.core.metrics.recordLatency('fetch_duration', durationMs, { dataset });
      this.core.metrics.recordGauge('records_fetched', outcome.records.length, { dataset });
      this.core.metrics.incrementCounter('datasets_total', {
        status: success ? 'success' : 'failure',
      });
      span?.setAttribute('collector.records', outcome.records.length);
      span?.setAttribute('collector.provenance', outcome.provenance);

      const result: DatasetResult = {
        dataset,
        success,
        records: outcome.records.length,
        table,
        outcome,
        durationMs,
      };

      if (success) {
        this.core.logger.info('Dataset fetched', {
          dataset,
          records: result.records,
          columns: table.columns.length,
          strategy: table.strategy,
          provenance: outcome.provenance,
          truncated: outcome.truncated,
        });
      } else {
        this.core.logger.error('No data retrieved for dataset', {
          dataset,
          aborted: outcome.aborted,
          candidates: outcome.attempts.length,
        });
      }

      if (this.core.sink) {
        try {
          result.artifact = await this.core.sink.write(table, dataset);
        } catch (error: unknown) {
          result.error = describeError(error);
          this.core.logger.error('Failed to write dataset', { dataset, error: result.error });
        }
      }

      return result;
    });
  }

  /**
   * Stop the metrics server and flush the log file
   */
  async close(): Promise<void> {
    await this.core.metrics.close();
    await this.core.logger.close();
  }
}

/**
 * One line per dataset plus an overall count
 */
export function formatSummary(run: CollectionRun): string[] {
  const lines: string[] = [];

  for (const result of run.results.values()) {
    if (result.success) {
      const notes: string[] = [result.outcome.provenance];
      if (result.outcome.truncated) notes.push('truncated');
      const noun = result.records === 1 ? 'record' : 'records';
      lines.push(`✅ ${result.dataset}: ${result.records} ${noun} (${notes.join(', ')})`);
    } else {
      const reason = result.outcome.aborted ? ` (${result.outcome.aborted})` : '';
      lines.push(`❌ ${result.dataset}: no data${reason}`);
    }
  }

  lines.push(`${run.succeeded} of ${run.total} datasets succeeded`);
  return lines;
}
