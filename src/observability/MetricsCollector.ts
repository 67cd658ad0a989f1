// src/observability/MetricsCollector.ts

import { Registry, Counter, Histogram, Gauge } from 'prom-client';
import * as http from 'http';
import type { Logger } from './Logger';
import { describeError } from '../utils/errors';

export interface MetricsConfig {
  enabled?: boolean;
  port?: number;
  path?: string;
}

export class MetricsCollector {
  private registry: Registry;
  private counters: Map<string, Counter> = new Map();
  private histograms: Map<string, Histogram> = new Map();
  private gauges: Map<string, Gauge> = new Map();
  private server?: http.Server;
  private logger?: Logger;

  constructor(config: MetricsConfig = {}, logger?: Logger) {
    this.logger = logger;
    this.registry = new Registry();

    if (config.enabled !== false) {
      this.initializeMetrics();

      if (config.port) {
        this.exposeMetrics(config.port, config.path ?? '/metrics');
      }
    }
  }

  private initializeMetrics(): void {
    // HTTP metrics
    this.counters.set(
      'http_requests_total',
      new Counter({
        name: 'http_requests_total',
        help: 'Total HTTP requests',
        labelNames: ['host', 'method', 'status'],
        registers: [this.registry],
      })
    );

    this.histograms.set(
      'http_request_duration',
      new Histogram({
        name: 'http_request_duration_seconds',
        help: 'HTTP request duration',
        labelNames: ['host', 'status'],
        buckets: [0.1, 0.5, 1, 2, 5, 10, 30],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'http_errors',
      new Counter({
        name: 'http_errors_total',
        help: 'HTTP errors and transport faults',
        labelNames: ['host', 'status'],
        registers: [this.registry],
      })
    );

    // Retrieval metrics
    this.counters.set(
      'fetch_retries',
      new Counter({
        name: 'fetch_retries_total',
        help: 'Retried requests per dataset',
        labelNames: ['dataset', 'reason'],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'rate_limit_hits',
      new Counter({
        name: 'rate_limit_hits_total',
        help: 'Rate limit responses per dataset',
        labelNames: ['dataset'],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'candidate_attempts',
      new Counter({
        name: 'candidate_attempts_total',
        help: 'Endpoint candidates tried per dataset',
        labelNames: ['dataset', 'source', 'status'],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'pages_fetched',
      new Counter({
        name: 'pages_fetched_total',
        help: 'Pages retrieved per dataset',
        labelNames: ['dataset'],
        registers: [this.registry],
      })
    );

    // Collection metrics
    this.counters.set(
      'datasets_total',
      new Counter({
        name: 'datasets_total',
        help: 'Datasets collected by outcome',
        labelNames: ['status'],
        registers: [this.registry],
      })
    );

    this.histograms.set(
      'fetch_duration',
      new Histogram({
        name: 'dataset_fetch_duration_seconds',
        help: 'Dataset retrieval duration',
        labelNames: ['dataset'],
        buckets: [0.5, 1, 5, 15, 60, 300],
        registers: [this.registry],
      })
    );

    this.gauges.set(
      'records_fetched',
      new Gauge({
        name: 'records_fetched',
        help: 'Number of records fetched in the last run',
        labelNames: ['dataset'],
        registers: [this.registry],
      })
    );
  }

  incrementCounter(name: string, labels: Record<string, string | number>): void {
    const counter = this.counters.get(name);
    counter?.inc(labels);
  }

  recordLatency(name: string, durationMs: number, labels: Record<string, string | number>): void {
    const histogram = this.histograms.get(name);
    histogram?.observe(labels, durationMs / 1000);
  }

  recordGauge(name: string, value: number, labels: Record<string, string | number>): void {
    const gauge = this.gauges.get(name);
    gauge?.set(labels, value);
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  private exposeMetrics(port: number, path: string): void {
    this.server = http.createServer((req, res) => {
      if (req.url !== path) {
        res.statusCode = 404;
        res.end('Not Found');
        return;
      }
      this.getMetrics()
        .then((body) => {
          res.setHeader('Content-Type', this.registry.contentType);
          res.end(body);
        })
        .catch((error: unknown) => {
          res.statusCode = 500;
          res.end(describeError(error));
        });
    });

    this.server.on('error', (error: NodeJS.ErrnoException) => {
      this.logger?.error('MetricsCollector server error', {
        port,
        code: error.code,
        error: error.message,
      });
    });

    this.server.listen(port, () => {
      this.logger?.info(`Metrics exposed on http://localhost:${port}${path}`);
    });
  }

  async close(): Promise<void> {
    const server = this.server;
    if (server) {
      return new Promise((resolve) => {
        server.close(() => resolve());
      });
    }
  }
}
