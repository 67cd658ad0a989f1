// src/index.ts

export { DatasetCollector, formatSummary } from './collector';
export type { CollectionRun, DatasetResult, CollectorOverrides } from './collector';
export type { CollectorConfig, CollectorConfigInput } from './config/ConfigValidator';
export { validateConfig, validateConfigSafe, catalogJsonSchema } from './config/ConfigValidator';
export { loadConfigFromEnv } from './config/env';
export { DEFAULT_CATALOG, selectDatasets } from './config/catalog';
export type {
  Clock,
  DatasetDescriptor,
  EndpointCandidate,
  FetchAttemptResult,
  FetchOutcome,
  PageEnvelope,
} from './core/fetch/types';
export type { Transport, HttpRequestConfig, HttpResponse } from './core/http/types';
export type { TabularDataset, NormalizationStrategy } from './core/normalizer/types';
export { Normalizer } from './core/normalizer/Normalizer';
export type { Sink } from './sinks/CsvSink';
export { CsvSink, toCsv } from './sinks/CsvSink';

// Export error classes for error handling
export {
  CollectorError,
  ConfigError,
  NoDatasetsSelectedError,
  ApiError,
  AuthenticationError,
  AuthorizationError,
  NotFoundError,
  RateLimitError,
  ApiClientError,
  ApiServerError,
  NetworkError,
  NetworkTimeoutError,
  ResponseParseError,
  SinkError,
} from './utils/errors';
