// src/config/ConfigValidator.ts

import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { DEFAULT_CATALOG } from './catalog';
import { DEFAULT_RATE_LIMITS } from '../core/http/RateGovernor';
import { DEFAULT_RETRY_CONFIG } from '../core/http/RetryPolicy';
import { DEFAULT_TIMEOUT_MS } from '../core/http/HttpCore';
import { DEFAULT_MAX_PAGES } from '../core/fetch/PaginatedRetriever';

const PathSchema = z.string().startsWith('/', 'Paths must start with "/"');

// Dataset descriptor (exported for JSON Schema generation)
export const DatasetDescriptorSchema = z.object({
  name: z
    .string()
    .regex(/^[a-z0-9][a-z0-9_-]*$/i, 'Dataset names may only contain letters, digits, "-" and "_"'),
  primaryPath: PathSchema,
  alternatePaths: z.array(PathSchema).default([]),
  params: z.record(z.union([z.string(), z.number(), z.boolean()])).optional(),
  paginate: z.boolean().default(false),
  rateLimit: z.number().positive().optional(),
});

const CatalogSchema = z
  .array(DatasetDescriptorSchema)
  .min(1, 'At least one dataset must be configured')
  .superRefine((datasets, ctx) => {
    const seen = new Set<string>();
    datasets.forEach((dataset, index) => {
      if (seen.has(dataset.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, 'name'],
          message: `Duplicate dataset name '${dataset.name}'`,
        });
      }
      seen.add(dataset.name);
    });
  });

// API Configuration Schema
const ApiConfigSchema = z.object({
  baseUrl: z.string().url(),
  baseUrlPinned: z.boolean().default(false),
  fallbackBaseUrls: z.array(z.string().url()).default([]),
  token: z.string().min(1, 'API token is required'),
  authScheme: z.string().min(1).default('ApiToken'),
  timeout: z.number().positive().default(DEFAULT_TIMEOUT_MS),
});

// Retry Configuration Schema
const RetryConfigSchema = z
  .object({
    maxRetries: z.number().int().min(1).max(10).default(DEFAULT_RETRY_CONFIG.maxRetries),
    baseDelay: z.number().nonnegative().default(DEFAULT_RETRY_CONFIG.baseDelay),
    backoffFactor: z.number().min(1).default(DEFAULT_RETRY_CONFIG.backoffFactor),
    maxDelay: z.number().nonnegative().default(DEFAULT_RETRY_CONFIG.maxDelay),
  })
  .refine((data) => data.maxDelay >= data.baseDelay, {
    message: 'maxDelay must be greater than or equal to baseDelay',
  });

// Pagination Configuration Schema
const PaginationConfigSchema = z.object({
  maxPages: z.number().int().positive().default(DEFAULT_MAX_PAGES),
  minPageDelay: z.number().nonnegative().default(0),
  cursorParam: z.string().min(1).default('cursor'),
});

// Rate Limit Configuration Schema
const RateLimitConfigSchema = z.object({
  defaultRps: z.number().positive().default(DEFAULT_RATE_LIMITS.defaultRps),
  table: z.record(z.number().positive()).default(DEFAULT_RATE_LIMITS.table),
});

// Output Configuration Schema
const OutputConfigSchema = z.object({
  dir: z.string().min(1).default('data_output'),
  filePrefix: z.string().optional(),
  writeEmpty: z.boolean().default(true),
});

// Logger Configuration Schema
const LoggerConfigSchema = z
  .object({
    level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
    format: z.enum(['json', 'pretty']).optional(),
    file: z.string().optional(),
    silent: z.boolean().optional(),
  })
  .optional();

// Metrics Configuration Schema
const MetricsConfigSchema = z
  .object({
    enabled: z.boolean().optional(),
    port: z.number().int().min(1024).max(65535).optional(),
    path: z.string().startsWith('/').optional(),
  })
  .optional();

// Complete Collector Configuration Schema
export const CollectorConfigSchema = z.object({
  api: ApiConfigSchema,
  retry: RetryConfigSchema.default({}),
  pagination: PaginationConfigSchema.default({}),
  rateLimits: RateLimitConfigSchema.default({}),
  datasets: CatalogSchema.default(() =>
    DEFAULT_CATALOG.map((dataset) => ({ ...dataset, alternatePaths: [...dataset.alternatePaths] }))
  ),
  output: OutputConfigSchema.default({}),
  logging: LoggerConfigSchema,
  metrics: MetricsConfigSchema,
});

export type CollectorConfigInput = z.input<typeof CollectorConfigSchema>;
export type CollectorConfig = z.output<typeof CollectorConfigSchema>;

/**
 * Validate collector configuration and fill in defaults
 *
 * @throws {z.ZodError} If configuration is invalid with detailed error messages
 */
export function validateConfig(config: unknown): CollectorConfig {
  return CollectorConfigSchema.parse(config);
}

/**
 * Validate configuration and return user-friendly errors
 */
export function validateConfigSafe(
  config: unknown
): { success: true; data: CollectorConfig } | { success: false; errors: string[] } {
  const result = CollectorConfigSchema.safeParse(config);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return {
    success: false,
    errors: result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`),
  };
}

/**
 * JSON Schema for one dataset catalog entry
 */
export function catalogJsonSchema() {
  return zodToJsonSchema(DatasetDescriptorSchema, {
    name: 'DatasetDescriptor',
    $refStrategy: 'none',
  });
}
