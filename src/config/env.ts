// src/config/env.ts

import * as path from 'path';
import type { CollectorConfig, CollectorConfigInput } from './ConfigValidator';
import type { LogLevel } from '../observability/Logger';
import { validateConfigSafe } from './ConfigValidator';
import { DEFAULT_API_VERSION_PATH, FALLBACK_API_VERSION_PATHS } from './catalog';
import { ConfigError } from '../utils/errors';

export const DEFAULT_CONSOLE_URL = 'https://console.example.net';

export interface EnvOverrides {
  outputDir?: string;
  logLevel?: string;
  baseUrl?: string;
  metricsPort?: number;
  logFile?: boolean;
}

const LOG_LEVELS: Record<string, LogLevel> = {
  debug: 'debug',
  info: 'info',
  warning: 'warn',
  warn: 'warn',
  error: 'error',
  critical: 'error',
};

export function parseLogLevel(value: string): LogLevel {
  const level = LOG_LEVELS[value.trim().toLowerCase()];
  if (!level) {
    throw new ConfigError(`Unknown log level '${value}'`, { value });
  }
  return level;
}

/**
 * Build a validated config from environment variables.
 *
 * API_TOKEN (or SENTINEL_API_TOKEN) is required. BASE_URL pins the API
 * base URL and turns off version fallback; CONSOLE_URL only sets the host,
 * so older API versions on the same console stay available as fallbacks.
 *
 * @throws {ConfigError} If the token is missing or a value is invalid
 */
export function loadConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  overrides: EnvOverrides = {}
): CollectorConfig {
  const token = env.API_TOKEN || env.SENTINEL_API_TOKEN;
  if (!token) {
    throw new ConfigError('API_TOKEN or SENTINEL_API_TOKEN environment variable is required');
  }

  const pinnedBaseUrl = overrides.baseUrl ?? env.BASE_URL;
  const consoleUrl = (env.CONSOLE_URL || DEFAULT_CONSOLE_URL).replace(/\/+$/, '');
  const outputDir = overrides.outputDir ?? env.OUTPUT_DIR ?? 'data_output';
  const logLevel = overrides.logLevel ?? env.LOG_LEVEL;
  const metricsPort = overrides.metricsPort ?? (env.METRICS_PORT ? Number(env.METRICS_PORT) : undefined);

  const input: CollectorConfigInput = {
    api: pinnedBaseUrl
      ? { baseUrl: pinnedBaseUrl, baseUrlPinned: true, token }
      : {
          baseUrl: `${consoleUrl}${DEFAULT_API_VERSION_PATH}`,
          baseUrlPinned: false,
          fallbackBaseUrls: FALLBACK_API_VERSION_PATHS.map((versionPath) => `${consoleUrl}${versionPath}`),
          token,
        },
    output: {
      dir: outputDir,
      filePrefix: env.OUTPUT_PREFIX,
    },
    logging: {
      level: logLevel ? parseLogLevel(logLevel) : 'info',
      file: overrides.logFile === false ? undefined : path.join(outputDir, 'logs', logFileName(new Date())),
    },
    metrics: metricsPort !== undefined ? { port: metricsPort } : undefined,
  };

  const result = validateConfigSafe(input);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${result.errors.join('; ')}`, {
      errors: result.errors,
    });
  }
  return result.data;
}

export function logFileName(date: Date): string {
  const stamp = date.toISOString().replace(/[-:]/g, '').replace('T', '_').slice(0, 15);
  return `collection_${stamp}.log`;
}
