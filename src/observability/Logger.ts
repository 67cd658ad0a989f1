// src/observability/Logger.ts

import winston from 'winston';
import { isRecord } from '../utils/guards';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerConfig {
  level?: LogLevel;
  format?: 'json' | 'pretty';
  file?: string; // Optional log file, written as JSON lines
  silent?: boolean;
}

const SENSITIVE_KEYS = new Set(['token', 'apitoken', 'authorization', 'api_token', 'secret']);

export class Logger {
  private logger: winston.Logger;

  constructor(config: LoggerConfig = {}) {
    const format =
      config.format === 'pretty'
        ? winston.format.combine(winston.format.colorize(), winston.format.simple())
        : winston.format.json();

    const transports: winston.transport[] = [new winston.transports.Console()];
    if (config.file) {
      transports.push(
        new winston.transports.File({
          filename: config.file,
          format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
        })
      );
    }

    this.logger = winston.createLogger({
      level: config.level ?? 'info',
      format,
      transports,
      silent: config.silent,
    });
  }

  private redactSensitive(obj: Record<string, unknown>): Record<string, unknown> {
    const redacted: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(obj)) {
      if (SENSITIVE_KEYS.has(key.toLowerCase())) {
        redacted[key] = '[REDACTED]';
      } else if (key === 'headers' && isRecord(value)) {
        // Request headers carry the API token
        redacted[key] = this.redactSensitive(value);
      } else {
        redacted[key] = value;
      }
    }

    return redacted;
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    const sanitized = meta ? this.redactSensitive(meta) : {};
    this.logger.debug(message, sanitized);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    const sanitized = meta ? this.redactSensitive(meta) : {};
    this.logger.info(message, sanitized);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    const sanitized = meta ? this.redactSensitive(meta) : {};
    this.logger.warn(message, sanitized);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    const sanitized = meta ? this.redactSensitive(meta) : {};
    this.logger.error(message, sanitized);
  }

  /**
   * Flush file transports before the process exits
   */
  async close(): Promise<void> {
    await new Promise<void>((resolve) => {
      this.logger.on('finish', () => resolve());
      this.logger.end();
    });
  }
}
