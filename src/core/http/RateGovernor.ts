// src/core/http/RateGovernor.ts

import type { RateLimitConfig } from './types';
import type { DatasetDescriptor } from '../fetch/types';

export const DEFAULT_RATE_LIMITS: RateLimitConfig = {
  defaultRps: 1,
  table: {
    '/agents': 2,
    '/alerts': 2,
    '/threats': 1,
    '/activities': 0.5,
    '/cloud-detection/alerts': 0.5,
  },
};

/**
 * Converts requests-per-second into an inter-request delay.
 */
export class RateGovernor {
  // Longest keys first so the most specific substring wins
  private entries: Array<[string, number]>;

  constructor(private config: RateLimitConfig = DEFAULT_RATE_LIMITS) {
    this.entries = Object.entries(config.table).sort((a, b) => b[0].length - a[0].length);
  }

  /**
   * Delay in milliseconds between two requests for a dataset path.
   * A configured rate wins over the table, the table over the default.
   */
  delayFor(path: string, configuredRate?: number): number {
    if (configuredRate !== undefined && configuredRate > 0) {
      return 1000 / configuredRate;
    }

    const match = this.entries.find(([fragment]) => path.includes(fragment));
    const rps = match ? match[1] : this.config.defaultRps;
    return 1000 / rps;
  }

  /**
   * Fresh throttle state for one dataset's retrieval
   */
  throttleFor(descriptor: DatasetDescriptor): Throttle {
    return new Throttle(this.delayFor(descriptor.primaryPath, descriptor.rateLimit));
  }
}

/**
 * Working delay for a single retrieval. Escalation never leaves the
 * instance, so one dataset's 429s do not slow down the next.
 */
export class Throttle {
  private current: number;

  constructor(readonly initialDelay: number) {
    this.current = initialDelay;
  }

  get delay(): number {
    return this.current;
  }

  escalate(): number {
    this.current *= 2;
    return this.current;
  }
}
