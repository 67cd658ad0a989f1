// src/cli/collect.ts

import type { CollectorOverrides } from '../collector';
import { DatasetCollector, formatSummary } from '../collector';
import { loadConfigFromEnv } from '../config/env';
import { ConfigError, describeError } from '../utils/errors';

export interface CollectOptions {
  output?: string;
  endpoints?: string[];
  logLevel?: string;
  baseUrl?: string;
  metricsPort?: number;
  logFile?: boolean;
}

export interface CollectIO {
  env?: NodeJS.ProcessEnv;
  print?: (line: string) => void;
  overrides?: CollectorOverrides;
}

/**
 * Run one collection and return the process exit code: 0 whenever the run
 * completes, however many datasets came back empty; 1 when nothing could be
 * selected or configured, or an error escaped the collector.
 */
export async function runCollect(options: CollectOptions, io: CollectIO = {}): Promise<number> {
  const print = io.print ?? ((line: string) => console.log(line));

  let collector: DatasetCollector;
  try {
    const config = loadConfigFromEnv(io.env ?? process.env, {
      outputDir: options.output,
      logLevel: options.logLevel,
      baseUrl: options.baseUrl,
      metricsPort: options.metricsPort,
      logFile: options.logFile,
    });
    collector = DatasetCollector.create(config, io.overrides);
  } catch (error: unknown) {
    print(`❌ ${describeError(error)}`);
    return 1;
  }

  try {
    const run = await collector.run(splitNames(options.endpoints));
    const summary = formatSummary(run);
    collector.logger.info('Collection summary', { runId: run.runId, summary });
    summary.forEach((line) => print(line));
    return 0;
  } catch (error: unknown) {
    if (error instanceof ConfigError) {
      print(`❌ ${error.message}`);
    } else {
      collector.logger.error('Collection aborted', { error: describeError(error) });
      print(`❌ Collection aborted: ${describeError(error)}`);
    }
    return 1;
  } finally {
    await collector.close();
  }
}

/**
 * Accept both `--endpoints a b` and `--endpoints a,b`
 */
export function splitNames(names?: string[]): string[] | undefined {
  if (!names) return undefined;
  return names
    .flatMap((name) => name.split(','))
    .map((name) => name.trim())
    .filter((name) => name !== '');
}
