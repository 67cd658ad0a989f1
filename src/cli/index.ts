#!/usr/bin/env node
import path from 'path';
import dotenv from 'dotenv';
import { Command, InvalidArgumentError } from 'commander';
import { VERSION } from '../version';
import { DEFAULT_CATALOG } from '../config/catalog';
import type { CollectOptions } from './collect';
import { runCollect } from './collect';

function readArgValue(argv: string[], flag: string): string | undefined {
  const prefix = `${flag}=`;
  const inlineArg = argv.find((arg) => arg.startsWith(prefix));
  if (inlineArg) return inlineArg.slice(prefix.length);
  const index = argv.indexOf(flag);
  if (index >= 0) {
    return argv[index + 1];
  }
  return undefined;
}

function resolveEnvPath(argv: string[], fallback: string): string {
  const cliValue = readArgValue(argv, '--env-file');
  if (cliValue) return cliValue;
  return process.env.DOTENV_CONFIG_PATH ?? fallback;
}

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port)) {
    throw new InvalidArgumentError('Port must be an integer.');
  }
  return port;
}

const defaultEnvPath = path.resolve(process.cwd(), '.env');
const envPath = resolveEnvPath(process.argv.slice(2), defaultEnvPath);
dotenv.config({ path: envPath });

const program = new Command();

program
  .name('console-collector')
  .description('Collect management console datasets into CSV files')
  .version(VERSION);

program.option('--env-file <path>', 'Path to .env file (overrides DOTENV_CONFIG_PATH)', envPath);

program
  .command('collect', { isDefault: true })
  .description('Fetch datasets and write one CSV per dataset')
  .option('--output <dir>', 'Output directory (default: $OUTPUT_DIR or data_output)')
  .option('--endpoints <names...>', 'Datasets to collect (default: all)')
  .option('--log-level <level>', 'DEBUG, INFO, WARNING or ERROR (default: $LOG_LEVEL or INFO)')
  .option('--base-url <url>', 'Pin the API base URL and disable version fallback')
  .option('--metrics-port <port>', 'Expose Prometheus metrics on this port', parsePort)
  .option('--no-log-file', 'Do not write a log file under <output>/logs')
  .action(async (options: CollectOptions) => {
    process.exitCode = await runCollect(options);
  });

program
  .command('list')
  .description('List the datasets in the catalog')
  .action(() => {
    for (const dataset of DEFAULT_CATALOG) {
      const alternates = dataset.alternatePaths.length ? ` (alt: ${dataset.alternatePaths.join(', ')})` : '';
      console.log(`${dataset.name.padEnd(18)} ${dataset.primaryPath}${alternates}`);
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
