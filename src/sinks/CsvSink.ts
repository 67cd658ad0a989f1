// src/sinks/CsvSink.ts

import * as fs from 'fs';
import * as path from 'path';
import type { Cell, TabularDataset } from '../core/normalizer/types';
import type { Logger } from '../observability/Logger';
import { SinkError, describeError } from '../utils/errors';

export interface Sink {
  /**
   * Persist a table under a destination name.
   * @returns Location written, or undefined when the table was skipped
   */
  write(table: TabularDataset, destination: string): Promise<string | undefined>;
}

export interface CsvSinkConfig {
  dir: string;
  filePrefix?: string;
  writeEmpty?: boolean;
}

export function artifactName(dataset: string, prefix?: string): string {
  const base = dataset.replace(/[^A-Za-z0-9]+/g, '_').toLowerCase();
  return prefix ? `${prefix}_${base}.csv` : `${base}.csv`;
}

export function escapeCsvCell(cell: Cell | undefined): string {
  if (cell === null || cell === undefined) return '';
  const text = String(cell);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function toCsv(table: TabularDataset): string {
  if (table.columns.length === 0) return '';

  const lines = [table.columns.map(escapeCsvCell).join(',')];
  for (const row of table.rows) {
    const cells = table.columns.map((column) =>
      escapeCsvCell(Object.prototype.hasOwnProperty.call(row, column) ? row[column] : null)
    );
    lines.push(cells.join(','));
  }
  return lines.join('\n') + '\n';
}

export class CsvSink implements Sink {
  constructor(
    private config: CsvSinkConfig,
    private logger: Logger
  ) {}

  async write(table: TabularDataset, destination: string): Promise<string | undefined> {
    if (table.rows.length === 0 && !this.config.writeEmpty) {
      this.logger.warn('Skipping empty dataset', { dataset: table.name });
      return undefined;
    }

    const file = path.join(this.config.dir, artifactName(destination, this.config.filePrefix));

    try {
      await fs.promises.mkdir(this.config.dir, { recursive: true });
      await fs.promises.writeFile(file, toCsv(table), 'utf8');
    } catch (error: unknown) {
      throw new SinkError(`Failed to write ${file}: ${describeError(error)}`, {
        dataset: table.name,
        file,
      });
    }

    this.logger.info('Dataset written', {
      dataset: table.name,
      file,
      rows: table.rows.length,
      columns: table.columns.length,
    });
    return file;
  }
}
