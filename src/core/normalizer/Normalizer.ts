// src/core/normalizer/Normalizer.ts

import type { Logger } from '../../observability/Logger';
import type { Cell, NormalizationStrategy, TableRow, TabularDataset } from './types';
import type { Scalar } from '../../utils/guards';
import { isRecord, isScalar } from '../../utils/guards';
import { describeError } from '../../utils/errors';

type StageResult = { ok: true; columns: string[]; rows: TableRow[] } | { ok: false; reason: string };

interface Stage {
  strategy: NormalizationStrategy;
  run: () => StageResult;
}

/**
 * Turns loosely-typed JSON records into a flat table. Strategies are tried
 * in order and the first one that succeeds wins; the last one cannot fail,
 * so normalize() always returns a table.
 */
export class Normalizer {
  constructor(private logger?: Logger) {}

  normalize(input: unknown, datasetName: string): TabularDataset {
    if (input === undefined || (Array.isArray(input) && input.length === 0)) {
      this.logger?.warn('No records to normalize', { dataset: datasetName });
      return { name: datasetName, columns: [], rows: [], strategy: 'empty' };
    }

    const items: unknown[] = Array.isArray(input) ? input : [input];

    for (const stage of this.stagesFor(items)) {
      let result: StageResult;
      try {
        result = stage.run();
      } catch (error: unknown) {
        result = { ok: false, reason: describeError(error) };
      }

      if (result.ok) {
        return {
          name: datasetName,
          columns: result.columns,
          rows: result.rows,
          strategy: stage.strategy,
        };
      }

      this.logger?.warn('Normalization strategy failed, falling back', {
        dataset: datasetName,
        strategy: stage.strategy,
        reason: result.reason,
      });
    }

    // stringify() is total; this only runs if a stage list is ever left empty
    return { name: datasetName, ...stringify(items), strategy: 'stringified' };
  }

  private stagesFor(items: unknown[]): Stage[] {
    if (items.every(isScalar)) {
      const values = items.filter(isScalar);
      return [
        { strategy: 'value_column', run: () => valueColumn(values) },
        { strategy: 'stringified', run: () => ({ ok: true, ...stringify(items) }) },
      ];
    }

    // Mixed lists keep their objects; anything else lands in a `data` column
    const records = items.map((item) => (isRecord(item) ? item : { data: serialize(item) }));
    return [
      { strategy: 'flattened', run: () => flatten(records) },
      { strategy: 'column_union', run: () => columnUnion(records) },
      { strategy: 'stringified', run: () => ({ ok: true, ...stringify(items) }) },
    ];
  }
}

function hasOwn(target: object, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(target, key);
}

// Plain assignment would treat "__proto__" as the prototype setter
function setCell(row: TableRow, column: string, cell: Cell): void {
  Object.defineProperty(row, column, { value: cell, enumerable: true, writable: true, configurable: true });
}

class ColumnSet {
  private seen = new Set<string>();
  readonly ordered: string[] = [];

  add(column: string): void {
    if (!this.seen.has(column)) {
      this.seen.add(column);
      this.ordered.push(column);
    }
  }
}

function flatten(records: Array<Record<string, unknown>>): StageResult {
  const columns = new ColumnSet();
  const rows: TableRow[] = [];

  for (const record of records) {
    const row: TableRow = {};
    const put = (key: string, value: unknown): string | undefined => {
      if (hasOwn(row, key)) {
        return `column "${key}" produced twice in one record`;
      }
      setCell(row, key, toCell(value));
      columns.add(key);
      return undefined;
    };

    for (const [key, value] of Object.entries(record)) {
      if (isRecord(value)) {
        for (const [subKey, subValue] of Object.entries(value)) {
          const conflict = put(`${key}_${subKey}`, subValue);
          if (conflict) return { ok: false, reason: conflict };
        }
      } else {
        const conflict = put(key, value);
        if (conflict) return { ok: false, reason: conflict };
      }
    }
    rows.push(row);
  }

  // Every row carries every column, in column order; absent keys are null
  const aligned = rows.map((row) => {
    const full: TableRow = {};
    for (const column of columns.ordered) {
      setCell(full, column, hasOwn(row, column) ? row[column] : null);
    }
    return full;
  });

  return { ok: true, columns: columns.ordered, rows: aligned };
}

function columnUnion(records: Array<Record<string, unknown>>): StageResult {
  const columns = new ColumnSet();
  for (const record of records) {
    Object.keys(record).forEach((key) => columns.add(key));
  }

  const rows = records.map((record) => {
    const row: TableRow = {};
    for (const column of columns.ordered) {
      setCell(row, column, hasOwn(record, column) ? toCell(record[column]) : null);
    }
    return row;
  });

  return { ok: true, columns: columns.ordered, rows };
}

function valueColumn(values: Scalar[]): StageResult {
  return { ok: true, columns: ['value'], rows: values.map((value) => ({ value })) };
}

function stringify(items: unknown[]): { columns: string[]; rows: TableRow[] } {
  return { columns: ['data'], rows: items.map((item) => ({ data: serialize(item) })) };
}

/**
 * Scalars pass through; anything structured becomes its JSON text.
 * Throws on values JSON cannot represent (cycles, bigint).
 */
function toCell(value: unknown): Cell {
  if (value === undefined) return null;
  if (isScalar(value)) return value;
  const json = JSON.stringify(value);
  return json === undefined ? String(value) : json;
}

function serialize(value: unknown): string {
  if (typeof value === 'string') return value;
  try {
    const json = JSON.stringify(value);
    if (json !== undefined) return json;
  } catch {
    // Cycles and bigint fall through to String()
  }
  try {
    return String(value);
  } catch {
    return '[unserializable]';
  }
}
