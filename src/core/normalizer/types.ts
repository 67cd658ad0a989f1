// src/core/normalizer/types.ts

import type { Scalar } from '../../utils/guards';

export type Cell = Scalar;

export type TableRow = Record<string, Cell>;

export type NormalizationStrategy =
  | 'empty' // No records
  | 'flattened' // One level of nested objects expanded to parent_child columns
  | 'column_union' // Keys kept as-is, missing keys filled with null
  | 'value_column' // List of scalars projected onto a single `value` column
  | 'stringified'; // Every record serialized into a single `data` column

export interface TabularDataset {
  name: string;
  columns: string[];
  rows: TableRow[];
  strategy: NormalizationStrategy;
}
