/**
 * Row-wise mean and median across all scans of a file.
 *
 * Columns are picked by their `axis` tag rather than by name, so renaming
 * coordinate columns cannot change which values are aggregated.
 */

import type {
  Axis,
  Cell,
  CoordinateColumn,
  CoordinateTable,
  Statistic,
  SummaryColumn,
  SummaryTable,
} from './types.js';

const AXES: readonly Axis[] = ['x', 'y'];

export function mean(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

export function median(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  const upper = sorted[mid] ?? 0;
  if (sorted.length % 2 === 1) return upper;
  const lower = sorted[mid - 1] ?? upper;
  return (lower + upper) / 2;
}

const STATISTICS: Record<Statistic, (values: readonly number[]) => number | null> = {
  mean,
  median,
};

function presentCells(columns: readonly CoordinateColumn[], rowIndex: number): number[] {
  const values: number[] = [];
  for (const column of columns) {
    const cell = column.values[rowIndex];
    if (typeof cell === 'number') {
      values.push(cell);
    }
  }
  return values;
}

function summarise(
  columns: readonly CoordinateColumn[],
  rowCount: number,
  axis: Axis,
  statistic: Statistic
): SummaryColumn {
  const compute = STATISTICS[statistic];
  const values: Cell[] = [];
  for (let rowIndex = 0; rowIndex < rowCount; rowIndex += 1) {
    values.push(compute(presentCells(columns, rowIndex)));
  }
  return { name: `${statistic}_${axis}`, axis, statistic, values };
}

/**
 * Append `mean_x`, `median_x`, `mean_y`, `median_y` to a coordinate table.
 *
 * Missing cells are ignored. A row with no values for an axis gets `null`.
 * The input table is left untouched.
 */
export function summariseCoordinates(table: CoordinateTable): SummaryTable {
  const summaryColumns: SummaryColumn[] = [];
  for (const axis of AXES) {
    const axisColumns = table.columns.filter((column) => column.axis === axis);
    summaryColumns.push(summarise(axisColumns, table.rowCount, axis, 'mean'));
    summaryColumns.push(summarise(axisColumns, table.rowCount, axis, 'median'));
  }
  return {
    columns: table.columns.map((column) => ({ ...column, values: [...column.values] })),
    summaryColumns,
    rowCount: table.rowCount,
  };
}
