import { RaggedTableError } from './errors.js';
import {
  METADATA_COLUMNS,
  type Axis,
  type Cell,
  type CoordinateColumn,
  type CoordinateTable,
  type MetadataTable,
  type RaggedPolicy,
  type ScanBlock,
  type SummaryTable,
  type TableRow,
} from './types.js';

export function coordinateColumnName(axis: Axis, blockIndex: number): string {
  return `${axis}_${blockIndex}`;
}

/**
 * One row per block, in discovery order.
 */
export function toMetadataTable(blocks: readonly ScanBlock[]): MetadataTable {
  return {
    columns: [...METADATA_COLUMNS],
    rows: blocks.map((block) => ({
      DateTime: block.timestamp,
      Height: block.height,
      Gab: block.gap,
      Angle: block.angle,
      FixedPointHeight: block.fixedPointHeight,
    })),
  };
}

function padTo(values: readonly Cell[], length: number): Cell[] {
  const cells: Cell[] = [...values];
  while (cells.length < length) {
    cells.push(null);
  }
  return cells;
}

/**
 * One `x_i`/`y_i` column pair per block, in discovery order.
 *
 * Under `reject`, every block must contribute as many coordinates as block 0.
 * Under `pad`, shorter columns are filled with `null` up to the longest one.
 */
export function toCoordinateTable(
  blocks: readonly ScanBlock[],
  options: { raggedPolicy: RaggedPolicy }
): CoordinateTable {
  const first = blocks[0];
  if (options.raggedPolicy === 'reject' && first) {
    const expected = first.xValues.length;
    blocks.forEach((block, blockIndex) => {
      if (block.xValues.length !== expected) {
        throw new RaggedTableError(blockIndex, expected, block.xValues.length);
      }
    });
  }

  const rowCount = blocks.reduce((max, block) => Math.max(max, block.xValues.length, block.yValues.length), 0);
  const columns: CoordinateColumn[] = [];
  blocks.forEach((block, blockIndex) => {
    columns.push({
      name: coordinateColumnName('x', blockIndex),
      blockIndex,
      axis: 'x',
      values: padTo(block.xValues, rowCount),
    });
    columns.push({
      name: coordinateColumnName('y', blockIndex),
      blockIndex,
      axis: 'y',
      values: padTo(block.yValues, rowCount),
    });
  });

  return { columns, rowCount };
}

/**
 * Row-oriented view of a coordinate or summary table, keyed by column name.
 * `limit` keeps only the first rows.
 */
export function tableRows(table: CoordinateTable | SummaryTable, limit?: number): TableRow[] {
  const all = 'summaryColumns' in table ? [...table.columns, ...table.summaryColumns] : table.columns;
  const count = limit === undefined ? table.rowCount : Math.min(Math.max(limit, 0), table.rowCount);
  const rows: TableRow[] = [];
  for (let rowIndex = 0; rowIndex < count; rowIndex += 1) {
    const row: TableRow = {};
    for (const column of all) {
      row[column.name] = column.values[rowIndex] ?? null;
    }
    rows.push(row);
  }
  return rows;
}

export function columnNames(table: SummaryTable): string[] {
  return [...table.columns, ...table.summaryColumns].map((column) => column.name);
}
