/**
 * Types for scan files: parsed blocks and the tables derived from them.
 */

/**
 * One measurement event: a metadata line, a marker line, an X row and a Y row.
 */
export interface ScanBlock {
  /** `YYYY-MM-DDTHH:MM:SS` prefix validated, rest kept verbatim */
  readonly timestamp: string;
  readonly height: number;
  readonly gap: number;
  readonly angle: number;
  readonly fixedPointHeight: number;
  readonly xValues: readonly Cell[];
  readonly yValues: readonly Cell[];
  /** 1-based line number of the metadata line */
  readonly line: number;
}

export type Axis = 'x' | 'y';

/** Missing cells are `null`: NaN coordinates, and padding of ragged tables. */
export type Cell = number | null;

/** What to do when the marker line after a metadata line is not `SCAN`. */
export type MarkerPolicy = 'discard' | 'require';

/** What to do when blocks in one file have coordinate rows of different lengths. */
export type RaggedPolicy = 'reject' | 'pad';

export const METADATA_COLUMNS = ['DateTime', 'Height', 'Gab', 'Angle', 'FixedPointHeight'] as const;

export type MetadataColumn = (typeof METADATA_COLUMNS)[number];

export type MetadataRow = {
  DateTime: string;
  Height: number;
  Gab: number;
  Angle: number;
  FixedPointHeight: number;
};

export interface MetadataTable {
  columns: MetadataColumn[];
  rows: MetadataRow[];
}

export interface CoordinateColumn {
  /** `x_<blockIndex>` or `y_<blockIndex>` */
  name: string;
  blockIndex: number;
  axis: Axis;
  values: Cell[];
}

export interface CoordinateTable {
  columns: CoordinateColumn[];
  rowCount: number;
}

export type Statistic = 'mean' | 'median';

export interface SummaryColumn {
  /** `mean_x`, `median_x`, `mean_y` or `median_y` */
  name: string;
  axis: Axis;
  statistic: Statistic;
  values: Cell[];
}

export interface SummaryTable {
  columns: CoordinateColumn[];
  summaryColumns: SummaryColumn[];
  rowCount: number;
}

export type TableRow = Record<string, Cell>;

export interface ParsedScanFile {
  blocks: ScanBlock[];
  metadata: MetadataTable;
  coordinates: CoordinateTable;
}
