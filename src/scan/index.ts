/**
 * Scan file parsing and aggregation.
 */

export * from './types.js';
export * from './errors.js';
export { parseScanBlocks, parseScanFile, scanBlockParser } from './parsers/ScanBlockParser.js';
export { decodeScanText, parseFloatField, parseNumber, splitLines } from './parsers/scanCommon.js';
export type { ScanParseOptions, ScanFileParser, ScanParserInfo } from './parsers/types.js';
export { toMetadataTable, toCoordinateTable, tableRows, columnNames, coordinateColumnName } from './tables.js';
export { summariseCoordinates, mean, median } from './CoordinateAggregator.js';
export { deriveDisplayTitle } from './displayTitle.js';
export { buildPlotSeries } from './plotSeries.js';
export type { PlotPoint, PlotSeries } from './plotSeries.js';
export { formatMetadataCsv, formatSummaryCsv } from './tableExport.js';
export type { ExportFormat } from './tableExport.js';
export { withTempFile } from './tempFile.js';
export type { TempFileOptions } from './tempFile.js';
export { ScanFileService, decodeUpload, describeFailure } from './ScanFileService.js';
export type {
  ScanUpload,
  ScanFileResult,
  ScanFileFailure,
  ScanBatchEntry,
  UploadInput,
} from './ScanFileService.js';
