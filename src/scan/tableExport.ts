import { columnNames, tableRows } from './tables.js';
import type { MetadataTable, SummaryTable } from './types.js';

export type ExportFormat = 'csv' | 'tsv';

function formatCell(value: string | number | null, delimiter: string): string {
  if (value === null) return '';
  const text = String(value);
  return text.includes(delimiter) || text.includes('"') || text.includes('\n')
    ? `"${text.replaceAll('"', '""')}"`
    : text;
}

function formatLines(header: string[], rows: Array<Array<string | number | null>>, format: ExportFormat): string {
  const delimiter = format === 'tsv' ? '\t' : ',';
  const lines = [header, ...rows].map((cells) => cells.map((cell) => formatCell(cell, delimiter)).join(delimiter));
  return `${lines.join('\n')}\n`;
}

export function formatMetadataCsv(table: MetadataTable, format: ExportFormat = 'csv'): string {
  const rows = table.rows.map((row) => table.columns.map((column) => row[column]));
  return formatLines([...table.columns], rows, format);
}

/**
 * Missing cells are written as empty fields.
 */
export function formatSummaryCsv(table: SummaryTable, format: ExportFormat = 'csv'): string {
  const header = columnNames(table);
  const rows = tableRows(table).map((row) => header.map((name) => row[name] ?? null));
  return formatLines(header, rows, format);
}
