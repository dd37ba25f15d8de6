/**
 * Scan block parser.
 *
 * A scan file repeats this four-line unit, with blank lines and header rows
 * allowed between units:
 *
 *   2025-05-26T14:58:59;10.0;2.0;0.0;1.5
 *   SCAN
 *   X;;1.0;2.0
 *   Y;;3.0;4.0
 *
 * A line starts a block only when it has exactly five `;`-separated fields and
 * the first one begins with a timestamp. Everything else outside a block is
 * skipped, which is how the header row drops out.
 */

import { FormatError, TruncatedBlockError, type BlockPart } from '../errors.js';
import { toCoordinateTable, toMetadataTable } from '../tables.js';
import type { Cell, ParsedScanFile, ScanBlock } from '../types.js';
import {
  MARKER_LINE,
  looksLikeTimestamp,
  parseFloatField,
  parseNumber,
  splitFields,
  splitLines,
} from './scanCommon.js';
import type { ScanFileParser, ScanParseOptions } from './types.js';

type MetadataFields = [string, string, string, string, string];

function isBlockStart(fields: string[]): fields is MetadataFields {
  return fields.length === 5 && looksLikeTimestamp(fields[0] ?? '');
}

function parseScalar(text: string, name: string, line: number): number {
  const value = parseNumber(text);
  if (value === null) {
    throw new FormatError(`${name} is not a number: "${text}"`, line);
  }
  return value;
}

/**
 * Parse an `X;;...` or `Y;;...` row. The row tag and the empty column after it
 * are dropped without inspection. A `nan` cell becomes a missing (`null`) cell.
 */
function parseCoordinateRow(text: string, line: number, label: 'X' | 'Y'): Cell[] {
  return splitFields(text.trim())
    .slice(2)
    .map((cell, i) => {
      const value = parseFloatField(cell);
      if (value === null) {
        throw new FormatError(`${label} row value #${i} is not a number: "${cell}"`, line);
      }
      return Number.isNaN(value) ? null : value;
    });
}

/**
 * Parse every scan block in `content`, in file order.
 *
 * @throws FormatError when a recognized block has a non-numeric field, its X
 *   and Y rows differ in length, or (under `markerPolicy: 'require'`) its
 *   marker line is not `SCAN`
 * @throws TruncatedBlockError when the input ends inside a block
 */
export function parseScanBlocks(content: string, options: ScanParseOptions = {}): ScanBlock[] {
  const markerPolicy = options.markerPolicy ?? 'discard';
  const lines = splitLines(content);
  const blocks: ScanBlock[] = [];
  let index = 0;

  const takeLine = (blockLine: number, expected: BlockPart): { text: string; line: number } => {
    const text = lines[index];
    if (text === undefined) {
      throw new TruncatedBlockError(blockLine, expected);
    }
    index += 1;
    return { text, line: index };
  };

  while (index < lines.length) {
    const raw = lines[index] ?? '';
    index += 1;
    const blockLine = index;

    const trimmed = raw.trim();
    if (!trimmed) continue;

    const fields = splitFields(trimmed);
    if (!isBlockStart(fields)) continue;

    const height = parseScalar(fields[1], 'Height', blockLine);
    const gap = parseScalar(fields[2], 'Gap', blockLine);
    const angle = parseScalar(fields[3], 'Angle', blockLine);
    const fixedPointHeight = parseScalar(fields[4], 'FixedPointHeight', blockLine);

    const marker = takeLine(blockLine, 'marker line');
    if (markerPolicy === 'require' && marker.text.trim() !== MARKER_LINE) {
      throw new FormatError(`expected marker line "${MARKER_LINE}", found "${marker.text.trim()}"`, marker.line);
    }

    const xRow = takeLine(blockLine, 'X row');
    const xValues = parseCoordinateRow(xRow.text, xRow.line, 'X');
    const yRow = takeLine(blockLine, 'Y row');
    const yValues = parseCoordinateRow(yRow.text, yRow.line, 'Y');

    if (xValues.length !== yValues.length) {
      throw new FormatError(
        `X row has ${xValues.length} values but Y row has ${yValues.length}`,
        blockLine
      );
    }

    blocks.push({
      timestamp: fields[0],
      height,
      gap,
      angle,
      fixedPointHeight,
      xValues,
      yValues,
      line: blockLine,
    });
  }

  return blocks;
}

/**
 * Parse `content` and derive the metadata and coordinate tables.
 */
export function parseScanFile(content: string, options: ScanParseOptions = {}): ParsedScanFile {
  const blocks = parseScanBlocks(content, options);
  return {
    blocks,
    metadata: toMetadataTable(blocks),
    coordinates: toCoordinateTable(blocks, { raggedPolicy: options.raggedPolicy ?? 'reject' }),
  };
}

export const scanBlockParser: ScanFileParser = {
  parserId: 'scan_block',
  parserVersion: '1.0.0',
  parse: parseScanFile,
};
