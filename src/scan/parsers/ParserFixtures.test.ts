import { describe, expect, it } from 'vitest';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { summariseCoordinates } from '../CoordinateAggregator.js';
import { RaggedTableError, TruncatedBlockError } from '../errors.js';
import { tableRows } from '../tables.js';
import { scanBlockParser } from './ScanBlockParser.js';

const here = dirname(fileURLToPath(import.meta.url));
const fixtureDir = join(here, 'fixtures');

function fixture(name: string): string {
  return readFileSync(join(fixtureDir, name), 'utf-8');
}

describe('Scan fixtures', () => {
  it('parses a file with a header row and three scans', () => {
    const parsed = scanBlockParser.parse(fixture('three_scans.txt'));
    expect(parsed.blocks).toHaveLength(3);
    expect(parsed.blocks.map((block) => block.line)).toEqual([2, 7, 12]);
    expect(parsed.metadata.rows[1]).toEqual({
      DateTime: '2025-05-26T14:59:10',
      Height: 10.5,
      Gab: 2.1,
      Angle: 0.5,
      FixedPointHeight: 1.5,
    });
    expect(parsed.coordinates.rowCount).toBe(4);
    expect(parsed.coordinates.columns.map((column) => column.name)).toEqual([
      'x_0', 'y_0', 'x_1', 'y_1', 'x_2', 'y_2',
    ]);
  });

  it('summarises the three scans row by row', () => {
    const summary = summariseCoordinates(scanBlockParser.parse(fixture('three_scans.txt')).coordinates);
    const rows = tableRows(summary);
    expect(rows).toHaveLength(4);

    expect(rows[0]?.median_x).toBe(0.2);
    expect(rows[0]?.mean_x).toBeCloseTo(0.2);
    expect(rows[0]?.median_y).toBe(5);
    expect(rows[0]?.mean_y).toBeCloseTo(14.5 / 3);

    expect(rows[2]?.median_y).toBe(7.5);
    expect(rows[2]?.mean_y).toBeCloseTo(23.5 / 3);

    expect(rows[3]?.median_x).toBe(3.2);
    expect(rows[3]?.median_y).toBe(8);
    expect(rows[3]?.mean_y).toBeCloseTo(24.5 / 3);
  });

  it('rejects scans of different lengths by default', () => {
    expect(() => scanBlockParser.parse(fixture('ragged_scans.txt'))).toThrow(RaggedTableError);
    try {
      scanBlockParser.parse(fixture('ragged_scans.txt'));
    } catch (err) {
      expect(err).toMatchObject({ code: 'RAGGED_TABLE', blockIndex: 1, expectedLength: 3, actualLength: 2 });
    }
  });

  it('pads scans of different lengths under the pad policy', () => {
    const parsed = scanBlockParser.parse(fixture('ragged_scans.txt'), { raggedPolicy: 'pad' });
    expect(parsed.coordinates.rowCount).toBe(3);
    expect(parsed.coordinates.columns[2]?.values).toEqual([7, 8, null]);

    const rows = tableRows(summariseCoordinates(parsed.coordinates));
    expect(rows[2]).toMatchObject({ x_1: null, y_1: null, mean_x: 3, median_x: 3, mean_y: 6, median_y: 6 });
  });

  it('reports a truncated block with its starting line', () => {
    expect(() => scanBlockParser.parse(fixture('truncated_scan.txt'))).toThrow(TruncatedBlockError);
    expect(() => scanBlockParser.parse(fixture('truncated_scan.txt'))).toThrow(
      'block starting at line 1 ends before its Y row'
    );
  });
});
