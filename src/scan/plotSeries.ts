import type { SummaryTable } from './types.js';

export type PlotPoint = { x: number; y: number };

/**
 * What a chart renderer needs to draw the mean profile of a file. The
 * instrument's Y axis grows downwards, so charts flip it.
 */
export type PlotSeries = {
  label: string;
  points: PlotPoint[];
  xLabel: string;
  yLabel: string;
  invertY: boolean;
};

function summaryValues(summary: SummaryTable, name: string) {
  return summary.summaryColumns.find((column) => column.name === name)?.values ?? [];
}

/**
 * Pair `mean_x` with `mean_y` row by row, dropping rows where either is missing.
 */
export function buildPlotSeries(summary: SummaryTable): PlotSeries {
  const xs = summaryValues(summary, 'mean_x');
  const ys = summaryValues(summary, 'mean_y');
  const points: PlotPoint[] = [];
  for (let rowIndex = 0; rowIndex < summary.rowCount; rowIndex += 1) {
    const x = xs[rowIndex];
    const y = ys[rowIndex];
    if (typeof x === 'number' && typeof y === 'number') {
      points.push({ x, y });
    }
  }
  return {
    label: 'Mean values',
    points,
    xLabel: 'X Coordinate',
    yLabel: 'Y Coordinate',
    invertY: true,
  };
}
