/**
 * MCP tools for reading scan files.
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AppContext } from '../../server.js';
import { jsonResult, scanFailureResult, textResult } from '../helpers.js';
import { deriveDisplayTitle } from '../../scan/displayTitle.js';
import { formatSummaryCsv } from '../../scan/tableExport.js';

export function registerScanTools(server: McpServer, ctx: AppContext): void {
  // scan_parse: Parse one scan file and summarise its coordinates
  server.tool(
    'scan_parse',
    'Parse an instrument scan file (metadata line, SCAN marker, X row, Y row per block). Returns the metadata table, a summary preview with mean/median per point, and the plot series.',
    {
      name: z.string().min(1).describe('File name, used for the display title'),
      content: z.string().describe('File content as UTF-8 text'),
      includeSummary: z.boolean().optional().describe('Include the full summary table (default false: preview only)'),
    },
    async (args) => {
      try {
        const result = await ctx.scanService.processFile({ name: args.name, content: args.content });
        if (args.includeSummary) {
          return jsonResult(result);
        }
        const { summary, ...rest } = result;
        return jsonResult({ ...rest, rowCount: summary.rowCount });
      } catch (err) {
        return scanFailureResult(err);
      }
    }
  );

  // scan_summary_csv: Summary table as CSV
  server.tool(
    'scan_summary_csv',
    'Parse a scan file and return its summary table (x_i, y_i per scan plus mean_x, median_x, mean_y, median_y) as CSV.',
    {
      name: z.string().min(1).describe('File name'),
      content: z.string().describe('File content as UTF-8 text'),
    },
    async (args) => {
      try {
        const result = await ctx.scanService.processFile({ name: args.name, content: args.content });
        return textResult(formatSummaryCsv(result.summary));
      } catch (err) {
        return scanFailureResult(err);
      }
    }
  );

  // scan_title: Display title for a file name
  server.tool(
    'scan_title',
    'Derive the display title for an instrument file name (e.g. "Pico 3 - 2025/05/26 14:58").',
    { fileName: z.string().min(1).describe('Instrument file name') },
    async (args) => textResult(deriveDisplayTitle(args.fileName))
  );
}
