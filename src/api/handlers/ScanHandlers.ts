/**
 * ScanHandlers: HTTP handlers for scan file parsing and table export.
 *
 * Provides endpoints for running uploaded scan files through the parser and
 * aggregator, and for exporting a file's metadata or summary table as CSV/TSV.
 */

import type { FastifyRequest, FastifyReply } from 'fastify';
import { z } from 'zod';
import type { AppContext } from '../../server.js';
import type { ApiError, ExportScanRequest, ExportScanResponse, ExportTable, ParseScansResponse } from '../types.js';
import { FormatError, ScanServiceError, TruncatedBlockError } from '../../scan/errors.js';
import { uploadSchema, type ScanBatchEntry } from '../../scan/ScanFileService.js';
import { formatMetadataCsv, formatSummaryCsv } from '../../scan/tableExport.js';

type FailedEntry = Extract<ScanBatchEntry, { status: 'error' }>;

export const exportRequestSchema = z.object({
  file: uploadSchema,
  table: z.enum(['metadata', 'summary']),
  format: z.enum(['csv', 'tsv']).optional(),
}).strict();

function toApiError(err: ScanServiceError): ApiError {
  if (err instanceof FormatError || err instanceof TruncatedBlockError) {
    return { error: err.code, message: err.message, details: { line: err.line } };
  }
  return { error: err.code, message: err.message };
}

export function createScanHandlers(ctx: AppContext) {
  const service = ctx.scanService;

  return {
    /**
     * POST /scans/parse
     * Parse and summarise each uploaded file independently.
     */
    async parseScans(
      request: FastifyRequest<{ Body: unknown }>,
      reply: FastifyReply,
    ): Promise<ParseScansResponse | ApiError> {
      try {
        const uploads = service.parseBatchRequest(request.body);
        const results = await service.processBatch(uploads);
        const failed = results.filter((entry): entry is FailedEntry => entry.status === 'error');
        for (const entry of failed) {
          request.log.warn(
            { fileName: entry.fileName, code: entry.error.code },
            `Scan file rejected: ${entry.error.message}`,
          );
        }
        return { results, total: results.length, failed: failed.length };
      } catch (err) {
        if (err instanceof ScanServiceError) {
          reply.status(err.statusCode);
          return toApiError(err);
        }
        request.log.error(err, 'Scan batch failed');
        reply.status(500);
        return {
          error: 'INTERNAL_ERROR',
          message: err instanceof Error ? err.message : String(err),
        };
      }
    },

    /**
     * POST /scans/export
     * Export the metadata or summary table of one file.
     */
    async exportScan(
      request: FastifyRequest<{ Body: unknown }>,
      reply: FastifyReply,
    ): Promise<ExportScanResponse | ApiError> {
      const parsed = exportRequestSchema.safeParse(request.body);
      if (!parsed.success) {
        reply.status(400);
        return {
          error: 'BAD_REQUEST',
          message: 'Invalid export request',
          details: parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
        };
      }

      const body: ExportScanRequest = parsed.data;
      const table: ExportTable = body.table;
      const format = body.format ?? 'csv';
      try {
        const upload = service.parseUpload(body.file);
        const result = await service.processFile(upload);
        const content = table === 'metadata'
          ? formatMetadataCsv(result.metadata, format)
          : formatSummaryCsv(result.summary, format);
        return { content, format, fileName: result.fileName };
      } catch (err) {
        if (err instanceof ScanServiceError) {
          reply.status(err.statusCode);
          return toApiError(err);
        }
        request.log.error(err, 'Scan export failed');
        reply.status(500);
        return {
          error: 'INTERNAL_ERROR',
          message: err instanceof Error ? err.message : String(err),
        };
      }
    },
  };
}

export type ScanHandlers = ReturnType<typeof createScanHandlers>;
