/**
 * ScanFileService: runs uploaded scan files through parse → tables → summary.
 *
 * Each upload is written to its own temp directory, read back, processed and
 * removed again. In a batch, files are handled one after another and a failing
 * file is reported in its own entry without stopping the rest.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { DEFAULT_SCAN_CONFIG, type ScanConfig } from '../config/types.js';
import { summariseCoordinates } from './CoordinateAggregator.js';
import { deriveDisplayTitle } from './displayTitle.js';
import { FormatError, ScanServiceError, TruncatedBlockError } from './errors.js';
import { scanBlockParser } from './parsers/ScanBlockParser.js';
import { decodeScanText } from './parsers/scanCommon.js';
import { buildPlotSeries, type PlotSeries } from './plotSeries.js';
import { tableRows } from './tables.js';
import { withTempFile } from './tempFile.js';
import type { MetadataTable, SummaryTable, TableRow } from './types.js';

export type ScanUpload = {
  name: string;
  content: string | Uint8Array;
};

export type ScanFileResult = {
  fileName: string;
  title: string;
  blockCount: number;
  metadata: MetadataTable;
  summary: SummaryTable;
  /** First `previewRows` rows of the summary table */
  preview: TableRow[];
  plot: PlotSeries;
  parserInfo: {
    parserId: string;
    parserVersion: string;
    parsedAt: string;
  };
};

export type ScanFileFailure = {
  code: string;
  message: string;
  line?: number;
};

export type ScanBatchEntry =
  | { status: 'ok'; fileName: string; result: ScanFileResult }
  | { status: 'error'; fileName: string; error: ScanFileFailure };

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

export const uploadSchema = z.object({
  name: z.string().min(1),
  content: z.string(),
  encoding: z.enum(['utf-8', 'base64']).optional(),
}).strict();

export const batchRequestSchema = z.object({
  files: z.array(uploadSchema).min(1),
}).strict();

export type UploadInput = z.infer<typeof uploadSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`)
    .join('; ');
}

/**
 * Turn a request-shaped upload into bytes or text.
 */
export function decodeUpload(input: UploadInput): ScanUpload {
  if (input.encoding !== 'base64') {
    return { name: input.name, content: input.content };
  }
  const compact = input.content.replace(/\s+/g, '');
  if (compact.length % 4 !== 0 || !BASE64_PATTERN.test(compact)) {
    throw new ScanServiceError('BAD_REQUEST', `${input.name}: content is not valid base64`, 400);
  }
  return { name: input.name, content: Buffer.from(compact, 'base64') };
}

export function describeFailure(err: unknown): ScanFileFailure {
  if (err instanceof FormatError || err instanceof TruncatedBlockError) {
    return { code: err.code, message: err.message, line: err.line };
  }
  if (err instanceof ScanServiceError) {
    return { code: err.code, message: err.message };
  }
  return {
    code: 'INTERNAL_ERROR',
    message: err instanceof Error ? err.message : String(err),
  };
}

export class ScanFileService {
  private readonly config: ScanConfig;

  constructor(config: ScanConfig = DEFAULT_SCAN_CONFIG) {
    this.config = config;
  }

  get markerPolicy(): ScanConfig['markerPolicy'] {
    return this.config.markerPolicy;
  }

  get raggedPolicy(): ScanConfig['raggedPolicy'] {
    return this.config.raggedPolicy;
  }

  /**
   * Validate a batch request body and decode its files.
   */
  parseBatchRequest(body: unknown): ScanUpload[] {
    const result = batchRequestSchema.safeParse(body);
    if (!result.success) {
      throw new ScanServiceError('BAD_REQUEST', formatIssues(result.error), 400);
    }
    const { files } = result.data;
    if (files.length > this.config.maxFiles) {
      throw new ScanServiceError(
        'BAD_REQUEST',
        `at most ${this.config.maxFiles} files per request, got ${files.length}`,
        400
      );
    }
    return files.map(decodeUpload);
  }

  /**
   * Validate a single upload (e.g. for export).
   */
  parseUpload(body: unknown): ScanUpload {
    const result = uploadSchema.safeParse(body);
    if (!result.success) {
      throw new ScanServiceError('BAD_REQUEST', formatIssues(result.error), 400);
    }
    return decodeUpload(result.data);
  }

  /**
   * Process scan text that is already in memory.
   */
  analyseText(fileName: string, content: string): ScanFileResult {
    const parsed = scanBlockParser.parse(content, {
      markerPolicy: this.config.markerPolicy,
      raggedPolicy: this.config.raggedPolicy,
    });
    const summary = summariseCoordinates(parsed.coordinates);
    return {
      fileName,
      title: deriveDisplayTitle(fileName),
      blockCount: parsed.blocks.length,
      metadata: parsed.metadata,
      summary,
      preview: tableRows(summary, this.config.previewRows),
      plot: buildPlotSeries(summary),
      parserInfo: {
        parserId: scanBlockParser.parserId,
        parserVersion: scanBlockParser.parserVersion,
        parsedAt: new Date().toISOString(),
      },
    };
  }

  /**
   * Process one upload through scoped temp storage. The temp directory is gone
   * by the time this settles, whatever the outcome.
   */
  async processFile(upload: ScanUpload): Promise<ScanFileResult> {
    return withTempFile(
      upload.content,
      async (path) => this.analyseText(upload.name, decodeScanText(await readFile(path))),
      {
        fileName: upload.name,
        ...(this.config.tempDir !== undefined ? { parentDir: this.config.tempDir } : {}),
      }
    );
  }

  /**
   * Process uploads sequentially. Never rejects because of a single file.
   */
  async processBatch(uploads: readonly ScanUpload[]): Promise<ScanBatchEntry[]> {
    const entries: ScanBatchEntry[] = [];
    for (const upload of uploads) {
      try {
        const result = await this.processFile(upload);
        entries.push({ status: 'ok', fileName: upload.name, result });
      } catch (err) {
        entries.push({ status: 'error', fileName: upload.name, error: describeFailure(err) });
      }
    }
    return entries;
  }
}
