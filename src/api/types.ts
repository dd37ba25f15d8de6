/**
 * Types for the HTTP API layer.
 *
 * These types define request/response structures for the REST API.
 */

import type { LogLevel } from '../config/types.js';
import type { ExportFormat } from '../scan/tableExport.js';
import type { MarkerPolicy, RaggedPolicy } from '../scan/types.js';
import type { z } from 'zod';
import type { ScanBatchEntry, batchRequestSchema, uploadSchema } from '../scan/ScanFileService.js';
import type { exportRequestSchema } from './handlers/ScanHandlers.js';

// ============================================================================
// Error Response
// ============================================================================

/**
 * Standard error response.
 */
export interface ApiError {
  /** Error type/code */
  error: string;
  /** Human-readable message */
  message: string;
  /** Additional details (optional) */
  details?: unknown;
}

// ============================================================================
// Scan Endpoints
// ============================================================================

/**
 * One uploaded file. `content` is text unless `encoding` is 'base64'.
 */
export type ScanFileUpload = z.infer<typeof uploadSchema>;

/**
 * POST /scans/parse request.
 */
export type ParseScansRequest = z.infer<typeof batchRequestSchema>;

/**
 * POST /scans/parse response. Files that failed are listed with their error;
 * `failed` counts them.
 */
export interface ParseScansResponse {
  results: ScanBatchEntry[];
  total: number;
  failed: number;
}

/**
 * POST /scans/export request.
 */
export type ExportScanRequest = z.infer<typeof exportRequestSchema>;

export type ExportTable = ExportScanRequest['table'];

/**
 * POST /scans/export response.
 */
export interface ExportScanResponse {
  content: string;
  format: ExportFormat;
  fileName: string;
}

// ============================================================================
// Health Check
// ============================================================================

/**
 * Health check response.
 */
export interface HealthResponse {
  status: 'ok' | 'degraded' | 'error';
  timestamp: string;
  components?: {
    parser?: { markerPolicy: MarkerPolicy; raggedPolicy: RaggedPolicy };
  };
}

// ============================================================================
// Server Configuration
// ============================================================================

/**
 * Server configuration options.
 */
export interface ServerConfig {
  /** HTTP port (default: 3001) */
  port?: number;
  /** HTTP host (default: '0.0.0.0') */
  host?: string;
  /** Enable CORS (default: true) */
  cors?: boolean;
  /** Log level (default: 'info') */
  logLevel?: LogLevel;
  /** Maximum request body size in bytes */
  bodyLimit?: number;
  /** Mount the MCP endpoint at /mcp (default: true) */
  mcp?: boolean;
}
