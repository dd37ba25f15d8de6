/**
 * Configuration types for the scan-profiler server.
 *
 * These types define the structure of config.yaml and provide
 * type-safe access to server configuration.
 */

import type { MarkerPolicy, RaggedPolicy } from '../scan/types.js';

/**
 * Top-level configuration.
 */
export interface AppConfig {
  server: ServerSettings;
  scans: ScanConfig;
}

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

/**
 * Server settings.
 */
export interface ServerSettings {
  /** Port to listen on (default: 3001) */
  port: number;
  /** Host to bind to (default: '0.0.0.0') */
  host: string;
  /** Log level (default: 'info') */
  logLevel: LogLevel;
  /** Maximum request body size in bytes (default: 25 MiB) */
  bodyLimit: number;
  /** CORS configuration */
  cors: CorsConfig;
}

/**
 * CORS configuration.
 */
export interface CorsConfig {
  /** Whether CORS is enabled (default: true) */
  enabled: boolean;
  /** Allowed origins (default: ['*']) */
  origins: string[];
}

/**
 * Scan file processing settings.
 */
export interface ScanConfig {
  /** Marker line handling (default: 'discard') */
  markerPolicy: MarkerPolicy;
  /** Unequal coordinate lengths across blocks (default: 'reject') */
  raggedPolicy: RaggedPolicy;
  /** Rows included in the summary preview (default: 5) */
  previewRows: number;
  /** Maximum files per batch (default: 20) */
  maxFiles: number;
  /** Parent directory for per-upload temp directories (default: OS temp dir) */
  tempDir?: string;
}

export const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

/**
 * Default scan settings.
 */
export const DEFAULT_SCAN_CONFIG: ScanConfig = {
  markerPolicy: 'discard',
  raggedPolicy: 'reject',
  previewRows: 5,
  maxFiles: 20,
};

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: AppConfig = {
  server: {
    port: 3001,
    host: '0.0.0.0',
    logLevel: 'info',
    bodyLimit: 25 * 1024 * 1024,
    cors: {
      enabled: true,
      origins: ['*'],
    },
  },
  scans: DEFAULT_SCAN_CONFIG,
};
