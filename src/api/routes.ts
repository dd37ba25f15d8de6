/**
 * Route configuration for the API.
 *
 * This module registers all API routes on a Fastify instance.
 * Route handlers are thin wrappers with no parsing logic.
 */

import type { FastifyInstance } from 'fastify';
import type { ScanHandlers } from './handlers/ScanHandlers.js';
import type { HealthResponse } from './types.js';
import type { MarkerPolicy, RaggedPolicy } from '../scan/types.js';

/**
 * Options for registering routes.
 */
export interface RouteOptions {
  scanHandlers: ScanHandlers;
  parserPolicies: () => { markerPolicy: MarkerPolicy; raggedPolicy: RaggedPolicy };
}

/**
 * Register all API routes on a Fastify instance.
 */
export function registerRoutes(
  fastify: FastifyInstance,
  options: RouteOptions
): void {
  const { scanHandlers, parserPolicies } = options;

  // ============================================================================
  // Health Check
  // ============================================================================

  fastify.get('/health', async (): Promise<HealthResponse> => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      components: {
        parser: parserPolicies(),
      },
    };
  });

  // ============================================================================
  // Scan Routes
  // ============================================================================

  // Parse a batch of scan files
  fastify.post('/scans/parse', scanHandlers.parseScans.bind(scanHandlers));

  // Export one file's metadata or summary table
  fastify.post('/scans/export', scanHandlers.exportScan.bind(scanHandlers));
}
