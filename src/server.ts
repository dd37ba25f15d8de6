/**
 * Server entry point for the scan-profiler API.
 *
 * This module:
 * - Loads configuration and initializes the scan file service
 * - Creates Fastify server with routes
 * - Provides both programmatic API and CLI usage
 */

import Fastify from 'fastify';
import cors from '@fastify/cors';
import { resolve } from 'node:path';

import { loadConfig } from './config/loader.js';
import type { AppConfig, ScanConfig } from './config/types.js';
import { createScanHandlers } from './api/handlers/index.js';
import { registerRoutes } from './api/routes.js';
import type { ServerConfig } from './api/types.js';
import { createMcpServer, mcpPlugin } from './mcp/index.js';
import { ScanFileService } from './scan/ScanFileService.js';

/**
 * Application context holding all initialized components.
 */
export interface AppContext {
  appConfig: AppConfig;
  configPath: string;
  scanService: ScanFileService;
}

/**
 * Options for initializeApp.
 */
export interface InitializeOptions {
  /** Path to config.yaml (default: CONFIG_PATH or <basePath>/config.yaml) */
  configPath?: string;
  /** Scan settings applied on top of the loaded configuration */
  scans?: Partial<ScanConfig>;
}

/**
 * Initialize all application components.
 */
export async function initializeApp(
  basePath: string,
  options: InitializeOptions = {}
): Promise<AppContext> {
  console.log(`Initializing app with base path: ${basePath}`);

  const configPath = options.configPath ?? process.env.CONFIG_PATH ?? resolve(basePath, 'config.yaml');

  const loaded = await loadConfig({ configPath });
  const scans: ScanConfig = { ...loaded.scans, ...options.scans };
  const appConfig: AppConfig = { ...loaded, scans };

  console.log(`Scan parser: marker=${scans.markerPolicy}, ragged=${scans.raggedPolicy}, maxFiles=${scans.maxFiles}`);

  const scanService = new ScanFileService(scans);

  console.log('App initialized');

  return {
    appConfig,
    configPath,
    scanService,
  };
}

/**
 * Create and configure a Fastify server.
 */
export async function createServer(
  ctx: AppContext,
  config: ServerConfig = {}
): Promise<ReturnType<typeof Fastify>> {
  const settings = ctx.appConfig.server;
  const opts = {
    logLevel: config.logLevel ?? settings.logLevel,
    bodyLimit: config.bodyLimit ?? settings.bodyLimit,
    cors: config.cors ?? settings.cors.enabled,
    mcp: config.mcp ?? true,
  };

  // Create Fastify instance
  const fastify = Fastify({
    logger: {
      level: opts.logLevel,
    },
    bodyLimit: opts.bodyLimit,
  });

  // Register CORS if enabled
  if (opts.cors) {
    await fastify.register(cors, {
      origin: settings.cors.origins.includes('*') ? true : settings.cors.origins,
      methods: ['GET', 'HEAD', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization'],
    });
  }

  // Create handlers
  const scanHandlers = createScanHandlers(ctx);

  // Register API routes with /api prefix
  await fastify.register(async (instance) => {
    registerRoutes(instance, {
      scanHandlers,
      parserPolicies: () => ({
        markerPolicy: ctx.scanService.markerPolicy,
        raggedPolicy: ctx.scanService.raggedPolicy,
      }),
    });
  }, { prefix: '/api' });

  // Register MCP server on /mcp
  if (opts.mcp) {
    await fastify.register(mcpPlugin, { prefix: '/mcp', createMcpServer: () => createMcpServer(ctx) });
  }

  return fastify;
}

/**
 * Start the server.
 */
export async function startServer(
  basePath: string,
  config: ServerConfig = {}
): Promise<void> {
  try {
    // Initialize app
    const ctx = await initializeApp(basePath);

    // Create server
    const fastify = await createServer(ctx, config);

    const port = config.port ?? ctx.appConfig.server.port;
    const host = config.host ?? ctx.appConfig.server.host;

    // Start listening
    await fastify.listen({ port, host });

    console.log(`Server listening on http://${host}:${port}`);

    // Handle shutdown
    const shutdown = async () => {
      console.log('\nShutting down...');
      await fastify.close();
      process.exit(0);
    };

    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);

  } catch (err) {
    console.error('Failed to start server:', err);
    process.exit(1);
  }
}

/**
 * CLI entry point.
 */
async function main() {
  const basePath = process.env.APP_BASE_PATH || process.cwd();
  const config: ServerConfig = {};
  if (process.env.PORT) config.port = parseInt(process.env.PORT, 10);
  if (process.env.HOST) config.host = process.env.HOST;

  await startServer(basePath, config);
}

// Run if executed directly
// Note: ESM doesn't have require.main, use import.meta instead
const isMain = process.argv[1]?.endsWith('server.js') ||
               process.argv[1]?.endsWith('server.ts');

if (isMain) {
  main().catch(console.error);
}
