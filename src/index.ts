/**
 * scan-profiler: parse instrument scan files into metadata and coordinate
 * tables and summarise coordinates across scans.
 *
 * This is the main entry point for the library.
 */

// Parsing, tables and aggregation
export * from './scan/index.js';

// Configuration
export { loadConfig, validateConfig, ConfigValidationError } from './config/loader.js';
export type { LoadConfigOptions } from './config/loader.js';
export * from './config/types.js';

// HTTP API
export * from './api/handlers/index.js';
export { registerRoutes } from './api/routes.js';
export type { RouteOptions } from './api/routes.js';
export type * from './api/types.js';

// MCP
export { createMcpServer, mcpPlugin } from './mcp/index.js';
export type { McpPluginOptions } from './mcp/index.js';

// Server
export { initializeApp, createServer, startServer } from './server.js';
export type { AppContext, InitializeOptions } from './server.js';
