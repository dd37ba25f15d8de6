/**
 * Aggregator that registers all MCP resources on the server.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AppContext } from '../../server.js';
import { registerScanResources } from './scanResources.js';

export function registerAllResources(server: McpServer, ctx: AppContext): void {
  registerScanResources(server, ctx);
}
