/**
 * Aggregator that registers all MCP tools on the server.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AppContext } from '../../server.js';
import { registerScanTools } from './scanTools.js';

export function registerAllTools(server: McpServer, ctx: AppContext): void {
  registerScanTools(server, ctx);
}
