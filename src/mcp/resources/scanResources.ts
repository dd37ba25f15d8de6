/**
 * MCP resources describing how scan files are read.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AppContext } from '../../server.js';
import { scanBlockParser } from '../../scan/parsers/ScanBlockParser.js';

export function registerScanResources(server: McpServer, ctx: AppContext): void {
  server.resource(
    'scan-config',
    'scan://config',
    { description: 'Active scan parser settings', mimeType: 'application/json' },
    async (uri) => ({
      contents: [
        {
          uri: uri.href,
          mimeType: 'application/json',
          text: JSON.stringify(
            {
              parserId: scanBlockParser.parserId,
              parserVersion: scanBlockParser.parserVersion,
              ...ctx.appConfig.scans,
            },
            null,
            2
          ),
        },
      ],
    })
  );
}
