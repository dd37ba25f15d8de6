/**
 * Fastify plugin that mounts the MCP server on a route prefix.
 *
 * Registers POST / for JSON-RPC requests (stateless Streamable HTTP).
 * Returns 405 for GET / and DELETE / (no SSE or session teardown in stateless mode).
 */

import type { FastifyInstance, FastifyPluginOptions } from 'fastify';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';

export interface McpPluginOptions extends FastifyPluginOptions {
  /** Builds a fresh server per request; a stateless transport cannot be shared */
  createMcpServer: () => McpServer;
}

export async function mcpPlugin(
  fastify: FastifyInstance,
  opts: McpPluginOptions
): Promise<void> {
  // Disable Fastify body parsing for this scope; the MCP transport gets the parsed JSON body
  fastify.removeAllContentTypeParsers();
  fastify.addContentTypeParser('application/json', { parseAs: 'string' }, (_req, body, done) => {
    try {
      done(null, JSON.parse(String(body)));
    } catch (err) {
      done(err instanceof Error ? err : new Error(String(err)), undefined);
    }
  });

  // POST / handles MCP JSON-RPC requests
  fastify.post('/', async (request, reply) => {
    // Stateless mode: no session ID generator
    const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });
    const mcpServer = opts.createMcpServer();

    reply.raw.on('close', () => {
      transport.close().catch((err: unknown) => request.log.warn(err, 'MCP transport close failed'));
      mcpServer.close().catch((err: unknown) => request.log.warn(err, 'MCP server close failed'));
    });

    // Cast needed because SDK Transport type doesn't align with exactOptionalPropertyTypes
    await mcpServer.connect(transport as unknown as Transport);

    // Hijack so Fastify doesn't try to send a second response
    reply.hijack();

    await transport.handleRequest(
      request.raw,
      reply.raw,
      request.body
    );
  });

  // GET / and DELETE / are not supported in stateless mode
  fastify.get('/', async (_request, reply) => {
    return reply.code(405).send({ error: 'Method Not Allowed: stateless mode has no SSE stream' });
  });

  fastify.delete('/', async (_request, reply) => {
    return reply.code(405).send({ error: 'Method Not Allowed: stateless mode has no sessions' });
  });
}
