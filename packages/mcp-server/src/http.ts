/**
 * Streamable HTTP transport, stateless: every POST gets its own server and
 * transport, bound to the identity in that request's Authorization header.
 */

import { serve, type HttpBindings, type ServerType } from '@hono/node-server';
import { RESPONSE_ALREADY_SENT } from '@hono/node-server/utils/response';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { Hono, type Context } from 'hono';
import { bearerIdentity, type ClientFactory } from './context.js';
import type { Logger } from './logger.js';
import type { ToolRegistry } from './registry.js';
import { createMcpServer } from './server.js';

export interface HttpAppOptions {
  registry: ToolRegistry;
  clientFactory: ClientFactory;
  logger: Logger;
}

type Env = { Bindings: HttpBindings };

function jsonRpcError(c: Context<Env>, status: 400 | 405, code: number, message: string) {
  return c.json({ jsonrpc: '2.0', error: { code, message }, id: null }, status);
}

export function createHttpApp(options: HttpAppOptions): Hono<Env> {
  const { registry, clientFactory, logger } = options;
  const app = new Hono<Env>();

  app.get('/health', (c) => c.json({ status: 'ok', tools: registry.size }));

  app.post('/mcp', async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch (err) {
      logger.debug({ err }, 'rejected request with invalid JSON body');
      return jsonRpcError(c, 400, -32700, 'Parse error');
    }

    const server = createMcpServer({
      registry,
      identity: bearerIdentity(c.req.header('authorization')),
      clientFactory,
      logger,
    });
    const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });
    c.env.outgoing.on('close', () => {
      server.close().catch((err: unknown) => logger.warn({ err }, 'failed to close MCP server'));
    });

    await server.connect(transport);
    await transport.handleRequest(c.env.incoming, c.env.outgoing, body);
    return RESPONSE_ALREADY_SENT;
  });

  // No sessions, so no server-initiated stream and nothing to terminate
  app.get('/mcp', (c) => jsonRpcError(c, 405, -32000, 'Method not allowed.'));
  app.delete('/mcp', (c) => jsonRpcError(c, 405, -32000, 'Method not allowed.'));

  return app;
}

export interface StartHttpOptions extends HttpAppOptions {
  host: string;
  port: number;
}

export function startHttpServer(options: StartHttpOptions): ServerType {
  const app = createHttpApp(options);
  return serve({ fetch: app.fetch, hostname: options.host, port: options.port }, (info) => {
    options.logger.info({ address: info.address, port: info.port }, 'MCP server listening on /mcp');
  });
}
