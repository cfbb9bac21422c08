/**
 * MCP binding: one McpServer per connection, one registration per tool.
 *
 * Tool results travel as a single JSON text block. Tool failures travel
 * as `isError` results carrying `{ error: { kind, message, category? } }`
 * so the agent can read what went wrong.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { ClientFactory, IdentitySource } from './context.js';
import { invokeTool } from './dispatch.js';
import { PlatformOperationError, ToolError, toErrorPayload } from './errors.js';
import type { Logger } from './logger.js';
import type { ToolRegistry } from './registry.js';

export const SERVER_NAME = 'dss-mcp';
export const SERVER_VERSION = '0.1.0';

export interface McpServerOptions {
  registry: ToolRegistry;
  identity: IdentitySource;
  clientFactory: ClientFactory;
  logger: Logger;
}

export function toToolResult(result: unknown): CallToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(result ?? null) }] };
}

export function toErrorResult(err: unknown): CallToolResult {
  const error = err instanceof ToolError ? err : PlatformOperationError.from(err);
  return { isError: true, content: [{ type: 'text', text: JSON.stringify(toErrorPayload(error)) }] };
}

export function createMcpServer(options: McpServerOptions): McpServer {
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });
  const { registry, identity, clientFactory, logger } = options;

  for (const tool of registry.list()) {
    server.tool(tool.name, tool.description, tool.inputShape, tool.annotations, async (args) => {
      try {
        const result = await invokeTool(registry, tool.name, args, { identity, clientFactory, logger });
        return toToolResult(result);
      } catch (err) {
        return toErrorResult(err);
      }
    });
  }

  return server;
}
