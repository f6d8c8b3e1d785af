/**
 * MCP Server
 *
 * Exposes the tool registry over the Model Context Protocol. Every call
 * answers with the JSON-encoded ToolResponse; failures set isError.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { Strata } from '../strata.js';
import { callTool, listTools, registerTools, type ToolRegistry } from '../tools/index.js';

export const SERVER_NAME = 'strata';
export const SERVER_VERSION = '0.1.0';

export function toMcpTools(registry: ToolRegistry): Tool[] {
  return listTools(registry).map((tool) => ({
    name: tool.name,
    description: tool.description,
    inputSchema: tool.inputSchema,
  }));
}

/**
 * Create an MCP server with every Strata tool registered
 */
export function createStrataMcpServer(strata: Strata): Server {
  const registry = registerTools(strata);
  const logger = strata.logger.child('mcp');

  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { capabilities: { tools: {} } }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: toMcpTools(registry),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    const started = Date.now();
    const result = await callTool(registry, name, args ?? {});

    if (result.ok) {
      logger.debug('tool call', { name, ms: Date.now() - started });
    } else {
      logger.info('tool call failed', { name, kind: result.error.kind, message: result.error.message });
    }

    return {
      content: [{ type: 'text' as const, text: JSON.stringify(result, null, 2) }],
      isError: !result.ok,
    };
  });

  return server;
}
