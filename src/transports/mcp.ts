// ============================================================================
// Shared MCP Server Factory
// ============================================================================
// Creates an MCP Server with ListTools + CallTool handlers wired to the kernel.
// ============================================================================

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { log } from '../config.js';
import type { ToolKernel } from '../kernel.js';

export const SERVER_INFO = {
  name: 'arcgis-location-services',
  version: '0.1.0',
} as const;

/**
 * Create an MCP Server wired to the given kernel.
 * Each transport gets its own Server instance (MCP SDK only supports
 * one transport per Server).
 */
export function createMcpServer(kernel: ToolKernel): Server {
  const server = new Server(
    { ...SERVER_INFO },
    { capabilities: { tools: {} } }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: kernel.getMcpToolDefinitions() };
  });

  // Tool failures are returned as isError results by the kernel
  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    log(`Tool called: ${name}`);
    log(`Arguments:`, JSON.stringify(args ?? {}, null, 2));

    return kernel.dispatch(name, args ?? {});
  });

  return server;
}
