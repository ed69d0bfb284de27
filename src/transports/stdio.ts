// ============================================================================
// Stdio Transport Adapter
// ============================================================================
// Wraps StdioServerTransport for Claude Desktop, Cursor and other local
// MCP hosts. Session = process lifetime.
// ============================================================================

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { log } from '../config.js';
import type { ToolKernel } from '../kernel.js';
import type { TransportAdapter } from './types.js';
import { createMcpServer } from './mcp.js';

export class StdioAdapter implements TransportAdapter {
  readonly name = 'stdio';
  private server: Server | null = null;

  async start(kernel: ToolKernel): Promise<void> {
    this.server = createMcpServer(kernel);
    const transport = new StdioServerTransport();
    await this.server.connect(transport);
    log('ArcGIS Location Services MCP Server running on stdio');
  }

  async stop(): Promise<void> {
    if (this.server) {
      await this.server.close();
      this.server = null;
    }
  }
}
