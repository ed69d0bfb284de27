import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import type { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { createMcpServer } from '../../src/transports/mcp.js';
import type { ToolKernel } from '../../src/kernel.js';
import type { ToolResult } from '../../src/tools/types.js';
import { isJsonObject } from '../../src/arcgis/json.js';

export interface TestMcpClient {
  client: Client;
  server: Server;
  close: () => Promise<void>;
  listTools: () => Promise<Array<{ name: string; description?: string; inputSchema: { type: string } }>>;
  callTool: (name: string, args: Record<string, unknown>) => Promise<ToolResult>;
}

function textContent(content: unknown): ToolResult['content'] {
  if (!Array.isArray(content)) return [];
  return content.flatMap((item: unknown) =>
    isJsonObject(item) && item.type === 'text' && typeof item.text === 'string'
      ? [{ type: 'text' as const, text: item.text }]
      : []
  );
}

/**
 * Connects a client to the production server factory over an in-memory
 * transport, so the full MCP protocol flow runs without stdio.
 */
export async function createTestMcpClient(kernel: ToolKernel): Promise<TestMcpClient> {
  const server = createMcpServer(kernel);
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();

  const client = new Client(
    { name: 'test-client', version: '1.0.0' },
    { capabilities: {} }
  );

  await Promise.all([
    client.connect(clientTransport),
    server.connect(serverTransport),
  ]);

  return {
    client,
    server,
    close: async () => {
      await client.close();
      await server.close();
    },
    listTools: async () => {
      const result = await client.listTools();
      return result.tools.map((t) => ({ name: t.name, description: t.description, inputSchema: t.inputSchema }));
    },
    callTool: async (name, args) => {
      const result = await client.callTool({ name, arguments: args });
      return {
        content: textContent(result.content),
        isError: result.isError === true ? true : undefined,
      };
    },
  };
}
