// ============================================================================
// Tool Types
// ============================================================================
// Shared type definitions for the modular tool architecture.
// ============================================================================

import type { ArcGISClient } from '../arcgis/client.js';
import type { Config } from '../config.js';

/**
 * Standard MCP tool result format
 */
export type ToolResult = {
  content: Array<{
    type: 'text';
    text: string;
  }>;
  isError?: boolean;
};

export type ToolAnnotations = {
  title?: string;
  readOnlyHint?: boolean;
  destructiveHint?: boolean;
  idempotentHint?: boolean;
  openWorldHint?: boolean;
};

export type ToolDefinition = {
  name: string;
  description: string;
  annotations?: ToolAnnotations;
  inputSchema: {
    type: 'object';
    properties: Record<string, unknown>;
    required?: string[];
  };
};

/**
 * Per-process dependencies handed to every handler.
 */
export interface ToolContext {
  client: ArcGISClient;
  config: Config;
}

/**
 * Tool specification combining definition and handler.
 * Each tool exports one of these, domains export arrays of them.
 * Handlers validate their own arguments and may throw; the kernel turns
 * anything thrown into a structured error result.
 */
export interface ToolSpec {
  definition: ToolDefinition;
  handler: (args: Record<string, unknown>, ctx: ToolContext) => Promise<ToolResult>;
}
