// ============================================================================
// Tool Kernel — single source of truth for tool dispatch
// ============================================================================
// The kernel owns the tool registry, the shared ArcGIS client, the API-key
// gate and the error boundary. Whatever a handler throws comes back as a
// structured error result; dispatch itself never rejects.
// ============================================================================

import { EventEmitter } from 'events';
import { ArcGISClient, type FetchLike } from './arcgis/client.js';
import { ValidationError, isLocationServiceError, missingApiKeyError, toStructuredError } from './arcgis/errors.js';
import { getConfig, log, type Config } from './config.js';
import { locationTools } from './tools/index.js';
import { toolError } from './tools/shared/index.js';
import type { ToolContext, ToolDefinition, ToolResult, ToolSpec } from './tools/types.js';

// ============================================================================
// Dispatch Events — observability seam
// ============================================================================

export type DispatchEventType = 'dispatch' | 'result' | 'failure';

export interface DispatchEvent {
  type: DispatchEventType;
  tool: string;
  timestamp: string;
  duration_ms?: number;
  success?: boolean;
  error?: string;
}

export interface KernelOptions {
  /** Defaults to getConfig() */
  config?: Config;
  /** Injected fetch, used by tests */
  fetch?: FetchLike;
  /** Defaults to every location tool */
  tools?: ToolSpec[];
}

export interface ToolKernel {
  tools: ToolSpec[];
  /** Fast lookup by tool name */
  toolMap: Map<string, ToolSpec>;
  context: ToolContext;

  /**
   * Dispatch a tool call. Always resolves; failures come back with
   * isError set and a structured payload.
   */
  dispatch(name: string, args: Record<string, unknown>): Promise<ToolResult>;

  /** Tool definitions for the tools/list response */
  getMcpToolDefinitions(): ToolDefinition[];

  /** Subscribe to dispatch events */
  on(event: DispatchEventType, listener: (evt: DispatchEvent) => void): void;

  toolCount: number;
}

/**
 * Create the tool kernel. Call once at startup.
 */
export function createKernel(options: KernelOptions = {}): ToolKernel {
  const config = options.config ?? getConfig();
  const tools = options.tools ?? locationTools;
  const toolMap = new Map(tools.map(t => [t.definition.name, t]));

  const client = new ArcGISClient({
    apiKey: config.apiKey,
    timeoutMs: config.timeoutMs,
    userAgent: config.userAgent,
    fetch: options.fetch,
  });
  const context: ToolContext = { client, config };

  const emitter = new EventEmitter();

  function emit(event: Omit<DispatchEvent, 'timestamp'>): void {
    emitter.emit(event.type, { ...event, timestamp: new Date().toISOString() } satisfies DispatchEvent);
  }

  function fail(name: string, err: unknown, startTime: number): ToolResult {
    const failure = toStructuredError(name, err);
    log(`Error in tool ${name}: [${failure.kind}] ${failure.error}`);
    if (!isLocationServiceError(err) && err instanceof Error && err.stack) {
      log(err.stack);
    }
    emit({
      type: 'failure',
      tool: name,
      duration_ms: Date.now() - startTime,
      success: false,
      error: failure.error,
    });
    return toolError(failure);
  }

  async function dispatch(name: string, args: Record<string, unknown>): Promise<ToolResult> {
    const startTime = Date.now();
    const tool = toolMap.get(name);

    if (!tool) {
      return fail(
        name,
        new ValidationError(`Unknown tool: ${name}`, {
          hint: `Available tools: ${[...toolMap.keys()].join(', ')}`,
        }),
        startTime
      );
    }

    // No outbound call is attempted without credentials
    if (!client.hasApiKey) {
      return fail(name, missingApiKeyError(), startTime);
    }

    emit({ type: 'dispatch', tool: name });

    try {
      const result = await tool.handler(args, context);
      emit({
        type: 'result',
        tool: name,
        duration_ms: Date.now() - startTime,
        success: !result.isError,
      });
      return result;
    } catch (err) {
      return fail(name, err, startTime);
    }
  }

  log(`Kernel: loaded ${tools.length} tools`);

  return {
    tools,
    toolMap,
    context,
    dispatch,
    getMcpToolDefinitions: () => tools.map(t => t.definition),
    on: (event, listener) => {
      emitter.on(event, listener);
    },
    toolCount: tools.length,
  };
}
