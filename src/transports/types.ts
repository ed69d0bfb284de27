// ============================================================================
// Transport Adapter Interface
// ============================================================================
// Transports implement this interface so server.ts can start one without
// knowing its internals.
// ============================================================================

import type { ToolKernel } from '../kernel.js';

/**
 * A transport adapter knows how to expose the kernel to a specific protocol.
 * Adapters are self-contained: they create their own MCP Server, connect
 * their own transport, and manage their own lifecycle.
 */
export interface TransportAdapter {
  readonly name: string;
  start(kernel: ToolKernel): Promise<void>;
  stop(): Promise<void>;
}
