// ============================================================================
// Transport Layer — public API
// ============================================================================

export type { TransportAdapter } from './types.js';
export { createMcpServer, SERVER_INFO } from './mcp.js';
export { StdioAdapter } from './stdio.js';
