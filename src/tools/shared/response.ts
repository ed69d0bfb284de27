// ============================================================================
// Response Helpers
// ============================================================================
// Standardized response formatting for tool handlers.
// ============================================================================

import type { StructuredError } from '../../arcgis/errors.js';
import { ToolResult } from '../types.js';

/**
 * Create a successful tool response
 */
export function toolSuccess(data: unknown): ToolResult {
  return {
    content: [{
      type: 'text',
      text: JSON.stringify(data, null, 2),
    }],
  };
}

/**
 * Create an error tool response
 */
export function toolError(error: StructuredError): ToolResult {
  return {
    content: [{
      type: 'text',
      text: JSON.stringify(error, null, 2),
    }],
    isError: true,
  };
}
