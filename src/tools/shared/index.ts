// ============================================================================
// Shared Helpers - Barrel Export
// ============================================================================

export { toolSuccess, toolError } from './response.js';
export { parseArgs, requireOneOf } from './validation.js';
