// ============================================================================
// Location Service Errors
// ============================================================================
// Four failure kinds, all converted to a structured tool error at the kernel
// boundary. Nothing here is retried; `retryable` only informs the caller.
// ============================================================================

export type ErrorKind = 'ConfigurationError' | 'ValidationError' | 'UpstreamError' | 'NetworkError';

/** Reported for thrown values that are not LocationServiceErrors, i.e. local faults */
export type FailureKind = ErrorKind | 'InternalError';

export abstract class LocationServiceError extends Error {
  abstract readonly kind: ErrorKind;
  readonly status?: number;
  readonly retryable: boolean;
  readonly hint?: string;

  constructor(message: string, options: { status?: number; retryable?: boolean; hint?: string } = {}) {
    super(message);
    this.name = new.target.name;
    this.status = options.status;
    this.retryable = options.retryable ?? false;
    this.hint = options.hint;
  }
}

export class ConfigurationError extends LocationServiceError {
  readonly kind = 'ConfigurationError' as const;
}

export class ValidationError extends LocationServiceError {
  readonly kind = 'ValidationError' as const;
}

export class UpstreamError extends LocationServiceError {
  readonly kind = 'UpstreamError' as const;

  constructor(message: string, status?: number, hint?: string) {
    super(message, {
      status,
      retryable: status !== undefined && (status === 429 || status >= 500),
      hint,
    });
  }
}

export class NetworkError extends LocationServiceError {
  readonly kind = 'NetworkError' as const;

  constructor(message: string) {
    super(message, { retryable: true });
  }
}

export function isLocationServiceError(err: unknown): err is LocationServiceError {
  return err instanceof LocationServiceError;
}

export const MISSING_API_KEY_HINT =
  'Set ARCGIS_LOCATION_SERVICE_API_KEY (or api_key in the config file) to an ArcGIS Location Services API key.';

export function missingApiKeyError(): ConfigurationError {
  return new ConfigurationError('ArcGIS API key is not configured', { hint: MISSING_API_KEY_HINT });
}

// ============================================================================
// Structured Form
// ============================================================================

export interface StructuredError {
  success: false;
  tool: string;
  kind: FailureKind;
  error: string;
  status?: number;
  retryable: boolean;
  hint?: string;
}

/**
 * Convert any thrown value into the payload returned to MCP clients.
 * Anything else is a local fault and is reported as an InternalError.
 */
export function toStructuredError(tool: string, err: unknown): StructuredError {
  if (isLocationServiceError(err)) {
    const payload: StructuredError = {
      success: false,
      tool,
      kind: err.kind,
      error: err.message,
      retryable: err.retryable,
    };
    if (err.status !== undefined) payload.status = err.status;
    if (err.hint) payload.hint = err.hint;
    return payload;
  }

  return {
    success: false,
    tool,
    kind: 'InternalError',
    error: `Internal error: ${err instanceof Error ? err.message : String(err)}`,
    retryable: false,
  };
}
