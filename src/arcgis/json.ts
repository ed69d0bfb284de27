// ============================================================================
// JSON Readers
// ============================================================================
// ArcGIS responses are loosely shaped; these narrow individual fields
// without casting. Numbers pass through untouched.
// ============================================================================

export type JsonObject = Record<string, unknown>;

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function asObject(value: unknown): JsonObject {
  return isJsonObject(value) ? value : {};
}

export function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

export function asObjectArray(value: unknown): JsonObject[] {
  return asArray(value).filter(isJsonObject);
}

/** Non-empty string, or undefined */
export function asString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

export function asNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

/**
 * Copy the listed keys whose values are non-empty strings or numbers.
 */
export function pickScalars(source: JsonObject, keys: readonly string[]): Record<string, string | number> {
  const out: Record<string, string | number> = {};
  for (const key of keys) {
    const value = source[key];
    if ((typeof value === 'string' && value.length > 0) || typeof value === 'number') {
      out[key] = value;
    }
  }
  return out;
}
