// ============================================================================
// Coordinate Parsing
// ============================================================================
// Strict parsers for the compound string arguments tools accept. Malformed
// input is rejected with a ValidationError, never truncated or coerced.
// ============================================================================

import { ValidationError } from './errors.js';

export interface LonLat {
  /** Longitude */
  x: number;
  /** Latitude */
  y: number;
}

export const MAX_ELEVATION_POINTS = 100;

const NUMBER_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

function parseNumber(raw: string, label: string, field: string): number {
  const text = raw.trim();
  if (!NUMBER_PATTERN.test(text)) {
    throw new ValidationError(`${field}: ${label} "${raw}" is not a number`);
  }
  const value = Number(text);
  if (!Number.isFinite(value)) {
    throw new ValidationError(`${field}: ${label} "${raw}" is not a finite number`);
  }
  return value;
}

export function assertLongitude(value: number, field: string): void {
  if (!Number.isFinite(value) || value < -180 || value > 180) {
    throw new ValidationError(`${field}: longitude ${value} is outside [-180, 180]`);
  }
}

export function assertLatitude(value: number, field: string): void {
  if (!Number.isFinite(value) || value < -90 || value > 90) {
    throw new ValidationError(`${field}: latitude ${value} is outside [-90, 90]`);
  }
}

/**
 * Parse a "longitude,latitude" pair such as "-122.4194,37.7749".
 */
export function parseLonLat(value: string, field = 'location'): LonLat {
  const parts = value.split(',');
  if (parts.length !== 2) {
    throw new ValidationError(`${field} must be formatted as "longitude,latitude", got "${value}"`);
  }

  const x = parseNumber(parts[0], 'longitude', field);
  const y = parseNumber(parts[1], 'latitude', field);
  assertLongitude(x, field);
  assertLatitude(y, field);
  return { x, y };
}

export function formatLonLat(point: LonLat): string {
  return `${point.x},${point.y}`;
}

/**
 * Parse a semicolon-separated stop list: "lon1,lat1;lon2,lat2[;...]".
 */
export function parseStops(value: string, field = 'stops'): LonLat[] {
  const segments = value.split(';');
  if (segments.length < 2) {
    throw new ValidationError(
      `At least two stops are required (origin and destination) in the format "lon1,lat1;lon2,lat2"`
    );
  }
  return segments.map((segment, i) => parseLonLat(segment, `${field}[${i}]`));
}

export function formatStops(stops: LonLat[]): string {
  return stops.map(formatLonLat).join(';');
}

/**
 * Parse a JSON array of [lon, lat] pairs, e.g. "[[-117.182, 34.0555],[-117.185, 34.057]]".
 */
export function parseCoordinateList(value: string, field = 'coordinates'): LonLat[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch {
    throw new ValidationError(`${field} must be a JSON array of [longitude, latitude] pairs`);
  }

  if (!Array.isArray(parsed) || parsed.length === 0) {
    throw new ValidationError(`${field} must be a non-empty JSON array of [longitude, latitude] pairs`);
  }
  if (parsed.length > MAX_ELEVATION_POINTS) {
    throw new ValidationError(`${field} holds ${parsed.length} points; at most ${MAX_ELEVATION_POINTS} are allowed`);
  }

  return parsed.map((pair: unknown, i) => {
    const label = `${field}[${i}]`;
    if (!Array.isArray(pair) || pair.length !== 2) {
      throw new ValidationError(`${label} must be a [longitude, latitude] pair`);
    }
    const [x, y]: unknown[] = pair;
    if (typeof x !== 'number' || typeof y !== 'number') {
      throw new ValidationError(`${label} must contain two numbers`);
    }
    assertLongitude(x, label);
    assertLatitude(y, label);
    return { x, y };
  });
}
