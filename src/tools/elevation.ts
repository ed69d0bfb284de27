// ============================================================================
// Elevation
// ============================================================================
// Ground elevation for one point (GET at-point) or a batch of up to 100
// points (POST at-many-points).
// ============================================================================

import { z } from 'zod';
import { joinUrl } from '../arcgis/endpoints.js';
import {
  assertLatitude,
  assertLongitude,
  parseCoordinateList,
} from '../arcgis/coordinates.js';
import { ValidationError } from '../arcgis/errors.js';
import { asNumber, asObject, asObjectArray, asString, type JsonObject } from '../arcgis/json.js';
import { requireOneOf } from './shared/index.js';
import type { ToolContext } from './types.js';

export const ELEVATION_DATUMS = ['meanSeaLevel', 'ellipsoid'] as const;
export type ElevationDatum = (typeof ELEVATION_DATUMS)[number];

export const ElevationInputSchema = z.object({
  lon: z.number().optional(),
  lat: z.number().optional(),
  coordinates: z
    .string()
    .trim()
    .optional()
    .transform(v => (v ? v : undefined)),
  relativeTo: z
    .string()
    .trim()
    .optional()
    .transform(v => (v ? v : undefined)),
});

export type ElevationInput = z.input<typeof ElevationInputSchema>;
export type ElevationParams = z.output<typeof ElevationInputSchema>;

export interface ElevationValue {
  x: number | null;
  y: number | null;
  /** Meters; null when the service has no data for the point */
  elevation: number | null;
  datum: string;
}

export interface ElevationProfile {
  minimum: number;
  maximum: number;
  average: number;
  change: number;
}

export interface ElevationResult {
  relativeTo: string;
  /** Readable form of relativeTo */
  datum: string;
  values: ElevationValue[];
  profile?: ElevationProfile;
  spatialReference?: number;
}

export function referenceToReadable(reference: string): string {
  switch (reference.toLowerCase()) {
    case 'meansealevel':
      return 'above sea level';
    case 'ellipsoid':
      return 'above WGS84 ellipsoid';
    default:
      return `(${reference})`;
  }
}

export function elevationProfile(values: ElevationValue[]): ElevationProfile | undefined {
  const elevations = values
    .map(v => v.elevation)
    .filter((e): e is number => e !== null);
  if (elevations.length === 0) return undefined;

  const minimum = Math.min(...elevations);
  const maximum = Math.max(...elevations);
  const total = elevations.reduce((sum, e) => sum + e, 0);
  return {
    minimum,
    maximum,
    average: total / elevations.length,
    change: maximum - minimum,
  };
}

function toValue(point: JsonObject, datum: string): ElevationValue {
  return {
    x: asNumber(point.x) ?? null,
    y: asNumber(point.y) ?? null,
    elevation: asNumber(point.z) ?? null,
    datum,
  };
}

/**
 * Look up elevation for a single lon/lat or a JSON list of [lon, lat] pairs.
 * When both are given the single point is used.
 */
export async function getElevation(ctx: ToolContext, params: ElevationParams): Promise<ElevationResult> {
  const hasLon = params.lon !== undefined;
  const hasLat = params.lat !== undefined;
  if (hasLon !== hasLat) {
    throw new ValidationError('lon and lat must be provided together');
  }
  if (params.relativeTo) {
    requireOneOf<string>(params.relativeTo, 'relativeTo', ELEVATION_DATUMS);
  }

  if (params.lon !== undefined && params.lat !== undefined) {
    assertLongitude(params.lon, 'lon');
    assertLatitude(params.lat, 'lat');

    const data = await ctx.client.getJson(joinUrl(ctx.config.services.elevation, 'at-point'), {
      lon: params.lon,
      lat: params.lat,
      relativeTo: params.relativeTo,
    });

    const relativeTo = asString(asObject(data.elevationInfo).relativeTo) ?? params.relativeTo ?? 'meanSeaLevel';
    const point = asObject(asObject(data.result).point);
    const result: ElevationResult = {
      relativeTo,
      datum: referenceToReadable(relativeTo),
      values: [toValue(point, relativeTo)],
    };
    const wkid = asNumber(asObject(point.spatialReference).wkid);
    if (wkid !== undefined) result.spatialReference = wkid;
    return result;
  }

  if (!params.coordinates) {
    throw new ValidationError('Either lon/lat or coordinates must be provided');
  }

  const points = parseCoordinateList(params.coordinates);
  const body: JsonObject = { coordinates: points.map(p => [p.x, p.y]) };
  if (params.relativeTo) body.relativeTo = params.relativeTo;

  const data = await ctx.client.postJson(joinUrl(ctx.config.services.elevation, 'at-many-points'), body);

  const relativeTo = asString(asObject(data.elevationInfo).relativeTo) ?? params.relativeTo ?? 'meanSeaLevel';
  const values = asObjectArray(asObject(data.result).points).map(p => toValue(p, relativeTo));
  const result: ElevationResult = {
    relativeTo,
    datum: referenceToReadable(relativeTo),
    values,
  };
  if (values.length > 1) {
    const profile = elevationProfile(values);
    if (profile) result.profile = profile;
  }
  return result;
}
