// ============================================================================
// Geocoding
// ============================================================================
// Forward geocoding (findAddressCandidates) and reverse geocoding against the
// World GeocodeServer.
// ============================================================================

import { z } from 'zod';
import { joinUrl } from '../arcgis/endpoints.js';
import { formatLonLat, parseLonLat, type LonLat } from '../arcgis/coordinates.js';
import { ValidationError } from '../arcgis/errors.js';
import type { QueryParams } from '../arcgis/client.js';
import { asNumber, asObject, asObjectArray, asString, pickScalars, type JsonObject } from '../arcgis/json.js';
import type { ToolContext } from './types.js';

/** WGS84 */
const OUT_SR = 4326;

/** Optional free text; blank strings count as absent. */
const optionalText = z
  .string()
  .trim()
  .optional()
  .transform(v => (v ? v : undefined));

// ============================================================================
// Types
// ============================================================================

export const GeocodeInputSchema = z.object({
  singleLine: optionalText,
  address: optionalText,
  location: optionalText,
  category: optionalText,
  outFields: z.string().trim().min(1).default('*'),
  maxLocations: z.number().int().min(1).max(50).default(5),
});

export type GeocodeInput = z.input<typeof GeocodeInputSchema>;
export type GeocodeParams = z.output<typeof GeocodeInputSchema>;

export interface GeocodeCandidate {
  address: string;
  location: LonLat | null;
  /** Match score exactly as ArcGIS reported it */
  score: number | null;
  placeName?: string;
  addressType?: string;
  components: Record<string, string | number>;
}

export interface GeocodeResult {
  candidates: GeocodeCandidate[];
  spatialReference: number | null;
}

export const ReverseGeocodeInputSchema = z.object({
  location: z.string({ required_error: 'location is required as "longitude,latitude"' }),
  outFields: z.string().trim().min(1).default('*'),
});

export type ReverseGeocodeInput = z.input<typeof ReverseGeocodeInputSchema>;
export type ReverseGeocodeParams = z.output<typeof ReverseGeocodeInputSchema>;

export interface AddressResult {
  query: LonLat;
  address: string | null;
  /** Match score, when ArcGIS reports one */
  score: number | null;
  addressType: string | null;
  components: Record<string, string | number>;
  location: (LonLat & { wkid: number | null }) | null;
}

// Candidate attributes worth surfacing, in display order
const CANDIDATE_COMPONENTS = [
  'StAddr',
  'City',
  'Region',
  'RegionAbbr',
  'Postal',
  'PostalExt',
  'Country',
  'Addr_type',
  'Type',
  'PlaceName',
  'Place_addr',
] as const;

const REVERSE_COMPONENTS = [
  'Address',
  'AddNum',
  'StPreDir',
  'StName',
  'StType',
  'StDir',
  'Neighborhood',
  'District',
  'City',
  'Subregion',
  'Region',
  'Postal',
  'PostalExt',
  'CountryCode',
  'PlaceName',
] as const;

// ============================================================================
// Helpers
// ============================================================================

export function readPoint(value: unknown): LonLat | null {
  const point = asObject(value);
  const x = asNumber(point.x);
  const y = asNumber(point.y);
  return x !== undefined && y !== undefined ? { x, y } : null;
}

function toCandidate(candidate: JsonObject): GeocodeCandidate {
  const attrs = asObject(candidate.attributes);
  const result: GeocodeCandidate = {
    address: asString(candidate.address) ?? asString(attrs.Match_addr) ?? '',
    location: readPoint(candidate.location),
    score: asNumber(candidate.score) ?? null,
    components: pickScalars(attrs, CANDIDATE_COMPONENTS),
  };

  const placeName = asString(attrs.PlaceName);
  if (placeName) result.placeName = placeName;
  const addressType = asString(attrs.Addr_type);
  if (addressType) result.addressType = addressType;
  return result;
}

// ============================================================================
// Operations
// ============================================================================

/**
 * Search for an address, place, or point of interest.
 * The first of `singleLine`, `address` and `category` that is set is the
 * search; the others are not sent.
 */
export async function geocode(ctx: ToolContext, params: GeocodeParams): Promise<GeocodeResult> {
  if (!params.singleLine && !params.address && !params.category) {
    throw new ValidationError('Provide at least one of singleLine, address, or category');
  }

  const query: QueryParams = {
    outFields: params.outFields,
    maxLocations: params.maxLocations,
    outSR: OUT_SR,
  };
  if (params.singleLine) {
    query.singleLine = params.singleLine;
  } else if (params.address) {
    query.address = params.address;
  } else if (params.category) {
    query.category = params.category;
  }
  if (params.location) query.location = formatLonLat(parseLonLat(params.location));

  const data = await ctx.client.getJson(
    joinUrl(ctx.config.services.geocode, 'findAddressCandidates'),
    query
  );

  return {
    candidates: asObjectArray(data.candidates).map(toCandidate),
    spatialReference: asNumber(asObject(data.spatialReference).wkid) ?? null,
  };
}

/**
 * Convert a "longitude,latitude" pair into the nearest address.
 */
export async function reverseGeocode(ctx: ToolContext, params: ReverseGeocodeParams): Promise<AddressResult> {
  const point = parseLonLat(params.location);

  const data = await ctx.client.getJson(joinUrl(ctx.config.services.geocode, 'reverseGeocode'), {
    location: formatLonLat(point),
    outSR: OUT_SR,
    outFields: params.outFields,
    returnIntersection: false,
  });

  const address = asObject(data.address);
  const located = readPoint(data.location);

  return {
    query: point,
    address: asString(address.Match_addr) ?? asString(address.LongLabel) ?? asString(address.Address) ?? null,
    score: asNumber(data.score) ?? null,
    addressType: asString(address.Addr_type) ?? null,
    components: pickScalars(address, REVERSE_COMPONENTS),
    location: located
      ? { ...located, wkid: asNumber(asObject(asObject(data.location).spatialReference).wkid) ?? null }
      : null,
  };
}
