// ============================================================================
// Places
// ============================================================================
// Nearby place search (near-point) with optional per-place detail lookups.
// ============================================================================

import { z } from 'zod';
import { joinUrl } from '../arcgis/endpoints.js';
import { assertLatitude, assertLongitude, type LonLat } from '../arcgis/coordinates.js';
import { toStructuredError } from '../arcgis/errors.js';
import type { QueryParams } from '../arcgis/client.js';
import { asNumber, asObject, asObjectArray, asString, pickScalars, type JsonObject } from '../arcgis/json.js';
import { log } from '../config.js';
import { readPoint } from './geocode.js';
import type { ToolContext } from './types.js';

export const MAX_PAGE_SIZE = 20;
export const MAX_RADIUS_METERS = 10_000;

export const NearbyPlacesInputSchema = z.object({
  x: z.number({ required_error: 'x (longitude) is required' }),
  y: z.number({ required_error: 'y (latitude) is required' }),
  pageSize: z.number().int().min(1).max(MAX_PAGE_SIZE).default(10),
  categories: z
    .string()
    .trim()
    .optional()
    .transform(v => (v ? v : undefined)),
  radius: z.number().positive().max(MAX_RADIUS_METERS).default(5000),
  includeDetails: z.boolean().default(false),
  detailsLimit: z.number().int().min(0).max(MAX_PAGE_SIZE).default(1),
});

export type NearbyPlacesInput = z.input<typeof NearbyPlacesInputSchema>;
export type NearbyPlacesParams = z.output<typeof NearbyPlacesInputSchema>;

export interface PlaceDetails {
  address: Record<string, string | number>;
  phone?: string;
  website?: string;
  email?: string;
  openingHours?: unknown;
  description?: string;
  rating?: unknown;
}

export interface Place {
  placeId?: string;
  name: string;
  address: string | null;
  categories: string[];
  distance?: number;
  location?: LonLat;
  phone?: string;
  details?: PlaceDetails;
  detailsError?: string;
}

export interface PlaceList {
  center: LonLat;
  radius: number;
  places: Place[];
}

const ADDRESS_PARTS = [
  'streetAddress',
  'streetNumber',
  'streetName',
  'locality',
  'city',
  'region',
  'postcode',
  'postalCode',
] as const;

const DETAIL_ADDRESS_PARTS = [...ADDRESS_PARTS, 'neighborhood', 'adminRegion', 'country'] as const;

// ============================================================================
// Mapping
// ============================================================================

/**
 * Category IDs go to `categoryIds`; anything else is treated as search text.
 */
export function categoryQuery(categories: string | undefined): QueryParams {
  if (!categories) return {};
  const parts = categories.split(',').map(p => p.trim()).filter(p => p.length > 0);
  if (parts.length > 0 && parts.every(p => /^\d+$/.test(p))) {
    return { categoryIds: parts.join(',') };
  }
  return { searchText: categories };
}

export function formatPlaceAddress(value: unknown): string | null {
  const address = asObject(value);
  const formatted = asString(address.formattedAddress);
  if (formatted) return formatted;

  const parts = Object.values(pickScalars(address, ADDRESS_PARTS)).map(String);
  return parts.length > 0 ? parts.join(', ') : null;
}

function categoryLabels(place: JsonObject): string[] {
  const labels = asObjectArray(place.categories)
    .map(c => asString(c.label))
    .filter((label): label is string => label !== undefined);
  const single = asString(asObject(place.category).label);
  if (single && !labels.includes(single)) labels.push(single);
  return labels;
}

function toPlace(raw: JsonObject): Place {
  const place: Place = {
    name: asString(raw.name) ?? 'Unknown Place',
    address: formatPlaceAddress(raw.address),
    categories: categoryLabels(raw),
  };

  const placeId = asString(raw.placeId);
  if (placeId) place.placeId = placeId;
  const distance = asNumber(raw.distance);
  if (distance !== undefined) place.distance = distance;
  const location = readPoint(raw.location);
  if (location) place.location = location;
  const phone = asString(raw.phone) ?? asString(asObject(raw.contactInfo).telephone);
  if (phone) place.phone = phone;
  return place;
}

export function toPlaceDetails(data: JsonObject): PlaceDetails {
  const body = asObject(data.placeDetails ?? data);
  const contact = asObject(body.contactInfo);
  const details: PlaceDetails = {
    address: pickScalars(asObject(body.address), DETAIL_ADDRESS_PARTS),
  };

  const phone = asString(contact.telephone) ?? asString(body.phone);
  if (phone) details.phone = phone;
  const website = asString(contact.website) ?? asString(body.url);
  if (website) details.website = website;
  const email = asString(contact.email) ?? asString(body.email);
  if (email) details.email = email;
  const hours = body.hours ?? body.openingHours;
  if (hours !== undefined && hours !== null) details.openingHours = hours;
  const description = asString(body.description);
  if (description) details.description = description;
  if (body.rating !== undefined && body.rating !== null) details.rating = body.rating;
  return details;
}

// ============================================================================
// Operations
// ============================================================================

export async function getPlaceDetails(ctx: ToolContext, placeId: string): Promise<PlaceDetails> {
  const data = await ctx.client.getJson(joinUrl(ctx.config.services.places, placeId), {
    requestedFields: 'all',
  });
  return toPlaceDetails(data);
}

/**
 * Find places near a point. With includeDetails, the first detailsLimit
 * places that have a placeId get a detail lookup; a failed lookup is
 * reported on that place instead of failing the whole call.
 */
export async function findNearbyPlaces(ctx: ToolContext, params: NearbyPlacesParams): Promise<PlaceList> {
  assertLongitude(params.x, 'x');
  assertLatitude(params.y, 'y');

  const data = await ctx.client.getJson(joinUrl(ctx.config.services.places, 'near-point'), {
    x: params.x,
    y: params.y,
    pageSize: params.pageSize,
    radius: params.radius,
    ...categoryQuery(params.categories),
  });

  const places = asObjectArray(data.results).map(toPlace);

  if (params.includeDetails && params.detailsLimit > 0) {
    const targets = places
      .flatMap(place => (place.placeId ? [{ place, placeId: place.placeId }] : []))
      .slice(0, params.detailsLimit);
    await Promise.all(
      targets.map(async ({ place, placeId }) => {
        try {
          place.details = await getPlaceDetails(ctx, placeId);
        } catch (err) {
          const failure = toStructuredError('find_nearby_places', err);
          log(`Place details failed for ${placeId}: ${failure.error}`);
          place.detailsError = failure.error;
        }
      })
    );
  }

  return {
    center: { x: params.x, y: params.y },
    radius: params.radius,
    places,
  };
}
