// ============================================================================
// Routing
// ============================================================================
// Turn-by-turn directions between two or more stops (Route_World/solve).
// ============================================================================

import { z } from 'zod';
import { joinUrl } from '../arcgis/endpoints.js';
import { formatStops, parseStops, type LonLat } from '../arcgis/coordinates.js';
import { asNumber, asObject, asObjectArray, asString } from '../arcgis/json.js';
import type { ToolContext } from './types.js';

export const DirectionsInputSchema = z.object({
  stops: z.string({ required_error: 'stops is required as "lon1,lat1;lon2,lat2"' }),
});

export type DirectionsInput = z.input<typeof DirectionsInputSchema>;
export type DirectionsParams = z.output<typeof DirectionsInputSchema>;

export interface RouteSummary {
  distance: number | null;
  distanceUnits: 'miles' | 'kilometers';
  /** Total travel time in minutes */
  time: number | null;
  /** Human-readable travel time, e.g. "1 hr 5 min" */
  travelTime: string | null;
}

export interface Maneuver {
  step: number;
  text: string;
  /** Length in miles */
  length: number | null;
  /** Time in minutes */
  time: number | null;
  maneuverType?: string;
}

export interface RouteResult {
  stops: LonLat[];
  summary: RouteSummary | null;
  directions: Maneuver[];
}

export function formatTravelTime(minutes: number): string {
  const hours = Math.floor(minutes / 60);
  const rest = Math.floor(minutes % 60);
  return hours > 0 ? `${hours} hr ${rest} min` : `${rest} min`;
}

function readSummary(attributes: Record<string, unknown>): RouteSummary {
  const miles = asNumber(attributes.Total_Miles);
  const kilometers = asNumber(attributes.Total_Kilometers);
  const minutes = asNumber(attributes.Total_Minutes) ?? asNumber(attributes.Total_TravelTime);

  return {
    distance: miles ?? kilometers ?? null,
    distanceUnits: miles === undefined && kilometers !== undefined ? 'kilometers' : 'miles',
    time: minutes ?? null,
    travelTime: minutes !== undefined ? formatTravelTime(minutes) : null,
  };
}

/**
 * Solve a route through the stops in the given order.
 */
export async function getDirections(ctx: ToolContext, params: DirectionsParams): Promise<RouteResult> {
  const stops = parseStops(params.stops);

  const data = await ctx.client.getJson(joinUrl(ctx.config.services.routing, 'solve'), {
    stops: formatStops(stops),
    returnDirections: true,
    directionsLengthUnits: 'esriNAUMiles',
  });

  const route = asObjectArray(asObject(data.routes).features)[0];
  if (!route) {
    return { stops, summary: null, directions: [] };
  }

  const directionSet = asObjectArray(data.directions)[0];
  const directions = asObjectArray(directionSet?.features).map((feature, i): Maneuver => {
    const attrs = asObject(feature.attributes);
    const maneuver: Maneuver = {
      step: i + 1,
      text: asString(attrs.text) ?? 'Unknown direction',
      length: asNumber(attrs.length) ?? null,
      time: asNumber(attrs.time) ?? null,
    };
    const maneuverType = asString(attrs.maneuverType);
    if (maneuverType) maneuver.maneuverType = maneuverType;
    return maneuver;
  });

  return {
    stops,
    summary: readSummary(asObject(route.attributes)),
    directions,
  };
}
