// ============================================================================
// Places Domain Tools
// ============================================================================

import { ToolSpec } from '../types.js';
import { parseArgs, toolSuccess } from '../shared/index.js';
import { findNearbyPlaces, NearbyPlacesInputSchema, MAX_PAGE_SIZE, MAX_RADIUS_METERS } from '../places.js';

export const findNearbyPlacesTool: ToolSpec = {
  definition: {
    name: 'find_nearby_places',
    description: 'Find nearby places and points of interest with optional detailed information (address, contact info, hours, rating).',
    annotations: {
      title: 'Nearby Places',
      readOnlyHint: true,
      openWorldHint: true,
    },
    inputSchema: {
      type: 'object',
      properties: {
        x: {
          type: 'number',
          description: 'Longitude of the center point (e.g., -122.4194)',
        },
        y: {
          type: 'number',
          description: 'Latitude of the center point (e.g., 37.7749)',
        },
        pageSize: {
          type: 'integer',
          description: `Number of results to return (1-${MAX_PAGE_SIZE}, default 10)`,
          minimum: 1,
          maximum: MAX_PAGE_SIZE,
          default: 10,
        },
        categories: {
          type: 'string',
          description: 'Optional filter: comma-separated category IDs (e.g., "13035") or search text (e.g., "coffee")',
        },
        radius: {
          type: 'number',
          description: `Search radius in meters (max ${MAX_RADIUS_METERS}, default 5000)`,
          default: 5000,
        },
        includeDetails: {
          type: 'boolean',
          description: 'Whether to fetch full details for the first places (default: false)',
          default: false,
        },
        detailsLimit: {
          type: 'integer',
          description: 'Maximum number of places to fetch details for when includeDetails=true (default: 1)',
          minimum: 0,
          maximum: MAX_PAGE_SIZE,
          default: 1,
        },
      },
      required: ['x', 'y'],
    },
  },
  handler: async (args, ctx) => {
    const params = parseArgs(NearbyPlacesInputSchema, args);
    return toolSuccess(await findNearbyPlaces(ctx, params));
  },
};

export const placesTools: ToolSpec[] = [findNearbyPlacesTool];
