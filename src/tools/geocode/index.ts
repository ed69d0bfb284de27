// ============================================================================
// Geocoding Domain Tools
// ============================================================================

import { ToolSpec } from '../types.js';
import { parseArgs, toolSuccess } from '../shared/index.js';
import {
  geocode,
  reverseGeocode,
  GeocodeInputSchema,
  ReverseGeocodeInputSchema,
} from '../geocode.js';

export const geocodeTool: ToolSpec = {
  definition: {
    name: 'geocode',
    description: 'Search for an address, place or point of interest. Returns up to maxLocations candidates in ArcGIS ranking order with WGS84 coordinates and match scores.',
    annotations: {
      title: 'Geocode',
      readOnlyHint: true,
      openWorldHint: true,
    },
    inputSchema: {
      type: 'object',
      properties: {
        singleLine: {
          type: 'string',
          description: 'Complete address in a single string (e.g., "1600 Pennsylvania Ave NW, DC")',
        },
        address: {
          type: 'string',
          description: 'Place name or address (e.g., "Starbucks" or "380 New York St")',
        },
        location: {
          type: 'string',
          description: 'Optional point to search near, as "longitude,latitude" (e.g., "-122.4194,37.7749")',
        },
        category: {
          type: 'string',
          description: 'POI category to search for (e.g., "gas station"); used only when singleLine and address are empty',
        },
        outFields: {
          type: 'string',
          description: 'Fields to return in the response (default: all fields)',
          default: '*',
        },
        maxLocations: {
          type: 'integer',
          description: 'Maximum number of candidates (1-50, default 5)',
          minimum: 1,
          maximum: 50,
          default: 5,
        },
      },
    },
  },
  handler: async (args, ctx) => {
    const params = parseArgs(GeocodeInputSchema, args);
    return toolSuccess(await geocode(ctx, params));
  },
};

export const reverseGeocodeTool: ToolSpec = {
  definition: {
    name: 'reverse_geocode',
    description: 'Convert geographic coordinates to an address.',
    annotations: {
      title: 'Reverse Geocode',
      readOnlyHint: true,
      openWorldHint: true,
    },
    inputSchema: {
      type: 'object',
      properties: {
        location: {
          type: 'string',
          description: 'Location as "longitude,latitude" (e.g., "-79.3871,43.6426")',
        },
        outFields: {
          type: 'string',
          description: 'Fields to include in the response (default: all fields)',
          default: '*',
        },
      },
      required: ['location'],
    },
  },
  handler: async (args, ctx) => {
    const params = parseArgs(ReverseGeocodeInputSchema, args);
    return toolSuccess(await reverseGeocode(ctx, params));
  },
};

export const geocodeTools: ToolSpec[] = [geocodeTool, reverseGeocodeTool];
