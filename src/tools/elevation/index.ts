// ============================================================================
// Elevation Domain Tools
// ============================================================================

import { ToolSpec } from '../types.js';
import { parseArgs, toolSuccess } from '../shared/index.js';
import { getElevation, ElevationInputSchema, ELEVATION_DATUMS } from '../elevation.js';
import { MAX_ELEVATION_POINTS } from '../../arcgis/coordinates.js';

export const getElevationTool: ToolSpec = {
  definition: {
    name: 'get_elevation',
    description: `Get elevation for locations on land or water: either one point (lon + lat) or up to ${MAX_ELEVATION_POINTS} points (coordinates).`,
    annotations: {
      title: 'Elevation',
      readOnlyHint: true,
      openWorldHint: true,
    },
    inputSchema: {
      type: 'object',
      properties: {
        lon: {
          type: 'number',
          description: 'Longitude of a single point (e.g., -117.195)',
        },
        lat: {
          type: 'number',
          description: 'Latitude of a single point (e.g., 34.065)',
        },
        coordinates: {
          type: 'string',
          description: 'JSON array of [lon, lat] pairs for multiple points; ignored when lon and lat are given (e.g., "[[-117.182, 34.0555],[-117.185, 34.057]]")',
        },
        relativeTo: {
          type: 'string',
          enum: [...ELEVATION_DATUMS],
          description: 'Reference for the elevation measurement (default: meanSeaLevel)',
        },
      },
    },
  },
  handler: async (args, ctx) => {
    const params = parseArgs(ElevationInputSchema, args);
    return toolSuccess(await getElevation(ctx, params));
  },
};

export const elevationTools: ToolSpec[] = [getElevationTool];
