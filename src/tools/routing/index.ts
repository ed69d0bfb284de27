// ============================================================================
// Routing Domain Tools
// ============================================================================

import { ToolSpec } from '../types.js';
import { parseArgs, toolSuccess } from '../shared/index.js';
import { getDirections, DirectionsInputSchema } from '../routing.js';

export const getDirectionsTool: ToolSpec = {
  definition: {
    name: 'get_directions',
    description: 'Get detailed turn-by-turn directions between two or more locations, with total distance (miles) and travel time.',
    annotations: {
      title: 'Directions',
      readOnlyHint: true,
      openWorldHint: true,
    },
    inputSchema: {
      type: 'object',
      properties: {
        stops: {
          type: 'string',
          description: 'Two or more locations as a semicolon-separated list of "longitude,latitude" pairs (e.g., "-122.68782,45.51238;-122.690176,45.522054")',
        },
      },
      required: ['stops'],
    },
  },
  handler: async (args, ctx) => {
    const params = parseArgs(DirectionsInputSchema, args);
    return toolSuccess(await getDirections(ctx, params));
  },
};

export const routingTools: ToolSpec[] = [getDirectionsTool];
