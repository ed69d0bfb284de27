// ============================================================================
// Basemap Domain Tools
// ============================================================================

import { ToolSpec } from '../types.js';
import { parseArgs, toolSuccess } from '../shared/index.js';
import { getBasemapTile, normalizeTileArgs, BasemapTileInputSchema } from '../basemap.js';

export const getBasemapTileTool: ToolSpec = {
  definition: {
    name: 'get_basemap_tile',
    description: 'Check access to a static basemap tile for a given style and tile coordinates. Returns the tile URL when the tile is available.',
    annotations: {
      title: 'Basemap Tile',
      readOnlyHint: true,
      openWorldHint: true,
    },
    inputSchema: {
      type: 'object',
      properties: {
        version: {
          type: 'string',
          description: 'API version (default: v1)',
          default: 'v1',
        },
        styleBase: {
          type: 'string',
          description: 'The base style category (default: arcgis)',
          default: 'arcgis',
        },
        styleName: {
          type: 'string',
          description: 'Map style name (e.g., navigation, streets, outdoor)',
          default: 'navigation',
        },
        row: {
          type: 'integer',
          description: 'Tile row coordinate (first tile path segment)',
          minimum: 0,
          default: 17,
        },
        level: {
          type: 'integer',
          description: 'Zoom level (second tile path segment)',
          minimum: 0,
          default: 52333,
        },
        column: {
          type: 'integer',
          description: 'Tile column coordinate (third tile path segment)',
          minimum: 0,
          default: 22866,
        },
      },
    },
  },
  handler: async (args, ctx) => {
    const params = parseArgs(BasemapTileInputSchema, normalizeTileArgs(args));
    return toolSuccess(await getBasemapTile(ctx, params));
  },
};

export const basemapTools: ToolSpec[] = [getBasemapTileTool];
