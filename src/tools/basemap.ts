// ============================================================================
// Basemap Tiles
// ============================================================================
// Availability check for a static basemap tile. The tile bytes are not
// downloaded; a HEAD request confirms the tile exists for the style.
// ============================================================================

import { z } from 'zod';
import { joinUrl } from '../arcgis/endpoints.js';
import type { ToolContext } from './types.js';

const PATH_SEGMENT = /^[A-Za-z0-9_-]+$/;
const segment = (label: string) =>
  z.string().regex(PATH_SEGMENT, `${label} may only contain letters, digits, "-" and "_"`);
const tileIndex = z.number().int().nonnegative();

export const BasemapTileInputSchema = z.object({
  version: z.string().regex(/^v\d+$/, 'version must look like "v1"').default('v1'),
  styleBase: segment('styleBase').default('arcgis'),
  styleName: segment('styleName').default('navigation'),
  row: tileIndex.default(17),
  level: tileIndex.default(52333),
  column: tileIndex.default(22866),
});

export type BasemapTileInput = z.input<typeof BasemapTileInputSchema>;
export type BasemapTileParams = z.output<typeof BasemapTileInputSchema>;

export interface TileInfo {
  version: string;
  styleBase: string;
  styleName: string;
  row: number;
  level: number;
  column: number;
  /** Tile URL without credentials */
  url: string;
}

export interface TileResult {
  status: 'available';
  httpStatus: number;
  tileInfo: TileInfo;
}

/**
 * Accept the snake_case names older clients send.
 */
export function normalizeTileArgs(args: Record<string, unknown>): Record<string, unknown> {
  const normalized = { ...args };
  if (normalized.styleBase === undefined && normalized.style_base !== undefined) {
    normalized.styleBase = normalized.style_base;
  }
  if (normalized.styleName === undefined && normalized.style_name !== undefined) {
    normalized.styleName = normalized.style_name;
  }
  return normalized;
}

export function tileUrl(baseUrl: string, params: BasemapTileParams): string {
  return joinUrl(
    baseUrl,
    params.version,
    params.styleBase,
    params.styleName,
    'static',
    'tile',
    params.row,
    params.level,
    params.column
  );
}

export async function getBasemapTile(ctx: ToolContext, params: BasemapTileParams): Promise<TileResult> {
  const url = tileUrl(ctx.config.services.basemap, params);
  const httpStatus = await ctx.client.head(url);

  return {
    status: 'available',
    httpStatus,
    tileInfo: {
      version: params.version,
      styleBase: params.styleBase,
      styleName: params.styleName,
      row: params.row,
      level: params.level,
      column: params.column,
      url,
    },
  };
}
