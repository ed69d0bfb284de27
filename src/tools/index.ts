// ============================================================================
// Tools Aggregator
// ============================================================================
// Central registry of all location tools, one domain per ArcGIS service.
// ============================================================================

import { ToolSpec } from './types.js';
import { geocodeTools } from './geocode/index.js';
import { placesTools } from './places/index.js';
import { routingTools } from './routing/index.js';
import { elevationTools } from './elevation/index.js';
import { basemapTools } from './basemap/index.js';

export const locationTools: ToolSpec[] = [
  ...geocodeTools,
  ...placesTools,
  ...routingTools,
  ...elevationTools,
  ...basemapTools,
];

export function getToolNames(): string[] {
  return locationTools.map(t => t.definition.name);
}
