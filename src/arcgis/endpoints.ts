// ============================================================================
// ArcGIS Location Services Endpoints
// ============================================================================

export interface ServiceUrls {
  geocode: string;
  places: string;
  routing: string;
  elevation: string;
  basemap: string;
}

export const DEFAULT_SERVICE_URLS: ServiceUrls = {
  geocode: 'https://geocode-api.arcgis.com/arcgis/rest/services/World/GeocodeServer',
  places: 'https://places-api.arcgis.com/arcgis/rest/services/places-service/v1/places',
  routing: 'https://route-api.arcgis.com/arcgis/rest/services/World/Route/NAServer/Route_World',
  elevation: 'https://elevation-api.arcgis.com/arcgis/rest/services/elevation-service/v1/elevation',
  basemap: 'https://static-map-tiles-api.arcgis.com/arcgis/rest/services/static-basemap-tiles-service',
};

/**
 * Join a base URL and path segments, encoding each segment.
 */
export function joinUrl(base: string, ...segments: Array<string | number>): string {
  const trimmed = base.replace(/\/+$/, '');
  const path = segments.map(s => encodeURIComponent(String(s))).join('/');
  return path ? `${trimmed}/${path}` : trimmed;
}
