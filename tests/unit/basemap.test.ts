import { describe, it, expect } from 'vitest';
import { createTestKernel, parseResult } from '../utils/test-context.js';
import { validArgs } from '../fixtures/payloads.js';
import type { TileResult } from '../../src/tools/basemap.js';
import type { StructuredError } from '../../src/arcgis/errors.js';

const BASEMAP_URL = 'https://static-map-tiles-api.arcgis.com/arcgis/rest/services/static-basemap-tiles-service';

describe('get_basemap_tile', () => {
  it('should check the default tile', async () => {
    const { kernel, requests } = createTestKernel(() => new Response(null, { status: 200 }));

    const data = parseResult<TileResult>(await kernel.dispatch('get_basemap_tile', validArgs.get_basemap_tile));

    const url = `${BASEMAP_URL}/v1/arcgis/navigation/static/tile/17/52333/22866`;
    expect(data).toEqual({
      status: 'available',
      httpStatus: 200,
      tileInfo: {
        version: 'v1',
        styleBase: 'arcgis',
        styleName: 'navigation',
        row: 17,
        level: 52333,
        column: 22866,
        url,
      },
    });
    expect(requests).toHaveLength(1);
    expect(requests[0].method).toBe('HEAD');
    expect(requests[0].url.origin + requests[0].url.pathname).toBe(url);
    expect(requests[0].url.searchParams.get('token')).toBe('test-key');
  });

  it('should accept snake_case style names', async () => {
    const { kernel, requests } = createTestKernel(() => new Response(null, { status: 200 }));

    const data = parseResult<TileResult>(
      await kernel.dispatch('get_basemap_tile', { style_base: 'open', style_name: 'streets', row: 1, level: 2, column: 3 })
    );

    expect(data.tileInfo.url).toBe(`${BASEMAP_URL}/v1/open/streets/static/tile/1/2/3`);
    expect(requests[0].url.pathname).toBe(
      '/arcgis/rest/services/static-basemap-tiles-service/v1/open/streets/static/tile/1/2/3'
    );
  });

  it('should report a missing tile as an upstream error', async () => {
    const { kernel } = createTestKernel();

    const result = await kernel.dispatch('get_basemap_tile', {});

    expect(result.isError).toBe(true);
    expect(parseResult<StructuredError>(result)).toEqual({
      success: false,
      tool: 'get_basemap_tile',
      kind: 'UpstreamError',
      error: 'HTTP 404: Not Found',
      status: 404,
      retryable: false,
    });
  });

  it('should reject style names that would change the path', async () => {
    const { kernel, requests } = createTestKernel();

    const error = parseResult<StructuredError>(
      await kernel.dispatch('get_basemap_tile', { styleName: '../admin' })
    );

    expect(error.kind).toBe('ValidationError');
    expect(error.error).toBe(
      'Invalid arguments: styleName: styleName may only contain letters, digits, "-" and "_"'
    );
    expect(requests).toHaveLength(0);
  });

  it('should reject negative tile indices', async () => {
    const { kernel } = createTestKernel();

    const error = parseResult<StructuredError>(await kernel.dispatch('get_basemap_tile', { row: -1 }));

    expect(error.error).toMatch(/^Invalid arguments: row: /);
  });
});
