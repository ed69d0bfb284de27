import { describe, it, expect, vi, afterEach } from 'vitest';
import { ArcGISClient, translateFailure, type FetchLike } from '../../src/arcgis/client.js';
import { ConfigurationError, NetworkError, UpstreamError } from '../../src/arcgis/errors.js';
import { createStubFetch, hangingFetch, jsonResponse, type StubRoute } from '../utils/stub-fetch.js';

const GEOCODE_URL = 'https://geocode-api.arcgis.com/arcgis/rest/services/World/GeocodeServer/findAddressCandidates';

function createClient(route: StubRoute, apiKey = 'test-key') {
  const stub = createStubFetch(route);
  const client = new ArcGISClient({
    apiKey,
    timeoutMs: 1000,
    userAgent: 'arcgis-location-mcp/test',
    fetch: stub.fetch,
  });
  return { client, requests: stub.requests };
}

describe('ArcGISClient', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  describe('getJson', () => {
    it('should send f=json, the params and the token', async () => {
      const { client, requests } = createClient(() => jsonResponse({ ok: true }));

      const data = await client.getJson(GEOCODE_URL, { singleLine: 'Main St', maxLocations: 5, skipped: undefined });

      expect(data).toEqual({ ok: true });
      expect(requests).toHaveLength(1);
      const [request] = requests;
      expect(request.method).toBe('GET');
      expect(request.url.origin + request.url.pathname).toBe(GEOCODE_URL);
      expect(request.url.searchParams.get('f')).toBe('json');
      expect(request.url.searchParams.get('singleLine')).toBe('Main St');
      expect(request.url.searchParams.get('maxLocations')).toBe('5');
      expect(request.url.searchParams.has('skipped')).toBe(false);
      expect(request.url.searchParams.get('token')).toBe('test-key');
      expect(request.headers['accept']).toBe('application/json');
      expect(request.headers['user-agent']).toBe('arcgis-location-mcp/test');
    });

    it('should refuse to send anything without an API key', async () => {
      const { client, requests } = createClient(() => jsonResponse({}), '');

      await expect(client.getJson(GEOCODE_URL)).rejects.toThrow(ConfigurationError);
      expect(requests).toHaveLength(0);
    });

    it('should log the request with the token redacted', async () => {
      vi.stubEnv('ARCGIS_MCP_ENV', 'dev');
      const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
      const { client } = createClient(() => jsonResponse({}));

      await client.getJson(GEOCODE_URL, { outSR: 4326 });

      expect(spy).toHaveBeenCalledWith(
        '[arcgis-mcp] HTTP GET geocode-api.arcgis.com/arcgis/rest/services/World/GeocodeServer/findAddressCandidates?f=json&outSR=4326&token=......'
      );
      for (const call of spy.mock.calls) {
        expect(String(call[0])).not.toContain('test-key');
      }
    });

    it('should stay quiet outside dev', async () => {
      const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
      const { client } = createClient(() => jsonResponse({}));

      await client.getJson(GEOCODE_URL);

      expect(spy).not.toHaveBeenCalled();
    });
  });

  describe('postJson', () => {
    it('should send a JSON body', async () => {
      const { client, requests } = createClient(() => jsonResponse({ result: {} }));

      await client.postJson('https://elevation.example.test/at-many-points', { coordinates: [[1, 2]] });

      const [request] = requests;
      expect(request.method).toBe('POST');
      expect(request.body).toBe('{"coordinates":[[1,2]]}');
      expect(request.headers['content-type']).toBe('application/json');
      expect(request.url.searchParams.get('f')).toBe('json');
      expect(request.url.searchParams.get('token')).toBe('test-key');
    });
  });

  describe('head', () => {
    it('should return the status of a 2xx response', async () => {
      const { client, requests } = createClient(() => new Response(null, { status: 200 }));

      await expect(client.head('https://tiles.example.test/tile/1/2/3')).resolves.toBe(200);
      expect(requests[0].method).toBe('HEAD');
      expect(requests[0].url.searchParams.get('token')).toBe('test-key');
      expect(requests[0].url.searchParams.has('f')).toBe(false);
    });

    it('should throw on a non-2xx response', async () => {
      const { client } = createClient(() => new Response(null, { status: 404, statusText: 'Not Found' }));

      const error = await client.head('https://tiles.example.test/tile/1/2/3').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(UpstreamError);
      expect(error).toMatchObject({ message: 'HTTP 404: Not Found', status: 404, retryable: false });
    });
  });

  describe('failures', () => {
    it('should map an HTTP 500 to a retryable UpstreamError', async () => {
      const { client } = createClient(() => new Response('oops', { status: 500, statusText: 'Internal Server Error' }));

      const error = await client.getJson(GEOCODE_URL).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(UpstreamError);
      expect(error).toMatchObject({ message: 'HTTP 500: Internal Server Error', status: 500, retryable: true });
    });

    it('should read ArcGIS error bodies delivered with HTTP 200', async () => {
      const { client } = createClient(() =>
        jsonResponse({ error: { code: 400, message: 'Unable to complete operation.', details: ['Invalid stops.'] } })
      );

      const error = await client.getJson(GEOCODE_URL).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(UpstreamError);
      expect(error).toMatchObject({
        message: 'HTTP 400: Unable to complete operation. (Invalid stops.)',
        status: 400,
        retryable: false,
      });
    });

    it('should leave the status unset for an error body without a code', async () => {
      const { client } = createClient(() => jsonResponse({ error: { message: 'Unable to complete operation.' } }));

      const error = await client.getJson(GEOCODE_URL).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(UpstreamError);
      expect(error).toMatchObject({
        message: 'ArcGIS error: Unable to complete operation.',
        status: undefined,
        retryable: false,
      });
    });

    it('should treat a rejected token as a configuration problem', async () => {
      const { client } = createClient(() => jsonResponse({ error: { code: 498, message: 'Invalid token.', details: [] } }));

      const error = await client.getJson(GEOCODE_URL).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({ message: 'ArcGIS rejected the API key: Invalid token.', status: 498 });
    });

    it('should reject a body that is not a JSON object', async () => {
      const { client } = createClient(() => new Response('<html></html>', { status: 200 }));

      const error = await client.getJson(GEOCODE_URL).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(UpstreamError);
      expect(error).toMatchObject({ message: 'Invalid JSON response from ArcGIS API', status: undefined });
    });

    it('should report a timeout as a retryable NetworkError', async () => {
      const client = new ArcGISClient({
        apiKey: 'test-key',
        timeoutMs: 20,
        userAgent: 'arcgis-location-mcp/test',
        fetch: hangingFetch,
      });

      const error = await client.getJson(GEOCODE_URL).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(NetworkError);
      expect(error).toMatchObject({
        message: 'Request to geocode-api.arcgis.com timed out after 20ms',
        retryable: true,
      });
    });

    it('should cap a timeout too large for setTimeout', async () => {
      const slow: FetchLike = () =>
        new Promise<Response>(resolve => setTimeout(() => resolve(jsonResponse({ ok: true })), 50));
      const client = new ArcGISClient({
        apiKey: 'test-key',
        timeoutMs: 3_000_000_000,
        userAgent: 'arcgis-location-mcp/test',
        fetch: slow,
      });

      await expect(client.getJson(GEOCODE_URL)).resolves.toEqual({ ok: true });
    });

    it('should report transport failures as NetworkError', async () => {
      const failing: FetchLike = async () => {
        throw new TypeError('fetch failed');
      };
      const client = new ArcGISClient({
        apiKey: 'test-key',
        timeoutMs: 1000,
        userAgent: 'arcgis-location-mcp/test',
        fetch: failing,
      });

      await expect(client.getJson(GEOCODE_URL)).rejects.toThrow(
        'Request to geocode-api.arcgis.com failed: fetch failed'
      );
    });
  });
});

describe('translateFailure', () => {
  it('should fall back to the status text', () => {
    const error = translateFailure(502, 'Bad Gateway', undefined);

    expect(error).toBeInstanceOf(UpstreamError);
    expect(error.message).toBe('HTTP 502: Bad Gateway');
    expect(error.retryable).toBe(true);
  });

  it('should attach a hint when rate limited', () => {
    const error = translateFailure(429, 'Too Many Requests', undefined);

    expect(error.retryable).toBe(true);
    expect(error.hint).toBe('ArcGIS is rate limiting requests; wait before retrying.');
  });

  it('should let the ArcGIS error code override the HTTP status', () => {
    const error = translateFailure(200, 'OK', { error: { code: 499, message: 'Token Required' } });

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error.status).toBe(499);
  });
});
