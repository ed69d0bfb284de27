// ============================================================================
// ArcGIS REST Client
// ============================================================================
// Thin fetch wrapper shared by every tool. Adds the token and `f=json`,
// applies the per-request timeout, logs each request with the token
// redacted, and turns HTTP / ArcGIS error bodies into typed errors.
// ============================================================================

import { MAX_TIMEOUT_MS, log } from '../config.js';
import { ConfigurationError, NetworkError, UpstreamError, missingApiKeyError } from './errors.js';
import { isJsonObject, type JsonObject } from './json.js';

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export type QueryValue = string | number | boolean;
export type QueryParams = Record<string, QueryValue | undefined>;

export interface ArcGISClientOptions {
  apiKey: string;
  timeoutMs: number;
  userAgent: string;
  /** Defaults to the global fetch */
  fetch?: FetchLike;
}

const REDACTED = '......';

/** ArcGIS error codes that mean the token was missing, invalid, or expired. */
const TOKEN_ERROR_CODES = new Set([401, 498, 499]);

export class ArcGISClient {
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly userAgent: string;
  private readonly fetchImpl: FetchLike;

  constructor(options: ArcGISClientOptions) {
    this.apiKey = options.apiKey;
    this.timeoutMs = Math.min(options.timeoutMs, MAX_TIMEOUT_MS);
    this.userAgent = options.userAgent;
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
  }

  get hasApiKey(): boolean {
    return this.apiKey.length > 0;
  }

  /**
   * GET a JSON resource. `f=json` is added unless the caller sets `f`.
   */
  async getJson(url: string, params: QueryParams = {}): Promise<JsonObject> {
    const target = this.buildUrl(url, { f: 'json', ...params });
    return this.send('GET', target, { Accept: 'application/json' }, undefined, true);
  }

  /**
   * POST a JSON body. Only `f` and the token travel on the query string.
   */
  async postJson(url: string, body: JsonObject, params: QueryParams = {}): Promise<JsonObject> {
    const target = this.buildUrl(url, { f: 'json', ...params });
    return this.send(
      'POST',
      target,
      { Accept: 'application/json', 'Content-Type': 'application/json' },
      JSON.stringify(body),
      true
    );
  }

  /**
   * HEAD a resource (used for tile availability). Returns the status code of
   * a 2xx response; anything else throws.
   */
  async head(url: string): Promise<number> {
    const target = this.buildUrl(url, {});
    return this.send('HEAD', target, {}, undefined, false);
  }

  // ============================================================================
  // Private Helpers
  // ============================================================================

  private buildUrl(url: string, params: QueryParams): URL {
    if (!this.hasApiKey) {
      throw missingApiKeyError();
    }
    const target = new URL(url);
    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined) {
        target.searchParams.set(key, String(value));
      }
    }
    target.searchParams.set('token', this.apiKey);
    return target;
  }

  private describe(method: string, target: URL): string {
    const safe = new URL(target.toString());
    if (safe.searchParams.has('token')) {
      safe.searchParams.set('token', REDACTED);
    }
    return `${method} ${safe.host}${safe.pathname}${safe.search}`;
  }

  private send(method: 'HEAD', target: URL, headers: Record<string, string>, body: undefined, expectJson: false): Promise<number>;
  private send(method: 'GET' | 'POST', target: URL, headers: Record<string, string>, body: string | undefined, expectJson: true): Promise<JsonObject>;
  private async send(
    method: string,
    target: URL,
    headers: Record<string, string>,
    body: string | undefined,
    expectJson: boolean
  ): Promise<JsonObject | number> {
    log(`HTTP ${this.describe(method, target)}`);

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const res = await this.fetchImpl(target.toString(), {
        method,
        headers: { 'User-Agent': this.userAgent, ...headers },
        body,
        signal: controller.signal,
      });

      if (!res.ok) {
        const text = expectJson ? await res.text() : '';
        throw translateFailure(res.status, res.statusText, parseJson(text));
      }

      if (!expectJson) {
        return res.status;
      }

      const parsed = parseJson(await res.text());
      if (!isJsonObject(parsed)) {
        throw new UpstreamError('Invalid JSON response from ArcGIS API');
      }
      if (isJsonObject(parsed.error)) {
        // ArcGIS reports many failures as HTTP 200 with an error body
        throw translateFailure(res.status, res.statusText, parsed);
      }
      return parsed;
    } catch (err) {
      if (err instanceof ConfigurationError || err instanceof UpstreamError) {
        throw err;
      }
      if (controller.signal.aborted) {
        throw new NetworkError(`Request to ${target.host} timed out after ${this.timeoutMs}ms`);
      }
      throw new NetworkError(`Request to ${target.host} failed: ${err instanceof Error ? err.message : String(err)}`);
    } finally {
      clearTimeout(timeout);
    }
  }
}

function parseJson(text: string): unknown {
  if (!text) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Map an HTTP status and optional ArcGIS error body onto a typed error.
 * The ArcGIS error code, when present, takes precedence over the HTTP status.
 * An error body under a 2xx status without a code carries no status at all.
 */
export function translateFailure(
  httpStatus: number,
  statusText: string,
  body: unknown
): ConfigurationError | UpstreamError {
  let status: number | undefined = httpStatus >= 200 && httpStatus < 300 ? undefined : httpStatus;
  let message = statusText || `HTTP ${httpStatus}`;

  if (isJsonObject(body) && isJsonObject(body.error)) {
    const { code, message: errorMessage, details } = body.error;
    if (typeof code === 'number') status = code;
    if (typeof errorMessage === 'string' && errorMessage) message = errorMessage;
    if (Array.isArray(details)) {
      const extra = details.filter((d): d is string => typeof d === 'string' && d.length > 0);
      if (extra.length > 0) message = `${message} (${extra.join('; ')})`;
    }
  }

  if (status !== undefined && TOKEN_ERROR_CODES.has(status)) {
    return new ConfigurationError(`ArcGIS rejected the API key: ${message}`, {
      status,
      hint: 'Check that ARCGIS_LOCATION_SERVICE_API_KEY is valid and has access to this service.',
    });
  }

  const hint = status === 429 ? 'ArcGIS is rate limiting requests; wait before retrying.' : undefined;
  if (status === undefined) {
    return new UpstreamError(`ArcGIS error: ${message}`);
  }
  return new UpstreamError(`HTTP ${status}: ${message}`, status, hint);
}
