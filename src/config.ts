// ============================================================================
// Configuration
// ============================================================================
// Environment variables override ~/.arcgis-location-mcp/config.yaml, which
// overrides built-in defaults. A missing API key is not a startup error: the
// kernel rejects every tool call with a ConfigurationError instead.
// ============================================================================

import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import YAML from 'yaml';
import { z } from 'zod';
import { DEFAULT_SERVICE_URLS, type ServiceUrls } from './arcgis/endpoints.js';

export interface Config {
  env: string;
  apiKey: string;
  timeoutMs: number;
  userAgent: string;
  services: ServiceUrls;
  /** Path of the YAML file that was consulted (it may not exist) */
  configPath: string;
}

export const DEFAULT_TIMEOUT_MS = 30_000;
/** Longer values overflow setTimeout, which then fires immediately */
export const MAX_TIMEOUT_MS = 600_000;
export const USER_AGENT = 'arcgis-location-mcp/0.1';

// ============================================================================
// Config File
// ============================================================================

const FileConfigSchema = z.object({
  api_key: z.string().optional(),
  timeout_ms: z.number().int().positive().max(MAX_TIMEOUT_MS).optional(),
  services: z
    .object({
      geocode: z.string().url().optional(),
      places: z.string().url().optional(),
      routing: z.string().url().optional(),
      elevation: z.string().url().optional(),
      basemap: z.string().url().optional(),
    })
    .optional(),
});

export type FileConfig = z.infer<typeof FileConfigSchema>;

export function getConfigPath(): string {
  return process.env.ARCGIS_MCP_CONFIG || join(homedir(), '.arcgis-location-mcp', 'config.yaml');
}

/**
 * Read the YAML config file. Returns an empty config if the file doesn't
 * exist, can't be parsed, or fails validation.
 */
export function loadFileConfig(configPath: string = getConfigPath()): FileConfig {
  if (!existsSync(configPath)) {
    return {};
  }

  try {
    const parsed: unknown = YAML.parse(readFileSync(configPath, 'utf-8'));
    if (parsed === null || parsed === undefined) return {};

    const result = FileConfigSchema.safeParse(parsed);
    if (!result.success) {
      const issues = result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
      log(`Ignoring invalid config file ${configPath}: ${issues.join('; ')}`);
      return {};
    }
    return result.data;
  } catch (err) {
    log(`Failed to read config file ${configPath}: ${err instanceof Error ? err.message : String(err)}`);
    return {};
  }
}

function parseTimeout(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0 || value > MAX_TIMEOUT_MS) {
    log(`Ignoring ARCGIS_MCP_TIMEOUT_MS="${raw}": expected a positive integer up to ${MAX_TIMEOUT_MS}`);
    return undefined;
  }
  return value;
}

// ============================================================================
// Resolved Config
// ============================================================================

export function getConfig(): Config {
  const configPath = getConfigPath();
  const file = loadFileConfig(configPath);

  return {
    env: process.env.ARCGIS_MCP_ENV || 'dev',
    apiKey: process.env.ARCGIS_LOCATION_SERVICE_API_KEY?.trim() || file.api_key?.trim() || '',
    timeoutMs: parseTimeout(process.env.ARCGIS_MCP_TIMEOUT_MS) ?? file.timeout_ms ?? DEFAULT_TIMEOUT_MS,
    userAgent: USER_AGENT,
    services: {
      geocode: file.services?.geocode ?? DEFAULT_SERVICE_URLS.geocode,
      places: file.services?.places ?? DEFAULT_SERVICE_URLS.places,
      routing: file.services?.routing ?? DEFAULT_SERVICE_URLS.routing,
      elevation: file.services?.elevation ?? DEFAULT_SERVICE_URLS.elevation,
      basemap: file.services?.basemap ?? DEFAULT_SERVICE_URLS.basemap,
    },
    configPath,
  };
}

/**
 * Log to stderr in dev. stdout carries the MCP stream and must stay clean.
 */
export function log(message: string, ...args: unknown[]): void {
  const env = process.env.ARCGIS_MCP_ENV || 'dev';
  if (env === 'dev') {
    console.error(`[arcgis-mcp] ${message}`, ...args);
  }
}
