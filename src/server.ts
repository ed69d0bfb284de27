#!/usr/bin/env node

import { getConfig, log } from './config.js';
import { createKernel } from './kernel.js';
import { StdioAdapter } from './transports/index.js';

const config = getConfig();

log(`Starting ArcGIS Location Services MCP Server`);
log(`Environment: ${config.env}`);
log(`Config file: ${config.configPath}`);
log(`Request timeout: ${config.timeoutMs}ms`);
if (!config.apiKey) {
  log('WARNING: no API key configured; every tool call will return a ConfigurationError');
}

const kernel = createKernel({ config });
const adapter = new StdioAdapter();

async function shutdown(signal: string): Promise<void> {
  log(`Received ${signal}, shutting down`);
  try {
    await adapter.stop();
    process.exit(0);
  } catch (error) {
    console.error('Shutdown failed:', error);
    process.exit(1);
  }
}

async function main() {
  await adapter.start(kernel);
  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
