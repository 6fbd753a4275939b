/**
 * Startup Configuration
 *
 * Resolves the effective configuration from environment variables and
 * command-line flags before tools are registered.
 *
 * CRITICAL: NEVER use console.log() - stdout may be reserved for JSON-RPC protocol.
 *
 * @module server/startup
 */

import type { GallicaConfig } from '../services/gallica/config.js';
import { getConfig, setConfig } from './state.js';

export const ENABLE_ADVANCED_SEARCH_FLAG = '--enable-advanced-search';

/**
 * Load configuration, apply command-line flags and log the effective settings.
 *
 * @param argv - process arguments after the script name
 * @throws MCPError CONFIGURATION_ERROR when an env var is invalid
 */
export function loadStartupConfig(argv: string[]): GallicaConfig {
  const loaded = getConfig();
  const config = argv.includes(ENABLE_ADVANCED_SEARCH_FLAG)
    ? { ...loaded, enableAdvancedSearch: true }
    : loaded;
  setConfig(config);

  console.error(
    `[Config] SRU=${config.sruUrl} interval=${config.rateLimit.minIntervalMs}ms ` +
      `concurrency=${config.rateLimit.maxConcurrent} timeout=${config.requestTimeoutMs}ms ` +
      `page_size=${config.pageSize}`
  );
  console.error(`[Config] text cache: ${config.cache.backend} at ${config.cache.directory}`);
  if (config.enableAdvancedSearch) {
    console.error('[Config] advanced search enabled');
  }
  return config;
}
