/**
 * MCP Server State Management
 *
 * Holds the one GallicaService shared by every tool call, so all outbound
 * requests go through a single rate limiter.
 *
 * @module server/state
 */

import { ZodError } from 'zod';
import {
  createGallicaService,
  loadGallicaConfig,
  type GallicaConfig,
  type GallicaService,
} from '../services/gallica/index.js';
import { configurationError } from './errors.js';
import type { ServerState } from './types.js';

export const state: ServerState = {
  config: null,
  service: null,
};

/**
 * Load configuration from the environment once.
 *
 * @throws MCPError CONFIGURATION_ERROR when an env var is invalid
 */
export function getConfig(): GallicaConfig {
  if (!state.config) {
    try {
      state.config = loadGallicaConfig();
    } catch (error) {
      const message =
        error instanceof ZodError
          ? error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ')
          : error instanceof Error
            ? error.message
            : String(error);
      throw configurationError(`Invalid Gallica configuration: ${message}`);
    }
  }
  return state.config;
}

/**
 * Use an explicit configuration (startup flags, tests)
 */
export function setConfig(config: GallicaConfig): void {
  state.config = config;
}

/**
 * Shared service, created on first use
 */
export function requireService(): GallicaService {
  if (!state.service) {
    state.service = createGallicaService(getConfig());
  }
  return state.service;
}

/**
 * Install a service built elsewhere (tests inject stubbed fetch and stores)
 */
export function setService(service: GallicaService): void {
  state.service?.close();
  state.service = service;
}

/**
 * Close the service and forget the configuration
 */
export function resetState(): void {
  state.service?.close();
  state.service = null;
  state.config = null;
}
