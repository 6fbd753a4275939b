/**
 * Gallica API Configuration
 *
 * Endpoints, shared rate limit, timeouts and text cache location.
 * Loaded from environment variables, validated with zod.
 */

import { z } from 'zod';

export const GALLICA_ENDPOINTS = {
  SRU: 'https://gallica.bnf.fr/SRU',
  CONTENT_SEARCH: 'https://gallica.bnf.fr/services/ContentSearch',
  TEXT_BASE: 'https://gallica.bnf.fr',
} as const;

/** Hard maximum of records per SRU page */
export const MAX_PAGE_SIZE = 50;

export const CACHE_BACKENDS = ['files', 'sqlite'] as const;

export type CacheBackend = (typeof CACHE_BACKENDS)[number];

export const GallicaConfigSchema = z.object({
  sruUrl: z.string().url().default(GALLICA_ENDPOINTS.SRU),
  contentSearchUrl: z.string().url().default(GALLICA_ENDPOINTS.CONTENT_SEARCH),
  textBaseUrl: z.string().url().default(GALLICA_ENDPOINTS.TEXT_BASE),

  // Shared by search, snippets and text downloads
  rateLimit: z
    .object({
      minIntervalMs: z.number().int().min(0).default(1000),
      maxConcurrent: z.number().int().min(1).max(10).default(1),
    })
    .default({}),

  /** Covers the rate limiter wait plus the HTTP round trip */
  requestTimeoutMs: z.number().int().min(1).default(30000),

  pageSize: z.number().int().min(1).max(MAX_PAGE_SIZE).default(MAX_PAGE_SIZE),

  cache: z
    .object({
      backend: z.enum(CACHE_BACKENDS).default('files'),
      directory: z.string().min(1).default('cache/gallica'),
    })
    .default({}),

  enableAdvancedSearch: z.boolean().default(false),
});

export type GallicaConfig = z.infer<typeof GallicaConfigSchema>;

function parseIntEnv(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return undefined;
  const parsed = parseInt(raw, 10);
  if (Number.isNaN(parsed)) {
    throw new Error(`Invalid numeric env var ${name}: "${raw}"`);
  }
  return parsed;
}

function parseBoolEnv(name: string): boolean | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return undefined;
  return ['1', 'true', 'yes', 'on'].includes(raw.trim().toLowerCase());
}

function parseBackendEnv(): CacheBackend | undefined {
  const raw = process.env.GALLICA_CACHE_BACKEND;
  if (raw === undefined || raw === '') return undefined;
  const parsed = z.enum(CACHE_BACKENDS).safeParse(raw.trim().toLowerCase());
  if (!parsed.success) {
    throw new Error(
      `Invalid GALLICA_CACHE_BACKEND: "${raw}". Expected one of: ${CACHE_BACKENDS.join(', ')}`
    );
  }
  return parsed.data;
}

/**
 * Load Gallica configuration from environment variables.
 *
 * Environment variables:
 *   GALLICA_SRU_URL, GALLICA_CONTENT_SEARCH_URL, GALLICA_TEXT_BASE_URL
 *   GALLICA_MIN_REQUEST_INTERVAL_MS (default: 1000)
 *   GALLICA_MAX_CONCURRENT          (default: 1)
 *   GALLICA_REQUEST_TIMEOUT_MS      (default: 30000)
 *   GALLICA_PAGE_SIZE               (default: 50, max 50)
 *   GALLICA_CACHE_BACKEND           files | sqlite (default: files)
 *   GALLICA_CACHE_DIR               (default: cache/gallica)
 *   GALLICA_ENABLE_ADVANCED_SEARCH  (default: false)
 */
export function loadGallicaConfig(overrides?: Partial<GallicaConfig>): GallicaConfig {
  const envConfig = {
    sruUrl: process.env.GALLICA_SRU_URL || undefined,
    contentSearchUrl: process.env.GALLICA_CONTENT_SEARCH_URL || undefined,
    textBaseUrl: process.env.GALLICA_TEXT_BASE_URL || undefined,
    rateLimit: {
      minIntervalMs: parseIntEnv('GALLICA_MIN_REQUEST_INTERVAL_MS'),
      maxConcurrent: parseIntEnv('GALLICA_MAX_CONCURRENT'),
    },
    requestTimeoutMs: parseIntEnv('GALLICA_REQUEST_TIMEOUT_MS'),
    pageSize: parseIntEnv('GALLICA_PAGE_SIZE'),
    cache: {
      backend: parseBackendEnv(),
      directory: process.env.GALLICA_CACHE_DIR || undefined,
    },
    enableAdvancedSearch: parseBoolEnv('GALLICA_ENABLE_ADVANCED_SEARCH'),
  };

  return GallicaConfigSchema.parse({ ...envConfig, ...overrides });
}
