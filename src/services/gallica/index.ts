/**
 * Gallica retrieval layer - barrel export
 */

export {
  GALLICA_ENDPOINTS,
  MAX_PAGE_SIZE,
  CACHE_BACKENDS,
  GallicaConfigSchema,
  loadGallicaConfig,
  type CacheBackend,
  type GallicaConfig,
} from './config.js';
export {
  GallicaError,
  MalformedQueryError,
  InvalidIdentifierError,
  InvalidPageError,
  RemoteError,
  ParseError,
  SnippetUnavailableError,
  TimeoutError,
  type GallicaErrorCategory,
} from './errors.js';
export { extractArk, normalizeIdentifier, arkName } from './identifiers.js';
export {
  RequestRateLimiter,
  systemClock,
  type Clock,
  type RateLimiterConfig,
  type RateLimiterStatus,
} from './rate-limiter.js';
export { GallicaTransport, type FetchLike, type SearchRequest } from './transport.js';
export { normalizeResults, normalizeRecord, type NormalizedPage } from './normalizer.js';
export { SnippetFetcher } from './snippets.js';
export { TextCache } from './text-cache.js';
export {
  GallicaService,
  createGallicaService,
  DEFAULT_READ_LIMIT,
  DEFAULT_SNIPPETS_PER_DOCUMENT,
  type SearchOptions,
  type SnippetEnrichment,
  type TextWindow,
  type ServiceDependencies,
} from './service.js';
