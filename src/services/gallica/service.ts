/**
 * Gallica Service
 *
 * Facade used by the tool layer: search, snippets, text download and
 * windowed text reads. Owns the one RequestRateLimiter shared by every
 * outbound request.
 *
 * @module services/gallica/service
 */

import type {
  CachedText,
  DocumentRecord,
  SearchFilters,
  SearchResult,
  Snippet,
} from '../../models/index.js';
import { compileQuery } from '../query/index.js';
import { createTextStore } from '../storage/index.js';
import type { TextStore } from '../storage/text-store.js';
import type { GallicaConfig } from './config.js';
import { GallicaError, SnippetUnavailableError } from './errors.js';
import { normalizeResults } from './normalizer.js';
import { RequestRateLimiter, type Clock } from './rate-limiter.js';
import { SnippetFetcher } from './snippets.js';
import { TextCache } from './text-cache.js';
import { GallicaTransport, type FetchLike } from './transport.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export interface SearchOptions {
  page?: number;
  /** Defaults to config.pageSize */
  pageSize?: number;
}

/** Snippets for one search hit; error is set when that document's lookup failed */
export interface SnippetEnrichment {
  identifier: string;
  snippets: Snippet[];
  error: { category: string; message: string } | null;
}

export interface TextWindow {
  identifier: string;
  offset: number;
  /** Characters in this window */
  length: number;
  totalCharacters: number;
  hasMore: boolean;
  nextOffset: number | null;
  fromCache: boolean;
  text: string;
}

export interface ServiceDependencies {
  fetchImpl?: FetchLike;
  clock?: Clock;
  store?: TextStore;
}

export const DEFAULT_SNIPPETS_PER_DOCUMENT = 5;
export const DEFAULT_READ_LIMIT = 20000;

// ═══════════════════════════════════════════════════════════════════════════════
// SERVICE
// ═══════════════════════════════════════════════════════════════════════════════

export class GallicaService {
  readonly limiter: RequestRateLimiter;
  private readonly transport: GallicaTransport;
  private readonly snippetFetcher: SnippetFetcher;
  private readonly textCache: TextCache;
  private readonly store: TextStore;

  constructor(
    private readonly config: GallicaConfig,
    deps: ServiceDependencies = {}
  ) {
    this.limiter = new RequestRateLimiter({
      minIntervalMs: config.rateLimit.minIntervalMs,
      maxConcurrent: config.rateLimit.maxConcurrent,
      ...(deps.clock ? { clock: deps.clock } : {}),
    });
    this.transport = new GallicaTransport(config, this.limiter, deps.fetchImpl);
    this.store = deps.store ?? createTextStore(config.cache.backend, config.cache.directory);
    this.snippetFetcher = new SnippetFetcher(this.transport);
    this.textCache = new TextCache(this.transport, this.store);
  }

  /**
   * Compile, execute and normalize one page of results.
   *
   * @throws MalformedQueryError | InvalidPageError | RemoteError | ParseError | TimeoutError
   */
  async search(
    queryText: string,
    filters: SearchFilters = {},
    options: SearchOptions = {}
  ): Promise<SearchResult> {
    const expression = compileQuery(queryText, filters);
    const page = options.page ?? 1;
    const pageSize = options.pageSize ?? this.config.pageSize;

    const raw = await this.transport.execute(expression, { page, pageSize });
    const { records, skippedCount } = normalizeResults(raw);

    console.error(
      `[GallicaService] search page=${page} total=${raw.totalResults} ` +
        `returned=${records.length} skipped=${skippedCount}: ${expression.cql}`
    );

    return {
      page,
      pageSize,
      totalResults: raw.totalResults,
      skippedCount,
      expression: expression.cql,
      records,
    };
  }

  /**
   * OCR excerpts for one document. A document without searchable OCR gives [].
   */
  async snippets(identifier: string, queryText: string, limit?: number): Promise<Snippet[]> {
    try {
      return await this.snippetFetcher.fetchSnippets(identifier, queryText, limit);
    } catch (error) {
      if (error instanceof SnippetUnavailableError) {
        console.error(`[GallicaService] ${error.message}`);
        return [];
      }
      throw error;
    }
  }

  /**
   * Fetch snippets for every record, at most rateLimit.maxConcurrent at a time.
   * One failure never cancels the others; results keep record order.
   */
  async enrichWithSnippets(
    records: DocumentRecord[],
    queryText: string,
    maxPerDocument: number = DEFAULT_SNIPPETS_PER_DOCUMENT
  ): Promise<SnippetEnrichment[]> {
    const enrichments: SnippetEnrichment[] = [];
    const batchSize = this.config.rateLimit.maxConcurrent;

    // A request's timeout starts when it is issued, so only one batch may wait on the limiter
    for (let i = 0; i < records.length; i += batchSize) {
      const batch = records.slice(i, i + batchSize);
      const settled = await Promise.allSettled(
        batch.map((record) => this.snippets(record.identifier, queryText, maxPerDocument))
      );
      settled.forEach((outcome, index) => {
        enrichments.push(toEnrichment(batch[index].identifier, outcome));
      });
    }
    return enrichments;
  }

  /**
   * Plain text of a document, from the cache or downloaded and cached.
   */
  async download(identifier: string): Promise<CachedText> {
    const result = await this.textCache.getOrFetch(identifier);
    console.error(
      `[GallicaService] text ${result.identifier}: ${result.text.length} chars ` +
        `(${result.fromCache ? 'cache hit' : 'downloaded'})`
    );
    return result;
  }

  /**
   * Character window of a document's text; downloads on a cache miss.
   *
   * @throws RangeError when offset or limit is negative or not an integer
   */
  async readText(
    identifier: string,
    offset = 0,
    limit: number = DEFAULT_READ_LIMIT
  ): Promise<TextWindow> {
    if (!Number.isInteger(offset) || offset < 0) {
      throw new RangeError(`offset must be an integer >= 0, got ${offset}`);
    }
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`limit must be an integer >= 1, got ${limit}`);
    }

    const cached = await this.textCache.getOrFetch(identifier);
    const total = cached.text.length;
    const start = Math.min(offset, total);
    const text = cached.text.slice(start, start + limit);
    const end = start + text.length;

    return {
      identifier: cached.identifier,
      offset: start,
      length: text.length,
      totalCharacters: total,
      hasMore: end < total,
      nextOffset: end < total ? end : null,
      fromCache: cached.fromCache,
      text,
    };
  }

  close(): void {
    this.store.close();
  }
}

/**
 * Build a service from configuration
 */
export function createGallicaService(
  config: GallicaConfig,
  deps: ServiceDependencies = {}
): GallicaService {
  return new GallicaService(config, deps);
}

function toEnrichment(
  identifier: string,
  outcome: PromiseSettledResult<Snippet[]>
): SnippetEnrichment {
  if (outcome.status === 'fulfilled') {
    return { identifier, snippets: outcome.value, error: null };
  }
  const reason: unknown = outcome.reason;
  const error = {
    category: reason instanceof GallicaError ? reason.category : 'INTERNAL_ERROR',
    message: reason instanceof Error ? reason.message : String(reason),
  };
  console.error(`[GallicaService] Snippets failed for ${identifier}: ${error.message}`);
  return { identifier, snippets: [], error };
}
