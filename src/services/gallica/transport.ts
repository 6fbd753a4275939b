/**
 * Gallica HTTP Transport
 *
 * Every outbound request (SRU search, ContentSearch, texteBrut download)
 * goes through one shared RequestRateLimiter. The per-request timeout covers
 * the wait for a limiter slot plus the HTTP round trip.
 *
 * CRITICAL: NEVER use console.log() - stdout is JSON-RPC protocol.
 *
 * @module services/gallica/transport
 */

import type { CompiledExpression } from '../../models/search.js';
import { MAX_PAGE_SIZE, type GallicaConfig } from './config.js';
import { GallicaError, InvalidPageError, RemoteError, TimeoutError } from './errors.js';
import { arkName } from './identifiers.js';
import type { RequestRateLimiter } from './rate-limiter.js';
import {
  parseContentSearchResponse,
  parseSearchResponse,
  type RawExcerpt,
  type RawResultSet,
} from './xml.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export type TransportConfig = Pick<
  GallicaConfig,
  'sruUrl' | 'contentSearchUrl' | 'textBaseUrl' | 'requestTimeoutMs'
>;

export interface SearchRequest {
  /** 1-based page number */
  page: number;
  pageSize: number;
  /** Overrides config.requestTimeoutMs */
  timeoutMs?: number;
}

interface HttpResult {
  status: number;
  ok: boolean;
  body: string;
}

const SRU_VERSION = '1.2';

// ═══════════════════════════════════════════════════════════════════════════════
// TRANSPORT
// ═══════════════════════════════════════════════════════════════════════════════

export class GallicaTransport {
  private readonly fetchImpl: FetchLike;

  constructor(
    private readonly config: TransportConfig,
    private readonly limiter: RequestRateLimiter,
    fetchImpl?: FetchLike
  ) {
    this.fetchImpl = fetchImpl ?? ((url, init) => fetch(url, init));
  }

  /**
   * Run one SRU searchRetrieve request for a compiled expression.
   *
   * @throws InvalidPageError before any network activity when page/pageSize are out of range
   * @throws RemoteError on non-2xx status, network failure or SRU diagnostics
   * @throws ParseError when the envelope cannot be interpreted
   * @throws TimeoutError when the limiter wait plus the request exceed the timeout
   */
  async execute(expression: CompiledExpression, request: SearchRequest): Promise<RawResultSet> {
    const { page, pageSize } = request;
    if (!Number.isInteger(page) || page < 1) {
      throw new InvalidPageError(`page must be an integer >= 1, got ${page}`, page, pageSize);
    }
    if (!Number.isInteger(pageSize) || pageSize < 1 || pageSize > MAX_PAGE_SIZE) {
      throw new InvalidPageError(
        `page_size must be an integer between 1 and ${MAX_PAGE_SIZE}, got ${pageSize}`,
        page,
        pageSize
      );
    }

    const params = new URLSearchParams({
      version: SRU_VERSION,
      operation: 'searchRetrieve',
      query: expression.cql,
      startRecord: String((page - 1) * pageSize + 1),
      maximumRecords: String(pageSize),
      collapsing: 'false',
      exactSearch: String(expression.exactSearch),
    });

    const result = await this.get(`${this.config.sruUrl}?${params.toString()}`, request.timeoutMs);
    if (!result.ok) {
      throw new RemoteError(`Gallica SRU returned HTTP ${result.status}`, result.status, result.body);
    }

    const parsed = parseSearchResponse(result.body);
    if (parsed.diagnostics.length > 0) {
      throw new RemoteError(
        `Gallica SRU rejected the query: ${parsed.diagnostics.join('; ')}`,
        result.status,
        result.body
      );
    }
    return parsed;
  }

  /**
   * Ask ContentSearch for OCR excerpts matching terms inside one document.
   * Returns null when the document has no searchable OCR (HTTP 404 or the
   * service's error envelope).
   *
   * @throws RemoteError on other non-2xx status or network failure
   * @throws ParseError when the envelope cannot be interpreted
   */
  async fetchContentSearch(
    ark: string,
    terms: string,
    timeoutMs?: number
  ): Promise<RawExcerpt[] | null> {
    const params = new URLSearchParams({ ark: arkName(ark), query: terms });
    const result = await this.get(
      `${this.config.contentSearchUrl}?${params.toString()}`,
      timeoutMs
    );

    if (result.status === 404) {
      return null;
    }
    if (!result.ok) {
      throw new RemoteError(
        `Gallica ContentSearch returned HTTP ${result.status} for ${ark}`,
        result.status,
        result.body
      );
    }
    return parseContentSearchResponse(result.body);
  }

  /**
   * Download the texteBrut HTML page of a document.
   * Tries '<ark>.texteBrut' first, then '<ark>/texteBrut'.
   *
   * @throws RemoteError when every URL fails or returns an empty page
   * @throws TimeoutError when a request times out (no further URL is tried)
   */
  async fetchText(ark: string, timeoutMs?: number): Promise<string> {
    const base = this.config.textBaseUrl.replace(/\/+$/, '');
    const urls = [`${base}/${ark}.texteBrut`, `${base}/${ark}/texteBrut`];
    const failures: string[] = [];
    let last: HttpResult = { status: 0, ok: false, body: '' };

    for (const url of urls) {
      try {
        const result = await this.get(url, timeoutMs);
        if (result.ok && result.body.trim().length > 0) {
          return result.body;
        }
        last = result;
        failures.push(`${url} -> ${result.ok ? 'empty body' : `HTTP ${result.status}`}`);
      } catch (error) {
        if (!(error instanceof RemoteError)) throw error;
        last = { status: error.status, ok: false, body: error.body };
        failures.push(`${url} -> ${error.message}`);
      }
      console.error(`[GallicaTransport] texteBrut attempt failed: ${failures[failures.length - 1]}`);
    }

    throw new RemoteError(
      `Unable to download texteBrut for ${ark} (tried: ${failures.join('; ')})`,
      last.status,
      last.body
    );
  }

  /**
   * GET through the rate limiter with one deadline for queue wait + request.
   * Network failures become RemoteError with status 0.
   */
  private async get(url: string, timeoutMs?: number): Promise<HttpResult> {
    const timeout = timeoutMs ?? this.config.requestTimeoutMs;
    const controller = new AbortController();
    const timeoutId = setTimeout(
      () =>
        controller.abort(
          new TimeoutError(`Request to ${describeUrl(url)} timed out after ${timeout}ms`, timeout)
        ),
      timeout
    );

    try {
      return await this.limiter.run(async () => {
        const response = await this.fetchImpl(url, {
          method: 'GET',
          headers: { Accept: 'application/xml, text/xml, text/html;q=0.9, */*;q=0.8' },
          signal: controller.signal,
        });
        const body = await response.text();
        return { status: response.status, ok: response.ok, body };
      }, controller.signal);
    } catch (error) {
      if (controller.signal.aborted) {
        const reason: unknown = controller.signal.reason;
        throw reason instanceof TimeoutError
          ? reason
          : new TimeoutError(`Request to ${describeUrl(url)} was aborted`, timeout);
      }
      if (error instanceof GallicaError) throw error;
      const message = error instanceof Error ? error.message : String(error);
      throw new RemoteError(`Network error contacting ${describeUrl(url)}: ${message}`, 0, '');
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

function describeUrl(url: string): string {
  try {
    const parsed = new URL(url);
    return `${parsed.host}${parsed.pathname}`;
  } catch {
    return url;
  }
}
