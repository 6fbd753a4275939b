/**
 * Search request and result interfaces
 */

import type { DocumentRecord } from './document.js';

/**
 * Sort orders understood by the SRU endpoint
 */
export type SortOrder = 'relevance' | 'date_ascending' | 'date_descending';

/**
 * Structured filters combined (AND) with the text query.
 * Values inside creators and docTypes are OR-combined.
 */
export interface SearchFilters {
  creators?: string[];
  docTypes?: string[];
  /** Earliest publication year, inclusive */
  dateStart?: number;
  /** Latest publication year, inclusive */
  dateEnd?: number;
  /** ISO 639-2 code, e.g. 'fre' */
  language?: string;
  /** Words searched in titles only */
  title?: string;
  /** Default true */
  publicDomainOnly?: boolean;
  /** Default true. Bare terms use adjacency matching and fuzzy matching is disabled. */
  exactSearch?: boolean;
  /** Default 'relevance' */
  sort?: SortOrder;
}

/**
 * Formal CQL expression produced by the query compiler
 */
export interface CompiledExpression {
  readonly cql: string;
  readonly exactSearch: boolean;
}

/**
 * Normalized page of search results
 */
export interface SearchResult {
  page: number;
  pageSize: number;
  totalResults: number;
  /** Records dropped because they could not be interpreted */
  skippedCount: number;
  /** The CQL expression sent to the service */
  expression: string;
  records: DocumentRecord[];
}
