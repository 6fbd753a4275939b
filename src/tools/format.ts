/**
 * Tool response shaping: snake_case views of domain records
 *
 * @module tools/format
 */

import type { DocumentRecord, SearchResult, Snippet } from '../models/index.js';
import type { SnippetEnrichment } from '../services/gallica/index.js';

export function formatSnippet(snippet: Snippet): Record<string, unknown> {
  return {
    text: snippet.text,
    page: snippet.page,
    page_id: snippet.pageId,
  };
}

export function formatRecord(record: DocumentRecord): Record<string, unknown> {
  const base: Record<string, unknown> = {
    identifier: record.identifier,
    kind: record.kind,
    title: record.title,
    url: record.url,
    creators: record.creators,
    date: record.date,
    language: record.language,
    rights: record.rights,
    raw_types: record.rawTypes,
    position: record.position,
  };
  if (record.kind === 'periodical-issue') {
    base.issue_date = record.issueDate;
  } else if (record.kind === 'periodical-collection') {
    base.coverage = record.coverage;
  }
  return base;
}

/**
 * Search result with optional per-document snippets, in record order
 */
export function formatSearchResult(
  result: SearchResult,
  enrichments: SnippetEnrichment[] | null
): Record<string, unknown> {
  const byIdentifier = new Map((enrichments ?? []).map((e) => [e.identifier, e]));

  return {
    page: result.page,
    page_size: result.pageSize,
    total_results: result.totalResults,
    skipped_count: result.skippedCount,
    query: result.expression,
    documents: result.records.map((record) => {
      const formatted = formatRecord(record);
      const enrichment = byIdentifier.get(record.identifier);
      if (enrichment) {
        formatted.snippets = enrichment.snippets.map(formatSnippet);
        if (enrichment.error) {
          formatted.snippets_error = enrichment.error;
        }
      }
      return formatted;
    }),
  };
}
