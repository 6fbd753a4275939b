/**
 * Gallica Search Tools
 *
 * gallica_search (boolean/phrase text query) and gallica_advanced_search
 * (text query plus structured filters, registered only when enabled).
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module tools/search
 */

import type { SearchFilters, SearchResult } from '../models/index.js';
import type { GallicaService } from '../services/gallica/index.js';
import { successResult } from '../server/types.js';
import { requireService } from '../server/state.js';
import { AdvancedSearchInput, SearchInput, validateInput } from '../utils/validation.js';
import { formatSearchResult } from './format.js';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';

async function respond(
  service: GallicaService,
  result: SearchResult,
  queryText: string,
  includeSnippets: boolean
): Promise<ToolResponse> {
  const canHighlight = queryText.trim().length > 0;
  const enrichments =
    includeSnippets && canHighlight
      ? await service.enrichWithSnippets(result.records, queryText)
      : null;

  const first = result.records[0];
  return formatResponse(
    successResult({
      ...formatSearchResult(result, enrichments),
      ...(includeSnippets && !canHighlight && {
        snippets_skipped: 'Snippets need a text query with at least one positive term',
      }),
      next_steps: first
        ? [
            { tool: 'gallica_snippets', description: `Find passages in ${first.identifier}` },
            { tool: 'gallica_download_text', description: 'Download the full OCR text of a document' },
          ]
        : [{ tool: 'gallica_search', description: 'Broaden the query or try synonyms' }],
    })
  );
}

// ═══════════════════════════════════════════════════════════════════════════════
// gallica_search
// ═══════════════════════════════════════════════════════════════════════════════

async function handleSearch(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(SearchInput, params);
    const service = requireService();
    const result = await service.search(input.query, {}, { page: input.page });
    return await respond(service, result, input.query, input.include_snippets);
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// gallica_advanced_search
// ═══════════════════════════════════════════════════════════════════════════════

async function handleAdvancedSearch(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(AdvancedSearchInput, params);
    const filters: SearchFilters = {
      creators: input.creators,
      docTypes: input.doc_types,
      dateStart: input.date_start,
      dateEnd: input.date_end,
      language: input.language,
      title: input.title,
      publicDomainOnly: input.public_domain_only,
      exactSearch: input.exact_search,
      sort: input.sort,
    };

    const service = requireService();
    const result = await service.search(input.query, filters, {
      page: input.page,
      pageSize: input.page_size,
    });
    return await respond(service, result, input.query, input.include_snippets);
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

export const searchTools: Record<string, ToolDefinition> = {
  gallica_search: {
    description:
      'Full-text search of the Gallica digital library (BnF). Supports AND, OR, NOT (uppercase), parentheses and "exact phrases". Public-domain documents only.',
    inputSchema: SearchInput.shape,
    handler: handleSearch,
  },
};

export const advancedSearchTools: Record<string, ToolDefinition> = {
  gallica_advanced_search: {
    description:
      'Gallica search with filters: creators, document types, publication years, language, title words, rights, matching mode and sort order.',
    inputSchema: AdvancedSearchInput.shape,
    handler: handleAdvancedSearch,
  },
};
