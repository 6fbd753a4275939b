/**
 * Gallica Document Tools
 *
 * Snippets inside one document, full text download into the text cache, and
 * windowed reads of cached text.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module tools/documents
 */

import { normalizeIdentifier } from '../services/gallica/index.js';
import { successResult } from '../server/types.js';
import { requireService } from '../server/state.js';
import {
  DownloadTextInput,
  ReadTextInput,
  SnippetsInput,
  validateInput,
} from '../utils/validation.js';
import { formatSnippet } from './format.js';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';

const PREVIEW_CHARS = 500;

// ═══════════════════════════════════════════════════════════════════════════════
// gallica_snippets
// ═══════════════════════════════════════════════════════════════════════════════

async function handleSnippets(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(SnippetsInput, params);
    const identifier = normalizeIdentifier(input.identifier);
    const snippets = await requireService().snippets(identifier, input.query);
    return formatResponse(
      successResult({
        identifier,
        count: snippets.length,
        snippets: snippets.map(formatSnippet),
        ...(snippets.length === 0 && {
          note: 'No matching passage, or the document has no searchable OCR text',
        }),
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// gallica_download_text
// ═══════════════════════════════════════════════════════════════════════════════

async function handleDownloadText(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(DownloadTextInput, params);
    const cached = await requireService().download(input.identifier);
    return formatResponse(
      successResult({
        identifier: cached.identifier,
        characters: cached.text.length,
        cached: cached.fromCache,
        path: cached.path,
        preview: cached.text.slice(0, PREVIEW_CHARS),
        next_steps: [
          { tool: 'gallica_read_text', description: 'Read the text in windows of characters' },
        ],
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// gallica_read_text
// ═══════════════════════════════════════════════════════════════════════════════

async function handleReadText(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ReadTextInput, params);
    const textWindow = await requireService().readText(input.identifier, input.offset, input.limit);
    return formatResponse(
      successResult({
        identifier: textWindow.identifier,
        offset: textWindow.offset,
        length: textWindow.length,
        total_characters: textWindow.totalCharacters,
        has_more: textWindow.hasMore,
        next_offset: textWindow.nextOffset,
        cached: textWindow.fromCache,
        text: textWindow.text,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

export const documentTools: Record<string, ToolDefinition> = {
  gallica_snippets: {
    description:
      'OCR passages of one Gallica document that match a query, with page numbers. Returns an empty list when the document has no searchable text.',
    inputSchema: SnippetsInput.shape,
    handler: handleSnippets,
  },
  gallica_download_text: {
    description:
      'Download the full OCR text of a Gallica document into the local text cache. Returns size, cache status and a preview.',
    inputSchema: DownloadTextInput.shape,
    handler: handleDownloadText,
  },
  gallica_read_text: {
    description:
      'Read a window of characters from a document\'s OCR text (downloads and caches it first if needed).',
    inputSchema: ReadTextInput.shape,
    handler: handleReadText,
  },
};
