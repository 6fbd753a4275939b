/**
 * Snippet Fetcher
 *
 * Retrieves OCR excerpts for one document through ContentSearch. A document
 * without searchable OCR yields SnippetUnavailableError; transport and parse
 * failures propagate unchanged.
 *
 * @module services/gallica/snippets
 */

import type { Snippet } from '../../models/document.js';
import { compileSnippetQuery } from '../query/index.js';
import { SnippetUnavailableError } from './errors.js';
import { excerptToText } from './html-text.js';
import { normalizeIdentifier } from './identifiers.js';
import type { GallicaTransport } from './transport.js';

/** 'PAG_200' -> '200'; anything else is passed through */
export function pageLabel(pageId: string | null): string | null {
  if (!pageId) return null;
  const match = /^PAG_(.+)$/i.exec(pageId);
  return match ? match[1] : pageId;
}

export class SnippetFetcher {
  constructor(private readonly transport: GallicaTransport) {}

  /**
   * Fetch excerpts matching the positive terms of queryText.
   *
   * @param limit - keep at most this many excerpts (service order)
   * @throws MalformedQueryError when queryText is invalid or has no positive term
   * @throws InvalidIdentifierError when identifier is not an ARK
   * @throws SnippetUnavailableError when the document has no searchable OCR
   */
  async fetchSnippets(identifier: string, queryText: string, limit?: number): Promise<Snippet[]> {
    const ark = normalizeIdentifier(identifier);
    const terms = compileSnippetQuery(queryText);

    const excerpts = await this.transport.fetchContentSearch(ark, terms);
    if (excerpts === null) {
      throw new SnippetUnavailableError(ark);
    }

    const snippets: Snippet[] = [];
    for (const excerpt of excerpts) {
      const text = excerptToText(excerpt.content);
      if (text.length === 0) continue;
      snippets.push({ identifier: ark, text, pageId: excerpt.pageId, page: pageLabel(excerpt.pageId) });
      if (limit !== undefined && snippets.length >= limit) break;
    }
    return snippets;
  }
}
