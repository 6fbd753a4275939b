/**
 * Text Cache
 *
 * Read-through cache of plain OCR text per document. A hit makes no network
 * call. A failed cache write is logged and the text is still returned.
 * Concurrent misses for one identifier may both download; the last write wins.
 *
 * @module services/gallica/text-cache
 */

import type { CachedText } from '../../models/document.js';
import type { TextStore } from '../storage/text-store.js';
import { ParseError } from './errors.js';
import { htmlToPlainText } from './html-text.js';
import { normalizeIdentifier } from './identifiers.js';
import type { GallicaTransport } from './transport.js';

export class TextCache {
  constructor(
    private readonly transport: GallicaTransport,
    private readonly store: TextStore
  ) {}

  /**
   * Return the plain text of a document, downloading it on a miss.
   *
   * @throws InvalidIdentifierError when identifier is not an ARK
   * @throws RemoteError | TimeoutError when the download fails
   * @throws ParseError when the downloaded page holds no text
   */
  async getOrFetch(identifier: string): Promise<CachedText> {
    const ark = normalizeIdentifier(identifier);

    const cached = await this.readCached(ark);
    if (cached !== null) {
      return { identifier: ark, text: cached, fromCache: true, path: this.store.locate(ark) };
    }

    const html = await this.transport.fetchText(ark);
    const text = htmlToPlainText(html);
    if (text.length === 0) {
      throw new ParseError(`texteBrut page for ${ark} contains no text`);
    }

    let stored = true;
    try {
      await this.store.put(ark, text);
    } catch (error) {
      stored = false;
      console.error(
        `[TextCache] Failed to cache text for ${ark}:`,
        error instanceof Error ? error.message : String(error)
      );
    }

    return { identifier: ark, text, fromCache: false, path: stored ? this.store.locate(ark) : null };
  }

  /** A read failure is treated as a miss */
  private async readCached(ark: string): Promise<string | null> {
    try {
      return await this.store.get(ark);
    } catch (error) {
      console.error(
        `[TextCache] Cache read failed for ${ark}, downloading instead:`,
        error instanceof Error ? error.message : String(error)
      );
      return null;
    }
  }
}
