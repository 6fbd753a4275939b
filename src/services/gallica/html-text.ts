/**
 * HTML to plain text for Gallica texteBrut pages and OCR excerpts
 */

import { decode } from 'html-entities';

const HR_MARKER = '\u0000HR\u0000';

/**
 * Convert a texteBrut HTML page into plain text.
 * Block elements and <br> become line breaks; <hr> page separators are kept
 * as a literal "<hr>" line; runs of blank lines collapse to one.
 */
export function htmlToPlainText(html: string): string {
  let text = html;

  text = text.replace(/<\s*br\s*\/?>/gi, '\n');
  text = text.replace(/<\s*hr\b[^>]*>/gi, `\n${HR_MARKER}\n`);
  text = text.replace(/<\/?\s*(p|div|section|article|li|h[1-6]|tr|td|table)\b[^>]*>/gi, '\n');

  text = text.replace(/<[^>]+>/g, '');
  text = decode(text);
  text = text.split(HR_MARKER).join('<hr>');
  text = text.replace(/\r/g, '');

  text = text.replace(/[\t\v\f\u00a0]+/g, ' ');
  text = text.replace(/ +\n/g, '\n');
  text = text.replace(/\n +/g, '\n');
  text = text.replace(/ {2,}/g, ' ');
  text = text.replace(/\n{3,}/g, '\n\n');

  return text.trim();
}

/**
 * Flatten an excerpt's markup (escaped or not) to one line of text
 */
export function excerptToText(markup: string): string {
  const withoutTags = markup.replace(/<[^>]+>/g, '');
  const decoded = decode(withoutTags).replace(/<[^>]+>/g, '');
  return decoded.replace(/\s+/g, ' ').trim();
}
