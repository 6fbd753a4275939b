/**
 * ARK identifier helpers
 */

import { InvalidIdentifierError } from './errors.js';

// A dot starts a qualifier ('.texteBrut', '.thumbnail'), not part of the name
const ARK_PATTERN = /ark:\/(\d+)\/([A-Za-z0-9_~-]+)/;

/**
 * Find the first ARK inside a string (URL, bare ARK, ARK with view suffix).
 * Returns the canonical form 'ark:/NAAN/name', or null.
 */
export function extractArk(text: string): string | null {
  const match = ARK_PATTERN.exec(text);
  return match ? `ark:/${match[1]}/${match[2]}` : null;
}

/**
 * Canonicalize caller input: 'ark:/12148/x', 'ark:12148/x', '12148/x',
 * or a gallica.bnf.fr URL all become 'ark:/12148/x'.
 *
 * @throws InvalidIdentifierError when no ARK can be recognized
 */
export function normalizeIdentifier(identifier: string): string {
  const trimmed = identifier.trim();
  const candidate = trimmed.includes('ark:')
    ? trimmed.replace(/ark:\/*/, 'ark:/')
    : `ark:/${trimmed.replace(/^\/+/, '')}`;
  const ark = extractArk(candidate);
  if (!ark) {
    throw new InvalidIdentifierError(identifier);
  }
  return ark;
}

/** Last ARK segment, the document id ContentSearch expects */
export function arkName(ark: string): string {
  const segments = ark.split('/');
  return segments[segments.length - 1];
}
