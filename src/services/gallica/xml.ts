/**
 * XML envelope parsing for Gallica responses
 *
 * SRU searchRetrieve envelopes become raw field-sets (one per record, Dublin
 * Core fields keyed by local name). ContentSearch envelopes become raw
 * excerpt items. Interpretation of the fields belongs to the normalizer.
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { ParseError } from './errors.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/** Field name (namespace prefix removed) to its text values, in document order */
export type FieldSet = Record<string, string[]>;

export interface RawRecord {
  /** srw:recordPosition */
  position: number | null;
  /** oai_dc:dc children; empty when the record carries no Dublin Core block */
  fields: FieldSet;
  /** srw:extraRecordData children (uri, link, thumbnail, ...) */
  extra: FieldSet;
}

export interface RawResultSet {
  totalResults: number;
  records: RawRecord[];
  /** srw:diagnostics messages; non-empty means the service rejected the request */
  diagnostics: string[];
}

export interface RawExcerpt {
  pageId: string | null;
  /** Inner markup of <content>, entities not yet decoded */
  content: string;
}

type XmlNode = Record<string, unknown>;

// ═══════════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

const parser = new XMLParser({
  ignoreAttributes: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
  removeNSPrefix: true,
  parseTagValue: false,
  trimValues: true,
  stopNodes: ['*.content'],
});

function isNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asArray(value: unknown): unknown[] {
  if (value === undefined || value === null) return [];
  return Array.isArray(value) ? value : [value];
}

function textOf(value: unknown): string | null {
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (isNode(value)) return textOf(value['#text']);
  return null;
}

function parseDocument(xml: string, what: string): XmlNode {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line } = validation.err;
    throw new ParseError(`Malformed ${what} XML (line ${line}): ${msg}`);
  }
  const parsed: unknown = parser.parse(xml);
  if (!isNode(parsed)) {
    throw new ParseError(`Empty ${what} response`);
  }
  return parsed;
}

function flattenFields(node: unknown): FieldSet {
  const fields: FieldSet = {};
  if (!isNode(node)) return fields;
  for (const [key, value] of Object.entries(node)) {
    if (key === '#text') continue;
    const values = asArray(value)
      .map(textOf)
      .filter((v): v is string => v !== null && v.length > 0);
    if (values.length > 0) {
      fields[key] = values;
    }
  }
  return fields;
}

function findAll(node: unknown, key: string, found: unknown[] = []): unknown[] {
  if (Array.isArray(node)) {
    for (const child of node) findAll(child, key, found);
  } else if (isNode(node)) {
    for (const [childKey, child] of Object.entries(node)) {
      if (childKey === key) {
        found.push(...asArray(child));
      } else {
        findAll(child, key, found);
      }
    }
  }
  return found;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SRU
// ═══════════════════════════════════════════════════════════════════════════════

function parsePosition(value: unknown): number | null {
  const text = textOf(value);
  if (!text) return null;
  const position = parseInt(text, 10);
  return Number.isNaN(position) ? null : position;
}

function parseRecord(entry: unknown): RawRecord {
  if (!isNode(entry)) {
    return { position: null, fields: {}, extra: {} };
  }
  const recordData = entry.recordData;
  return {
    position: parsePosition(entry.recordPosition),
    fields: isNode(recordData) ? flattenFields(recordData.dc) : {},
    extra: flattenFields(entry.extraRecordData),
  };
}

/**
 * Parse an SRU searchRetrieveResponse envelope.
 *
 * @throws ParseError when the XML is malformed or the root is not searchRetrieveResponse
 */
export function parseSearchResponse(xml: string): RawResultSet {
  const doc = parseDocument(xml, 'SRU');
  const root = doc.searchRetrieveResponse;
  if (!isNode(root)) {
    const found = Object.keys(doc).join(', ') || 'nothing';
    throw new ParseError(`Expected a searchRetrieveResponse root element, found: ${found}`);
  }

  const diagnostics = findAll(root.diagnostics, 'diagnostic').map((diagnostic) => {
    if (!isNode(diagnostic)) return textOf(diagnostic) ?? 'Unknown SRU diagnostic';
    const message = textOf(diagnostic.message) ?? 'Unknown SRU diagnostic';
    const details = textOf(diagnostic.details);
    return details ? `${message}: ${details}` : message;
  });

  const countText = textOf(root.numberOfRecords);
  const totalResults = countText ? parseInt(countText, 10) : 0;
  if (Number.isNaN(totalResults)) {
    throw new ParseError(`numberOfRecords is not a number: "${countText}"`);
  }

  const container = root.records;
  const records = isNode(container) ? asArray(container.record).map(parseRecord) : [];

  return { totalResults, records, diagnostics };
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONTENT SEARCH
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Parse a ContentSearch envelope into raw excerpts.
 * Returns null when the envelope is the service's error document.
 *
 * @throws ParseError when the XML is malformed or has an unexpected root
 */
export function parseContentSearchResponse(xml: string): RawExcerpt[] | null {
  const doc = parseDocument(xml, 'ContentSearch');
  if ('error' in doc) {
    return null;
  }
  if (!('results' in doc)) {
    const found = Object.keys(doc).join(', ') || 'nothing';
    throw new ParseError(`Expected a results root element, found: ${found}`);
  }

  const excerpts: RawExcerpt[] = [];
  for (const item of findAll(doc.results, 'item')) {
    if (!isNode(item)) continue;
    const content = item.content;
    if (typeof content !== 'string' || content.trim().length === 0) continue;
    excerpts.push({ pageId: textOf(item.p_id) || null, content });
  }
  return excerpts;
}
