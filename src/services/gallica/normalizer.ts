/**
 * Result Normalizer
 *
 * Turns raw SRU field-sets into typed DocumentRecords. One record per raw
 * entry, in service order; issues of one periodical stay distinct. An entry
 * without a recognizable ARK is skipped and counted, never fatal.
 *
 * @module services/gallica/normalizer
 */

import type { DocumentKind, DocumentRecord, RightsClass } from '../../models/document.js';
import { extractArk } from './identifiers.js';
import type { FieldSet, RawRecord, RawResultSet } from './xml.js';

export interface NormalizedPage {
  records: DocumentRecord[];
  skippedCount: number;
}

const VIEWER_BASE = 'https://gallica.bnf.fr';

/** Folded dc:type value to kind; keys are lowercase without accents */
const TYPE_KINDS: ReadonlyArray<[string, DocumentKind]> = [
  ['fascicule', 'periodical-issue'],
  ['periodical issue', 'periodical-issue'],
  ['periodique', 'periodical-collection'],
  ['serial', 'periodical-collection'],
  ['periodical', 'periodical-collection'],
  ['monographie', 'monograph'],
  ['printed monograph', 'monograph'],
  ['monograph', 'monograph'],
  ['manuscrit', 'manuscript'],
  ['manuscript', 'manuscript'],
  ['image fixe', 'image'],
  ['image', 'image'],
  ['still image', 'image'],
  ['carte', 'map'],
  ['cartographic material', 'map'],
  ['map', 'map'],
  ['partition', 'score'],
  ['notated music', 'score'],
  ['score', 'score'],
];

function fold(value: string): string {
  return value
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .trim();
}

function first(fields: FieldSet, key: string): string | null {
  return fields[key]?.[0] ?? null;
}

/**
 * First dc:type that maps to a known kind wins. Gallica often sends both a
 * French and an English value ("monographie imprimée", "printed monograph").
 */
export function classifyKind(rawTypes: string[]): DocumentKind {
  for (const raw of rawTypes) {
    const folded = fold(raw);
    for (const [prefix, kind] of TYPE_KINDS) {
      if (folded === prefix || folded.startsWith(`${prefix} `)) {
        return kind;
      }
    }
  }
  return 'other';
}

export function classifyRights(values: string[]): RightsClass {
  let restricted = false;
  for (const value of values) {
    const folded = fold(value);
    if (folded.includes('domaine public') || folded.includes('public domain')) {
      return 'public-domain';
    }
    if (folded.includes('restricted') || folded.includes('conditions') || folded.includes('restreint')) {
      restricted = true;
    }
  }
  return restricted ? 'restricted' : 'unknown';
}

/** "1880-1914" -> { from: 1880, to: 1914 }; open ends are null */
export function parseCoverage(date: string | null): { from: number | null; to: number | null } | null {
  if (!date) return null;
  const match = /^\s*(\d{4})?\s*-\s*(\d{4})?\s*$/.exec(date);
  if (!match || (match[1] === undefined && match[2] === undefined)) return null;
  return {
    from: match[1] === undefined ? null : parseInt(match[1], 10),
    to: match[2] === undefined ? null : parseInt(match[2], 10),
  };
}

/**
 * Normalize one raw entry. Returns null when the entry has no Dublin Core
 * block or no ARK.
 */
export function normalizeRecord(raw: RawRecord): DocumentRecord | null {
  const fields = raw.fields;
  if (Object.keys(fields).length === 0) return null;

  const identifier =
    (fields.identifier ?? []).map(extractArk).find((ark): ark is string => ark !== null) ??
    (raw.extra.uri ?? []).map(extractArk).find((ark): ark is string => ark !== null);
  if (!identifier) return null;

  const rawTypes = fields.type ?? [];
  const date = first(fields, 'date');
  const base = {
    identifier,
    title: first(fields, 'title') ?? 'Untitled',
    url: `${VIEWER_BASE}/${identifier}`,
    creators: fields.creator ?? [],
    date,
    language: first(fields, 'language'),
    rawTypes,
    rights: classifyRights(fields.rights ?? []),
    position: raw.position,
  };

  const kind = classifyKind(rawTypes);
  switch (kind) {
    case 'periodical-issue':
      return { ...base, kind, issueDate: date };
    case 'periodical-collection':
      return { ...base, kind, coverage: parseCoverage(date) };
    default:
      return { ...base, kind };
  }
}

/**
 * Normalize every entry of a result set, in order
 */
export function normalizeResults(raw: RawResultSet): NormalizedPage {
  const records: DocumentRecord[] = [];
  let skippedCount = 0;

  for (const entry of raw.records) {
    const record = normalizeRecord(entry);
    if (record) {
      records.push(record);
    } else {
      skippedCount++;
      console.error(
        `[GallicaNormalizer] Skipped record at position ${entry.position ?? '?'}: ` +
          (Object.keys(entry.fields).length === 0 ? 'no Dublin Core data' : 'no ARK identifier')
      );
    }
  }

  return { records, skippedCount };
}
