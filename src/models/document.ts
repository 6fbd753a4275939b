/**
 * Document interfaces for the Gallica retrieval layer
 *
 * One DocumentRecord per SRU hit. Periodical issues are never merged into
 * their collection: each issue keeps its own ARK and issue date.
 */

/**
 * Normalized document kind
 */
export type DocumentKind =
  | 'monograph'
  | 'periodical-collection'
  | 'periodical-issue'
  | 'manuscript'
  | 'image'
  | 'map'
  | 'score'
  | 'other';

/**
 * Access-restriction category derived from dc:rights
 */
export type RightsClass = 'public-domain' | 'restricted' | 'unknown';

/**
 * Fields shared by every record shape
 */
interface DocumentRecordBase {
  /** ARK identifier, e.g. 'ark:/12148/bpt6k5619759j' */
  identifier: string;

  title: string;

  /** Viewer URL on gallica.bnf.fr */
  url: string;

  creators: string[];

  /** First dc:date value as published by the service */
  date: string | null;

  language: string | null;

  /** dc:type values exactly as returned */
  rawTypes: string[];

  rights: RightsClass;

  /** SRU recordPosition (1-based, across pages) */
  position: number | null;
}

/**
 * A single periodical issue (raw type "fascicule")
 */
export interface PeriodicalIssueRecord extends DocumentRecordBase {
  kind: 'periodical-issue';
  /** Publication date of this issue */
  issueDate: string | null;
}

/**
 * A periodical title as a whole (raw type "périodique")
 */
export interface PeriodicalCollectionRecord extends DocumentRecordBase {
  kind: 'periodical-collection';
  /** Years covered, parsed from a "YYYY-YYYY" date */
  coverage: { from: number | null; to: number | null } | null;
}

export interface GenericDocumentRecord extends DocumentRecordBase {
  kind: Exclude<DocumentKind, 'periodical-issue' | 'periodical-collection'>;
}

export type DocumentRecord = PeriodicalIssueRecord | PeriodicalCollectionRecord | GenericDocumentRecord;

/**
 * OCR excerpt returned by ContentSearch
 */
export interface Snippet {
  identifier: string;
  text: string;
  /** Raw page index from the service, e.g. 'PAG_200' */
  pageId: string | null;
  /** Page label derived from the page index, e.g. '200' */
  page: string | null;
}

/**
 * Plain OCR text held by the text cache
 */
export interface CachedText {
  identifier: string;
  text: string;
  /** True when served from the cache without a network call */
  fromCache: boolean;
  /** File holding the text, when the cache backend is file based */
  path: string | null;
}
