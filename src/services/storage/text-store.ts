/**
 * Text Store interfaces
 *
 * Persistent map from ARK identifier to plain OCR text. Backends: one file
 * per document (default), a SQLite table, or memory (tests).
 *
 * @module services/storage/text-store
 */

export type TextStoreKind = 'files' | 'sqlite' | 'memory';

export interface TextStore {
  readonly kind: TextStoreKind;

  /** Stored text, or null when the identifier was never stored */
  get(identifier: string): Promise<string | null>;

  /** Store text, replacing any previous value. Readers never see a partial write. */
  put(identifier: string, text: string): Promise<void>;

  /** Where the text for identifier lives on disk, when the backend has one file per entry */
  locate(identifier: string): string | null;

  close(): void;
}

export enum StorageErrorCode {
  OPEN_FAILED = 'OPEN_FAILED',
  READ_FAILED = 'READ_FAILED',
  WRITE_FAILED = 'WRITE_FAILED',
}

export class StorageError extends Error {
  constructor(
    message: string,
    public readonly code: StorageErrorCode,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'StorageError';
  }
}

/** Stable file-system-safe key: 'ark:/12148/bpt6k5619759j' -> '12148_bpt6k5619759j' */
export function storageKey(identifier: string): string {
  return identifier
    .replace(/^ark:\/*/, '')
    .replace(/[^A-Za-z0-9._~-]+/g, '_')
    .replace(/^[._]+/, '');
}
