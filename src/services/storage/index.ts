/**
 * Storage Module
 *
 * Text store backends for downloaded OCR text.
 */

import path from 'node:path';
import { FileTextStore } from './file-store.js';
import { SqliteTextStore } from './sqlite-store.js';
import type { TextStore } from './text-store.js';

export { FileTextStore } from './file-store.js';
export { MemoryTextStore } from './memory-store.js';
export { SqliteTextStore } from './sqlite-store.js';
export {
  StorageError,
  StorageErrorCode,
  storageKey,
  type TextStore,
  type TextStoreKind,
} from './text-store.js';

export const SQLITE_CACHE_FILENAME = 'texts.db';

/**
 * Open the configured backend. The sqlite backend keeps its database file
 * inside the cache directory.
 */
export function createTextStore(backend: 'files' | 'sqlite', directory: string): TextStore {
  if (backend === 'sqlite') {
    return new SqliteTextStore(path.join(directory, SQLITE_CACHE_FILENAME));
  }
  return new FileTextStore(directory);
}
