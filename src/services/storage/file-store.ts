/**
 * File-backed TextStore
 *
 * One UTF-8 .txt file per document under the cache directory. Writes go to a
 * temporary file renamed into place, so a reader sees either the old file,
 * the new one, or none.
 *
 * @module services/storage/file-store
 */

import { mkdir, readFile, rename, unlink, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { StorageError, StorageErrorCode, storageKey, type TextStore } from './text-store.js';

let tempCounter = 0;

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class FileTextStore implements TextStore {
  readonly kind = 'files' as const;
  readonly directory: string;

  constructor(directory: string) {
    this.directory = path.resolve(directory);
  }

  locate(identifier: string): string {
    return path.join(this.directory, `${storageKey(identifier)}.txt`);
  }

  async get(identifier: string): Promise<string | null> {
    const filePath = this.locate(identifier);
    try {
      return await readFile(filePath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) return null;
      throw new StorageError(
        `Failed to read cached text ${filePath}: ${String(error)}`,
        StorageErrorCode.READ_FAILED,
        error
      );
    }
  }

  async put(identifier: string, text: string): Promise<void> {
    const filePath = this.locate(identifier);
    const tempPath = `${filePath}.${process.pid}.${++tempCounter}.tmp`;
    try {
      await mkdir(this.directory, { recursive: true });
      await writeFile(tempPath, text, 'utf-8');
      await rename(tempPath, filePath);
    } catch (error) {
      await unlink(tempPath).catch((cleanupErr: unknown) => {
        if (!isNotFound(cleanupErr)) {
          console.error(
            '[FileTextStore] Failed to remove temporary file:',
            cleanupErr instanceof Error ? cleanupErr.message : String(cleanupErr)
          );
        }
      });
      throw new StorageError(
        `Failed to write cached text ${filePath}: ${String(error)}`,
        StorageErrorCode.WRITE_FAILED,
        error
      );
    }
  }

  close(): void {
    // nothing held open
  }
}
