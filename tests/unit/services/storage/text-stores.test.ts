/**
 * Unit tests for the text store backends
 *
 * @module tests/unit/services/storage/text-stores
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, readdirSync, writeFileSync, mkdirSync } from 'fs';
import { join } from 'path';
import Database from 'better-sqlite3';
import {
  FileTextStore,
  MemoryTextStore,
  SQLITE_CACHE_FILENAME,
  SqliteTextStore,
  StorageError,
  StorageErrorCode,
  createTextStore,
  storageKey,
} from '../../../../src/services/storage/index.js';
import { cleanupTempDir, createTempDir } from '../../../helpers/gallica.js';

describe('storageKey', () => {
  it('should drop the ark prefix and replace separators', () => {
    expect(storageKey('ark:/12148/bpt6k5619759j')).toBe('12148_bpt6k5619759j');
  });

  it('should keep a tilde so it never collides with an underscore', () => {
    expect(storageKey('ark:/12148/a~b')).toBe('12148_a~b');
    expect(storageKey('ark:/12148/a_b')).toBe('12148_a_b');
  });

  it('should never start with a dot', () => {
    expect(storageKey('../../etc/passwd')).toBe('etc_passwd');
  });
});

describe('MemoryTextStore', () => {
  it('should store, replace and clear entries', async () => {
    const store = new MemoryTextStore();
    await store.put('ark:/1/a', 'one');
    await store.put('ark:/1/a', 'two');

    expect(await store.get('ark:/1/a')).toBe('two');
    expect(await store.get('ark:/1/b')).toBeNull();
    expect(store.locate()).toBeNull();

    store.close();
    expect(store.size).toBe(0);
  });
});

describe('FileTextStore', () => {
  let dir: string;

  beforeEach(() => {
    dir = createTempDir();
  });

  afterEach(() => {
    cleanupTempDir(dir);
  });

  it('should return null for an unknown identifier', async () => {
    const store = new FileTextStore(dir);
    expect(await store.get('ark:/12148/none')).toBeNull();
  });

  it('should create the directory on first write', async () => {
    const nested = join(dir, 'a', 'b');
    const store = new FileTextStore(nested);

    await store.put('ark:/12148/x1', 'texte');

    expect(await store.get('ark:/12148/x1')).toBe('texte');
    expect(store.locate('ark:/12148/x1')).toBe(join(nested, '12148_x1.txt'));
  });

  it('should replace a previous value and leave no temporary file', async () => {
    const store = new FileTextStore(dir);

    await store.put('ark:/12148/x1', 'ancien');
    await store.put('ark:/12148/x1', 'nouveau');

    expect(await store.get('ark:/12148/x1')).toBe('nouveau');
    expect(readdirSync(dir)).toEqual(['12148_x1.txt']);
  });

  it('should keep UTF-8 text intact', async () => {
    const store = new FileTextStore(dir);
    const text = 'Éléments d’histoire naturelle\n\n<hr>\nfin';

    await store.put('ark:/12148/x2', text);

    expect(await store.get('ark:/12148/x2')).toBe(text);
  });

  it('should raise WRITE_FAILED when the target cannot be written', async () => {
    const store = new FileTextStore(dir);
    mkdirSync(store.locate('ark:/12148/x3'));

    const error = await store.put('ark:/12148/x3', 'texte').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(StorageError);
    if (error instanceof StorageError) {
      expect(error.code).toBe(StorageErrorCode.WRITE_FAILED);
    }
    expect(readdirSync(dir)).toEqual(['12148_x3.txt']);
  });

  it('should raise READ_FAILED when the entry is not a file', async () => {
    const store = new FileTextStore(dir);
    mkdirSync(store.locate('ark:/12148/x4'));

    const error = await store.get('ark:/12148/x4').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(StorageError);
    if (error instanceof StorageError) {
      expect(error.code).toBe(StorageErrorCode.READ_FAILED);
    }
  });
});

describe('SqliteTextStore', () => {
  let dir: string;

  beforeEach(() => {
    dir = createTempDir();
  });

  afterEach(() => {
    cleanupTempDir(dir);
  });

  it('should upsert and read back text', async () => {
    const store = new SqliteTextStore(join(dir, 'texts.db'));

    await store.put('ark:/12148/x1', 'ancien');
    await store.put('ark:/12148/x1', 'nouveau');

    expect(await store.get('ark:/12148/x1')).toBe('nouveau');
    expect(await store.get('ark:/12148/x2')).toBeNull();
    expect(store.locate()).toBeNull();
    store.close();
  });

  it('should record the character count', async () => {
    const location = join(dir, 'texts.db');
    const store = new SqliteTextStore(location);
    await store.put('ark:/12148/x1', 'abcdé');
    store.close();

    const db = new Database(location, { readonly: true });
    const row = db
      .prepare<[string], { characters: number }>('SELECT characters FROM cached_texts WHERE identifier = ?')
      .get('ark:/12148/x1');
    db.close();

    expect(row?.characters).toBe(5);
  });

  it('should persist across instances', async () => {
    const location = join(dir, 'nested', 'texts.db');
    const first = new SqliteTextStore(location);
    await first.put('ark:/12148/x1', 'texte');
    first.close();

    const second = new SqliteTextStore(location);
    expect(await second.get('ark:/12148/x1')).toBe('texte');
    second.close();
  });

  it('should tolerate a second close', () => {
    const store = new SqliteTextStore(':memory:');
    store.close();
    expect(() => store.close()).not.toThrow();
  });

  it('should raise OPEN_FAILED when the location is unusable', () => {
    const blocker = join(dir, 'blocker');
    writeFileSync(blocker, 'x');

    let caught: unknown;
    try {
      new SqliteTextStore(join(blocker, 'texts.db'));
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(StorageError);
    if (caught instanceof StorageError) {
      expect(caught.code).toBe(StorageErrorCode.OPEN_FAILED);
    }
  });
});

describe('createTextStore', () => {
  let dir: string;

  beforeEach(() => {
    dir = createTempDir();
  });

  afterEach(() => {
    cleanupTempDir(dir);
  });

  it('should open a file store by default backend name', () => {
    const store = createTextStore('files', dir);
    expect(store.kind).toBe('files');
  });

  it('should keep the sqlite database inside the cache directory', () => {
    const store = createTextStore('sqlite', dir);
    expect(store.kind).toBe('sqlite');
    expect(existsSync(join(dir, SQLITE_CACHE_FILENAME))).toBe(true);
    store.close();
  });
});
