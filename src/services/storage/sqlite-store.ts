/**
 * SQLite-backed TextStore
 *
 * Single table keyed by ARK. WAL mode so readers never block on a writer;
 * each put is one statement, which SQLite applies atomically.
 *
 * @module services/storage/sqlite-store
 */

import { mkdirSync } from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import { StorageError, StorageErrorCode, type TextStore } from './text-store.js';

const SCHEMA = `
CREATE TABLE IF NOT EXISTS cached_texts (
  identifier TEXT PRIMARY KEY,
  text TEXT NOT NULL,
  characters INTEGER NOT NULL,
  fetched_at TEXT NOT NULL
)`;

interface TextRow {
  text: string;
}

function openDatabase(location: string): Database.Database {
  try {
    if (location !== ':memory:') {
      mkdirSync(path.dirname(path.resolve(location)), { recursive: true });
    }
    const db = new Database(location);
    db.pragma('journal_mode = WAL');
    db.pragma('synchronous = NORMAL');
    db.exec(SCHEMA);
    return db;
  } catch (error) {
    throw new StorageError(
      `Failed to open text cache database ${location}: ${String(error)}`,
      StorageErrorCode.OPEN_FAILED,
      error
    );
  }
}

export class SqliteTextStore implements TextStore {
  readonly kind = 'sqlite' as const;
  private readonly db: Database.Database;
  private readonly selectStmt: Database.Statement<[string], TextRow>;
  private readonly upsertStmt: Database.Statement<[string, string, number, string]>;

  /** @param location - database file path, or ':memory:' */
  constructor(location: string) {
    this.db = openDatabase(location);
    this.selectStmt = this.db.prepare<[string], TextRow>(
      'SELECT text FROM cached_texts WHERE identifier = ?'
    );
    this.upsertStmt = this.db.prepare<[string, string, number, string]>(`
      INSERT INTO cached_texts (identifier, text, characters, fetched_at)
      VALUES (?, ?, ?, ?)
      ON CONFLICT(identifier) DO UPDATE SET
        text = excluded.text,
        characters = excluded.characters,
        fetched_at = excluded.fetched_at
    `);
  }

  async get(identifier: string): Promise<string | null> {
    try {
      return this.selectStmt.get(identifier)?.text ?? null;
    } catch (error) {
      throw new StorageError(
        `Failed to read cached text for ${identifier}: ${String(error)}`,
        StorageErrorCode.READ_FAILED,
        error
      );
    }
  }

  async put(identifier: string, text: string): Promise<void> {
    try {
      this.upsertStmt.run(identifier, text, text.length, new Date().toISOString());
    } catch (error) {
      throw new StorageError(
        `Failed to write cached text for ${identifier}: ${String(error)}`,
        StorageErrorCode.WRITE_FAILED,
        error
      );
    }
  }

  locate(): string | null {
    return null;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
