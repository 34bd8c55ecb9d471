import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { describeError, StorageFailureError } from '../errors.js';
import type { Session } from '../log/types.js';
import { createLogger, NAMESPACES } from '../logging.js';
import { deserializeSession, serializeSession } from './sessionCodec.js';
import type { SessionStore } from './types.js';

const sqliteStoreLog = createLogger(NAMESPACES.storage.sqlite);

interface SessionRow {
  id: string;
  document: string;
}

/** Session documents kept as JSON text in a single `Sessions` table. */
export class SqliteSessionStore implements SessionStore {
  constructor(private readonly db: Database.Database) {
    db.exec(`
      CREATE TABLE IF NOT EXISTS Sessions (
        id TEXT PRIMARY KEY,
        document TEXT NOT NULL,
        updatedAt TEXT NOT NULL
      );
    `);
  }

  /** Open (or create) a database file; `:memory:` gives a throwaway store. */
  static open(dbPath: string): SqliteSessionStore {
    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }
    const db = new Database(dbPath);
    // WAL may be unavailable on some filesystems; the default journal still works.
    try {
      db.pragma('journal_mode = WAL');
    } catch (e) {
      sqliteStoreLog(`failed to enable WAL on ${dbPath}, continuing with default mode: ${describeError(e)}`);
    }
    return new SqliteSessionStore(db);
  }

  load(sessionId: string): Session | undefined {
    let row: SessionRow | undefined;
    try {
      row = this.db
        .prepare<[string], SessionRow>('SELECT id, document FROM Sessions WHERE id = ?')
        .get(sessionId);
    } catch (e) {
      throw new StorageFailureError(`Failed to query session ${sessionId}: ${describeError(e)}`, sessionId, e);
    }
    return row ? deserializeSession(row.document, sessionId) : undefined;
  }

  save(session: Session): void {
    try {
      this.db
        .prepare(
          `INSERT INTO Sessions (id, document, updatedAt) VALUES (?, ?, ?)
           ON CONFLICT(id) DO UPDATE SET document = excluded.document, updatedAt = excluded.updatedAt`
        )
        .run(session.id, serializeSession(session), new Date().toISOString());
      sqliteStoreLog(`saved session ${session.id}`);
    } catch (e) {
      throw new StorageFailureError(`Failed to save session ${session.id}: ${describeError(e)}`, session.id, e);
    }
  }

  list(): string[] {
    return this.db
      .prepare<[], { id: string }>('SELECT id FROM Sessions ORDER BY id')
      .all()
      .map((row) => row.id);
  }

  close(): void {
    this.db.close();
  }
}
