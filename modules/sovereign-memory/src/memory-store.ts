/**
 * Topic-keyed memory store.
 *
 * One SQLite file holds a single `memories` table keyed by topic. The
 * connection is opened on first use (WAL mode, bounded busy wait) and reused
 * until close(). Every failure to reach the file surfaces as a
 * STORAGE_UNAVAILABLE MemoryStoreError.
 */

import Database from "better-sqlite3-multiple-ciphers";
import { dirname, resolve } from "node:path";
import { mkdirSync } from "node:fs";
import type { ForgetResult, MemoryEntry, RememberResult } from "@sovereign/shared";
import { isMemoryStoreError, storageUnavailable } from "./errors.js";
import { migrations, runMigrations } from "./migrations/index.js";
import { escapeLike, isWildcard, normalizeQuery, normalizeTopic } from "./topics.js";

export const DEFAULT_MAX_ENTRIES = 200;
export const MIN_MAX_ENTRIES = 10;
export const MAX_MAX_ENTRIES = 1000;
export const DEFAULT_BUSY_TIMEOUT_MS = 5000;
// Largest timeout the driver accepts
const MAX_BUSY_TIMEOUT_MS = 0x7fffffff;

export interface MemoryStoreOptions {
  /** Database file location; ":memory:" for a private in-memory database */
  dbPath: string;
  /** Entries kept before the oldest are pruned (clamped to 10–1000) */
  maxEntries?: number;
  /** How long a write waits on another connection's lock */
  busyTimeoutMs?: number;
  /** SQLCipher key; the file is unreadable without it */
  encryptionKey?: string;
  /** Tag used in migration log lines */
  moduleId?: string;
}

interface MemoryRow {
  topic: string;
  content: string;
  created_at: string;
  updated_at: string;
  revision: number;
}

const SELECT_COLUMNS = "topic, content, created_at, updated_at, revision";

export function clampMaxEntries(value: number): number {
  if (!Number.isFinite(value)) return DEFAULT_MAX_ENTRIES;
  return Math.min(MAX_MAX_ENTRIES, Math.max(MIN_MAX_ENTRIES, Math.floor(value)));
}

/** Whole milliseconds, never negative; the driver rejects anything else. */
export function clampBusyTimeout(value: number): number {
  if (!Number.isFinite(value)) return DEFAULT_BUSY_TIMEOUT_MS;
  return Math.min(MAX_BUSY_TIMEOUT_MS, Math.max(0, Math.floor(value)));
}

export class MemoryStore {
  readonly dbPath: string;
  readonly maxEntries: number;
  readonly busyTimeoutMs: number;
  private readonly encryptionKey: string | undefined;
  private readonly moduleId: string;
  private db: Database.Database | null = null;

  constructor(options: MemoryStoreOptions) {
    this.dbPath = options.dbPath === ":memory:" ? options.dbPath : resolve(options.dbPath);
    this.maxEntries = clampMaxEntries(options.maxEntries ?? DEFAULT_MAX_ENTRIES);
    this.busyTimeoutMs = clampBusyTimeout(options.busyTimeoutMs ?? DEFAULT_BUSY_TIMEOUT_MS);
    this.encryptionKey = options.encryptionKey || undefined;
    this.moduleId = options.moduleId ?? "sovereign-memory";
  }

  /** Insert a new entry or overwrite the existing one for this topic. */
  remember(topic: string, content: string): RememberResult {
    const key = normalizeTopic(topic);

    return this.withStorage("write", (db) => {
      const write = db.transaction((): RememberResult => {
        const now = new Date().toISOString();
        const existing = db
          .prepare("SELECT topic FROM memories WHERE topic = ?")
          .get(key);
        const { next } = db
          .prepare("SELECT COALESCE(MAX(revision), 0) + 1 AS next FROM memories")
          .get() as { next: number };

        db.prepare(
          `INSERT INTO memories (topic, content, created_at, updated_at, revision)
           VALUES (?, ?, ?, ?, ?)
           ON CONFLICT(topic) DO UPDATE SET
             content = excluded.content,
             updated_at = excluded.updated_at,
             revision = excluded.revision`,
        ).run(key, content, now, now, next);

        const pruned = this.prune(db);
        const row = db
          .prepare(`SELECT ${SELECT_COLUMNS} FROM memories WHERE topic = ?`)
          .get(key) as MemoryRow;

        return {
          action: existing ? "updated" : "stored",
          entry: rowToEntry(row),
          pruned,
        };
      });

      // Take the write lock up front so concurrent writers queue on the busy timeout
      return write.immediate();
    });
  }

  /**
   * Entries whose topic or content contains the query (case-insensitive),
   * an exact topic match first, then most recently written first.
   * "*" returns every entry.
   */
  recall(query: string): MemoryEntry[] {
    const q = normalizeQuery(query);

    return this.withStorage("read", (db) => {
      if (isWildcard(q)) {
        const rows = db
          .prepare(`SELECT ${SELECT_COLUMNS} FROM memories ORDER BY revision DESC`)
          .all() as MemoryRow[];
        return rows.map(rowToEntry);
      }

      const pattern = `%${escapeLike(q)}%`;
      const rows = db
        .prepare(
          `SELECT ${SELECT_COLUMNS} FROM memories
           WHERE topic LIKE ? ESCAPE '\\' OR content LIKE ? ESCAPE '\\'
           ORDER BY (topic = ? COLLATE NOCASE) DESC, revision DESC`,
        )
        .all(pattern, pattern, q) as MemoryRow[];
      return rows.map(rowToEntry);
    });
  }

  /** Ensure no entry exists for this topic. */
  forget(topic: string): ForgetResult {
    const key = normalizeTopic(topic);

    return this.withStorage("delete", (db) => {
      const result = db.prepare("DELETE FROM memories WHERE topic = ?").run(key);
      return { deleted: result.changes > 0 };
    });
  }

  /** Delete every entry. Returns how many were removed. */
  forgetAll(): number {
    return this.withStorage("delete", (db) => {
      return db.prepare("DELETE FROM memories").run().changes;
    });
  }

  count(): number {
    return this.withStorage("read", (db) => {
      const row = db
        .prepare("SELECT count(*) as c FROM memories")
        .get() as { c: number };
      return row.c;
    });
  }

  close(): void {
    if (!this.db) return;
    this.db.close();
    this.db = null;
  }

  // ─── Connection ──────────────────────────────────────────────

  private open(): Database.Database {
    if (this.db) return this.db;

    let db: Database.Database | null = null;
    try {
      if (this.dbPath !== ":memory:") {
        mkdirSync(dirname(this.dbPath), { recursive: true });
      }
      db = new Database(this.dbPath, { timeout: this.busyTimeoutMs });

      if (this.encryptionKey) {
        db.pragma(`key='${this.encryptionKey.replace(/'/g, "''")}'`);
      }
      db.pragma("journal_mode = WAL");

      runMigrations(db, migrations, this.moduleId);
    } catch (err) {
      db?.close();
      throw storageUnavailable(`Cannot open memory database at ${this.dbPath}`, err);
    }

    this.db = db;
    return db;
  }

  private withStorage<T>(operation: string, fn: (db: Database.Database) => T): T {
    const db = this.open();
    try {
      return fn(db);
    } catch (err) {
      if (isMemoryStoreError(err)) throw err;
      throw storageUnavailable(`Memory ${operation} failed`, err);
    }
  }

  /** Drop the oldest entries beyond maxEntries. Runs inside the write transaction. */
  private prune(db: Database.Database): number {
    const { c } = db
      .prepare("SELECT count(*) as c FROM memories")
      .get() as { c: number };
    if (c <= this.maxEntries) return 0;

    return db
      .prepare(
        `DELETE FROM memories WHERE topic IN (
           SELECT topic FROM memories ORDER BY revision ASC LIMIT ?
         )`,
      )
      .run(c - this.maxEntries).changes;
  }
}

function rowToEntry(row: MemoryRow): MemoryEntry {
  return {
    topic: row.topic,
    content: row.content,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    revision: row.revision,
  };
}
