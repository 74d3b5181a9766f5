/**
 * Schema migrations for the memory database.
 *
 * Several connections may open the same fresh file at once, so each
 * migration re-checks the applied version under the write lock and is
 * skipped when another connection got there first.
 */

import type { ModuleDatabase, ModuleMigration } from "@sovereign/shared";
import { migration001 } from "./001-initial.js";

export const migrations: ModuleMigration[] = [migration001];

export interface MigrationResult {
  applied: number;
  currentVersion: number;
}

export function getCurrentVersion(db: ModuleDatabase): number {
  const row = db.prepare("SELECT MAX(version) as v FROM _migrations").get() as
    | { v: number | null }
    | undefined;
  return row?.v ?? 0;
}

function applyMigration(db: ModuleDatabase, migration: ModuleMigration): boolean {
  const apply = db.transaction((): boolean => {
    if (getCurrentVersion(db) >= migration.version) return false;

    migration.up(db);
    db.prepare(
      "INSERT INTO _migrations (version, description, applied_at) VALUES (?, ?, ?)",
    ).run(migration.version, migration.description, new Date().toISOString());
    return true;
  });
  return apply.immediate();
}

/**
 * Bring the schema up to the newest version in `available`.
 * A failing migration is rolled back and its error rethrown; versions
 * before it stay applied.
 */
export function runMigrations(
  db: ModuleDatabase,
  available: ModuleMigration[],
  moduleId: string,
): MigrationResult {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      version INTEGER PRIMARY KEY,
      description TEXT NOT NULL,
      applied_at TEXT NOT NULL
    )
  `);

  // Unlocked read: an up-to-date file never takes the write lock.
  const seen = getCurrentVersion(db);
  const pending = [...available]
    .filter((m) => m.version > seen)
    .sort((a, b) => a.version - b.version);

  let applied = 0;
  for (const migration of pending) {
    let ran: boolean;
    try {
      ran = applyMigration(db, migration);
    } catch (err) {
      console.error(`[module:${moduleId}] Migration v${migration.version} failed:`, err);
      throw err;
    }
    if (!ran) continue;

    applied++;
    console.log(
      `[module:${moduleId}] Applied migration v${migration.version}: ${migration.description}`,
    );
  }

  return { applied, currentVersion: getCurrentVersion(db) };
}
