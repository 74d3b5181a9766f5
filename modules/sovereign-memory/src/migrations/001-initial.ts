import type { ModuleMigration } from "@sovereign/shared";

export const migration001: ModuleMigration = {
  version: 1,
  description: "Create memories table",
  up(db) {
    db.exec(`
      CREATE TABLE IF NOT EXISTS memories (
        topic TEXT PRIMARY KEY,
        content TEXT NOT NULL,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        revision INTEGER NOT NULL
      )
    `);

    db.exec(`
      CREATE INDEX IF NOT EXISTS idx_memories_revision
      ON memories(revision)
    `);
  },
};
