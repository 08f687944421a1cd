import type { Db } from "./index";
import { CREATE_TABLES_SQL, CREATE_VIEWS_SQL } from "./schema";
import { logger } from "../logger";

interface Migration {
  id: string;
  description: string;
  sql: string;
}

const MIGRATIONS: Migration[] = [
  {
    id: "0001_init_schema",
    description: "Hotels, reviews, crawl tasks and run log",
    sql: CREATE_TABLES_SQL,
  },
  {
    id: "0002_progress_views",
    description: "Per-hotel review stats and per-region crawl progress views",
    sql: CREATE_VIEWS_SQL,
  },
];

function ensureMigrationTable(db: Db): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id TEXT PRIMARY KEY,
      description TEXT NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);
}

function isApplied(db: Db, id: string): boolean {
  const row = db
    .prepare<[string], { id: string }>(
      "SELECT id FROM _migrations WHERE id = ? LIMIT 1",
    )
    .get(id);
  return !!row;
}

export function runMigrations(db: Db): string[] {
  ensureMigrationTable(db);
  const applied: string[] = [];

  for (const migration of MIGRATIONS) {
    if (isApplied(db, migration.id)) {
      continue;
    }

    logger.info(`Applying migration ${migration.id}: ${migration.description}`);
    const apply = db.transaction(() => {
      db.exec(migration.sql);
      db.prepare("INSERT INTO _migrations (id, description) VALUES (?, ?)").run(
        migration.id,
        migration.description,
      );
    });

    try {
      apply();
      applied.push(migration.id);
      logger.info(`Applied migration ${migration.id}`);
    } catch (error) {
      logger.error(`Migration ${migration.id} failed:`, error);
      throw error;
    }
  }

  return applied;
}
