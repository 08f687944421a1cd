import Database from "better-sqlite3";
import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { SCHEMA_VERSION } from "./schema";
import { runMigrations } from "./migrations";
import { getConfig } from "../config";
import { logger } from "../logger";

export type Db = Database.Database;

const EXPECTED_TABLES = [
  "crawl_logs",
  "crawl_tasks",
  "hotels",
  "review_images",
  "review_replies",
  "reviews",
  "run_log",
];

export function openDatabase(path: string): Db {
  if (path !== ":memory:") {
    const dataDir = dirname(path);
    if (!existsSync(dataDir)) {
      mkdirSync(dataDir, { recursive: true });
      logger.info(`Created data directory: ${dataDir}`);
    }
  }

  const db = new Database(path);

  // WAL for concurrent readers while the crawler writes
  db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");
  db.pragma("busy_timeout = 5000");

  return db;
}

let _db: Db | null = null;

/** Process-wide connection at DB_PATH, opened on first use. */
export function getDb(): Db {
  if (!_db) {
    _db = openDatabase(getConfig().env.dbPath);
  }
  return _db;
}

export function closeDatabase(): void {
  if (_db) {
    _db.close();
    _db = null;
  }
}

export function initializeDatabase(db: Db = getDb()): void {
  logger.info("Initializing database...");

  try {
    runMigrations(db);

    const tableNames = db
      .prepare<[], { name: string }>(
        "SELECT name FROM sqlite_master WHERE type='table' ORDER BY name",
      )
      .all()
      .map((t) => t.name)
      .filter((n) => n !== "sqlite_sequence" && n !== "_migrations");
    logger.info(
      `Database initialized with ${tableNames.length} tables: ${tableNames.join(", ")}`,
    );

    const missing = EXPECTED_TABLES.filter((t) => !tableNames.includes(t));
    if (missing.length > 0) {
      logger.warn(`Missing tables after migration: ${missing.join(", ")}`);
    }
  } catch (error) {
    logger.error("Failed to initialize database:", error);
    throw error;
  }
}

export function checkDatabaseIntegrity(
  db: Db = getDb(),
): { ok: boolean; result: string } {
  try {
    const result = db
      .prepare<[], { integrity_check: string }>("PRAGMA integrity_check")
      .get();
    const isOk = result?.integrity_check === "ok";

    if (!isOk) {
      logger.error(`Database integrity check FAILED: ${result?.integrity_check}`);
    } else {
      logger.info("Database integrity check passed");
    }

    return { ok: isOk, result: result?.integrity_check ?? "unknown" };
  } catch (error) {
    logger.error("Database integrity check threw error:", error);
    return { ok: false, result: String(error) };
  }
}

export function getDatabaseStats(db: Db = getDb()): Record<string, number> {
  const stats: Record<string, number> = {};

  for (const table of [...EXPECTED_TABLES, "_migrations"]) {
    try {
      const result = db
        .prepare<[], { count: number }>(`SELECT COUNT(*) as count FROM ${table}`)
        .get();
      stats[table] = result?.count ?? 0;
    } catch (error) {
      logger.debug(`Count failed for ${table}:`, error);
      stats[table] = -1; // Table doesn't exist
    }
  }

  return stats;
}

export function quickHealthCheck(db: Db = getDb()): boolean {
  try {
    const result = db.prepare<[], { ok: number }>("SELECT 1 as ok").get();
    return result?.ok === 1;
  } catch (error) {
    logger.error("Database health check failed:", error);
    return false;
  }
}

export { SCHEMA_VERSION };
