/**
 * SQLite migrations runner.
 * Applies *.sql files from the migrations folder in name order, once each.
 */

import type Database from "better-sqlite3";
import { existsSync, readdirSync, readFileSync } from "node:fs";
import { join, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import { createLogger } from "../logger.js";

const logger = createLogger("Migrations");

/**
 * Runs all pending migrations from the migrations folder.
 * Returns the filenames applied by this call.
 */
export function runMigrations(
  db: Database.Database,
  migrationsDir: string
): string[] {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      filename TEXT PRIMARY KEY,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);

  const applied = new Set(
    db
      .prepare("SELECT filename FROM _migrations")
      .all()
      .map((row) => (row as { filename: string }).filename)
  );

  const files = readdirSync(migrationsDir)
    .filter((f) => f.endsWith(".sql"))
    .sort();

  const newlyApplied: string[] = [];
  for (const filename of files) {
    if (applied.has(filename)) {
      continue;
    }

    const sql = readFileSync(join(migrationsDir, filename), "utf-8");
    db.transaction(() => {
      db.exec(sql);
      db.prepare("INSERT INTO _migrations (filename) VALUES (?)").run(filename);
    })();

    newlyApplied.push(filename);
    logger.debug(`Applied migration: ${filename}`);
  }
  return newlyApplied;
}

/**
 * Gets the default migrations directory path.
 * Sources: src/db/migrations.ts -> ../../migrations
 * Build:   dist/packages/core/src/db/migrations.js -> packages/core/migrations
 */
export function getDefaultMigrationsDir(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  const sourcePath = join(here, "..", "..", "migrations");
  if (existsSync(sourcePath)) {
    return sourcePath;
  }
  return join(here, "..", "..", "..", "..", "..", "packages", "core", "migrations");
}
