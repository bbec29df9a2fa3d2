/**
 * Schema migrations.
 *
 * Migrations are plain SQL files under the top-level `migrations/`
 * directory, applied in file-name order.  A file may hold several
 * statements separated by `--> statement-breakpoint` lines.  Applied
 * migrations are recorded in the `_migrations` table, so running the
 * migrator again is a no-op.
 */

import { readdir, readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { getLogger } from "@logtape/logtape";
import { sql } from "drizzle-orm";
import { pgTable, text, timestamp } from "drizzle-orm/pg-core";
import type { Database } from "./db";

const logger = getLogger(["penpost", "migrate"]);

export const MIGRATIONS_DIR = fileURLToPath(
  new URL("../migrations/", import.meta.url),
);

const migrationsTable = pgTable("_migrations", {
  name: text("name").primaryKey(),
  applied: timestamp("applied", { withTimezone: true }).notNull().defaultNow(),
});

export interface Migration {
  name: string;
  statements: string[];
}

export function splitStatements(source: string): string[] {
  return source
    .split(/-->\s*statement-breakpoint/i)
    .map((chunk) => chunk.trim())
    .filter((chunk) => chunk !== "");
}

export async function loadMigrations(
  dir: string = MIGRATIONS_DIR,
): Promise<Migration[]> {
  const files = (await readdir(dir)).filter((f) => f.endsWith(".sql")).sort();
  const migrations: Migration[] = [];
  for (const name of files) {
    const source = await readFile(`${dir}/${name}`, "utf-8");
    migrations.push({ name, statements: splitStatements(source) });
  }
  return migrations;
}

async function ensureMigrationTable(db: Database): Promise<void> {
  await db.execute(sql`
    CREATE TABLE IF NOT EXISTS _migrations (
      name text PRIMARY KEY,
      applied timestamp with time zone DEFAULT now() NOT NULL
    )
  `);
}

async function getAppliedMigrations(db: Database): Promise<Set<string>> {
  const rows = await db
    .select({ name: migrationsTable.name })
    .from(migrationsTable);
  return new Set(rows.map((row) => row.name));
}

/**
 * Apply every migration that has not been applied yet.
 * @returns The names of the migrations applied by this call.
 */
export async function migrate(
  db: Database,
  migrations?: Migration[],
): Promise<string[]> {
  await ensureMigrationTable(db);
  const applied = await getAppliedMigrations(db);
  const pending = (migrations ?? (await loadMigrations())).filter(
    (m) => !applied.has(m.name),
  );
  for (const migration of pending) {
    logger.info("Applying migration {name}", { name: migration.name });
    await db.transaction(async (tx) => {
      for (const statement of migration.statements) {
        await tx.execute(sql.raw(statement));
      }
      await tx.insert(migrationsTable).values({ name: migration.name });
    });
  }
  if (pending.length < 1) logger.debug("Database schema is up to date");
  return pending.map((m) => m.name);
}
