import { drizzle, type SQLJsDatabase } from "drizzle-orm/sql-js";
import { existsSync, readFileSync, renameSync, writeFileSync } from "fs";
import initSqlJs, { type Database, type SqlJsStatic } from "sql.js";
import * as schema from "./schema";

export type CatalogDatabase = SQLJsDatabase<typeof schema> & {
  $client: Database;
  /** File the catalog is written back to; null for an in-memory catalog */
  $file: string | null;
};

export const IN_MEMORY_DATABASE = ":memory:";

let sqlJs: Promise<SqlJsStatic> | undefined;

function loadSqlJs(): Promise<SqlJsStatic> {
  sqlJs ??= initSqlJs();
  return sqlJs;
}

/**
 * Opens the catalog stored at `path` (or an empty one when the file does not
 * exist yet) and wraps it in a Drizzle handle. The database lives in memory;
 * saveDatabase writes it back to `path`.
 *
 * Registers `unicode_lower(text)`, backed by `String.prototype.toLowerCase`.
 * SQLite's own `lower()` and `LIKE` only fold ASCII, which leaves Cyrillic
 * and accented titles case-sensitive.
 */
export async function createDatabase(path: string): Promise<CatalogDatabase> {
  const SQL = await loadSqlJs();
  const file = path === IN_MEMORY_DATABASE ? null : path;

  const sqlite =
    file && existsSync(file)
      ? new SQL.Database(readFileSync(file))
      : new SQL.Database();

  sqlite.create_function("unicode_lower", (value: unknown) =>
    typeof value === "string" ? value.toLowerCase() : value,
  );

  return Object.assign(drizzle(sqlite, { schema }), {
    $client: sqlite,
    $file: file,
  });
}

/**
 * Writes the whole database image to its file. The image goes to a sibling
 * temp file first and is renamed over the old one.
 */
export function saveDatabase(db: CatalogDatabase): void {
  if (!db.$file) {
    return;
  }
  const tempFile = `${db.$file}.tmp`;
  writeFileSync(tempFile, db.$client.export());
  renameSync(tempFile, db.$file);
}

export function closeDatabase(db: CatalogDatabase): void {
  db.$client.close();
}
