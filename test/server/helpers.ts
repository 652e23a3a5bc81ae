import {
  createDatabase,
  IN_MEMORY_DATABASE,
  type CatalogDatabase,
} from "@server/db/client";
import { createApp } from "@server/index";
import { initializeCatalog } from "@server/lib/catalog";

/**
 * Opens a private in-memory catalog seeded with the sample books.
 * Sample ids are assigned in insertion order:
 * 1 "Под игото", 2 "Тютюн", 3 "Железният светилник", 4 "Бай Ганьо",
 * 5 "Време разделно".
 */
export async function createTestDatabase(): Promise<CatalogDatabase> {
  const db = await createDatabase(IN_MEMORY_DATABASE);
  await initializeCatalog(db);
  return db;
}

export async function createTestApp() {
  const db = await createTestDatabase();
  return { db, app: createApp(db) };
}

export function jsonRequest(method: string, body: unknown): RequestInit {
  return {
    method,
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  };
}
