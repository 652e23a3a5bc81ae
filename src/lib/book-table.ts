/**
 * Helpers for presenting catalog data in a table with summary metrics.
 */

import type { Book } from "@server/db/schema";
import type { CatalogTotals, ReadStatusUpdate } from "@server/lib/catalog";

export type ReadLabel = "Yes" | "No";

export interface BookRow {
  id: number;
  title: string;
  author: string;
  genre: string;
  year: number;
  read: ReadLabel;
}

export interface TotalsMetrics {
  total: string;
  read: string;
  progress: string;
}

export function toBookRows(books: Book[]): BookRow[] {
  return books.map((book) => ({
    id: book.id,
    title: book.title,
    author: book.author,
    genre: book.genre,
    year: book.year,
    read: book.isRead ? "Yes" : "No",
  }));
}

export function formatProgress(totals: CatalogTotals): string {
  return `${totals.progress}%`;
}

export function toTotalsMetrics(totals: CatalogTotals): TotalsMetrics {
  return {
    total: String(totals.total),
    read: String(totals.read),
    progress: formatProgress(totals),
  };
}

/**
 * Compares the read flags a table was rendered with against the edited ones
 * and returns only the ids whose flag changed.
 * Edits for ids that were not listed are ignored.
 */
export function diffReadStatus(
  listed: Pick<Book, "id" | "isRead">[],
  edited: ReadonlyMap<number, boolean>,
): ReadStatusUpdate[] {
  const updates: ReadStatusUpdate[] = [];
  for (const book of listed) {
    const isRead = edited.get(book.id);
    if (isRead !== undefined && isRead !== book.isRead) {
      updates.push({ id: book.id, isRead });
    }
  }
  return updates;
}
