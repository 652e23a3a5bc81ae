import { desc } from "drizzle-orm";
import { index, integer, sqliteTable, text } from "drizzle-orm/sqlite-core";

/**
 * Personal book catalog.
 * Records are never deleted; only `isRead` changes after insert.
 */
export const books = sqliteTable(
  "books",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    title: text("title").notNull(),
    author: text("author").notNull(),
    genre: text("genre").notNull(),
    year: integer("year").notNull(),
    isRead: integer("is_read", { mode: "boolean" }).default(false).notNull(),
  },
  (t) => [
    // Matches the list ordering: year DESC, title ASC
    index("books_year_title_idx").on(desc(t.year), t.title),
  ],
);

export type Book = typeof books.$inferSelect;
export type NewBookRow = typeof books.$inferInsert;
