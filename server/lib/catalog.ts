import { saveDatabase, type CatalogDatabase } from "@server/db/client";
import { books, type Book, type NewBookRow } from "@server/db/schema";
import { and, asc, count, desc, eq, or, sql, type SQL } from "drizzle-orm";
import { z } from "zod";

export const DEFAULT_GENRE = "Unknown";
export const MIN_YEAR = 0;
export const MAX_YEAR = 3000;
export const MAX_READ_STATUS_UPDATES = 1000;

const TITLE_AUTHOR_REQUIRED = "Title and author are required.";
const YEAR_OUT_OF_RANGE = `Year must be a whole number between ${MIN_YEAR} and ${MAX_YEAR}.`;

/**
 * Records inserted into an empty catalog on first start.
 */
export const SAMPLE_BOOKS: NewBookRow[] = [
  {
    title: "Под игото",
    author: "Иван Вазов",
    genre: "Класика",
    year: 1894,
    isRead: true,
  },
  {
    title: "Тютюн",
    author: "Димитър Димов",
    genre: "Роман",
    year: 1951,
    isRead: false,
  },
  {
    title: "Железният светилник",
    author: "Димитър Талев",
    genre: "Исторически",
    year: 1952,
    isRead: false,
  },
  {
    title: "Бай Ганьо",
    author: "Алеко Константинов",
    genre: "Сатира",
    year: 1895,
    isRead: true,
  },
  {
    title: "Време разделно",
    author: "Антон Дончев",
    genre: "Исторически",
    year: 1964,
    isRead: false,
  },
];

// Zod schemas for validation
export const newBookSchema = z.object({
  title: z
    .string({ required_error: TITLE_AUTHOR_REQUIRED })
    .trim()
    .min(1, TITLE_AUTHOR_REQUIRED),
  author: z
    .string({ required_error: TITLE_AUTHOR_REQUIRED })
    .trim()
    .min(1, TITLE_AUTHOR_REQUIRED),
  genre: z
    .string()
    .optional()
    .transform((val) => val?.trim() || DEFAULT_GENRE),
  year: z
    .number({
      required_error: YEAR_OUT_OF_RANGE,
      invalid_type_error: YEAR_OUT_OF_RANGE,
    })
    .int(YEAR_OUT_OF_RANGE)
    .min(MIN_YEAR, YEAR_OUT_OF_RANGE)
    .max(MAX_YEAR, YEAR_OUT_OF_RANGE),
  isRead: z.boolean().default(false),
});

export const listBooksQuerySchema = z.object({
  search: z.string().optional(),
  unreadOnly: z
    .string()
    .optional()
    .transform((val) => val === "true" || val === "1"),
});

export const readStatusUpdateSchema = z.object({
  id: z.number().int().positive(),
  isRead: z.boolean(),
});

export const readStatusUpdatesSchema = z.object({
  updates: z
    .array(readStatusUpdateSchema)
    .max(
      MAX_READ_STATUS_UPDATES,
      `At most ${MAX_READ_STATUS_UPDATES} read-status updates per request.`,
    ),
});

export type NewBook = z.input<typeof newBookSchema>;
export type ReadStatusUpdate = z.infer<typeof readStatusUpdateSchema>;

export type ListBooksOptions = {
  search?: string;
  unreadOnly?: boolean;
};

export type CatalogTotals = {
  total: number;
  read: number;
  /** Whole percent of read books, rounded down; 0 for an empty catalog */
  progress: number;
};

/**
 * Thrown by the store when a record would break the title/author invariant.
 * Nothing is written when this is thrown.
 */
export class CatalogValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CatalogValidationError";
  }
}

/**
 * Creates the books table and index when missing, then seeds an empty table
 * with SAMPLE_BOOKS. Safe to call on every startup.
 *
 * @returns number of records seeded (0 when the table already had rows)
 */
export async function initializeCatalog(db: CatalogDatabase): Promise<number> {
  db.run(sql`
    CREATE TABLE IF NOT EXISTS books (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      title TEXT NOT NULL,
      author TEXT NOT NULL,
      genre TEXT NOT NULL,
      year INTEGER NOT NULL,
      is_read INTEGER NOT NULL DEFAULT 0
    )
  `);
  db.run(sql`
    CREATE INDEX IF NOT EXISTS books_year_title_idx ON books (year DESC, title)
  `);

  const [existing] = await db.select({ value: count() }).from(books);
  if (existing.value > 0) {
    return 0;
  }

  db.transaction((tx) => {
    tx.insert(books).values(SAMPLE_BOOKS).run();
  });
  saveDatabase(db);

  return SAMPLE_BOOKS.length;
}

/**
 * Inserts a new record. Text fields are trimmed and a blank genre becomes
 * DEFAULT_GENRE. Duplicate titles are allowed.
 */
export async function addBook(
  db: CatalogDatabase,
  input: NewBook,
): Promise<Book> {
  const parsed = newBookSchema.safeParse(input);
  if (!parsed.success) {
    throw new CatalogValidationError(
      parsed.error.issues[0]?.message ?? TITLE_AUTHOR_REQUIRED,
    );
  }

  const [book] = await db.insert(books).values(parsed.data).returning();
  saveDatabase(db);
  return book;
}

/**
 * Lists records ordered by year (newest first), then title.
 *
 * `search` matches a substring of title OR author, case-insensitively and
 * literally (`%` and `_` are plain characters). A blank search matches all.
 */
export async function listBooks(
  db: CatalogDatabase,
  { search, unreadOnly = false }: ListBooksOptions = {},
): Promise<Book[]> {
  const conditions: SQL[] = [];

  const needle = search?.trim().toLowerCase();
  if (needle) {
    const titleOrAuthor = or(
      sql`instr(unicode_lower(${books.title}), ${needle}) > 0`,
      sql`instr(unicode_lower(${books.author}), ${needle}) > 0`,
    );
    if (titleOrAuthor) {
      conditions.push(titleOrAuthor);
    }
  }

  if (unreadOnly) {
    conditions.push(eq(books.isRead, false));
  }

  return await db
    .select()
    .from(books)
    .where(and(...conditions))
    .orderBy(desc(books.year), asc(books.title));
}

/**
 * Sets `isRead` for each referenced id in a single transaction.
 * Ids with no record are skipped without error.
 *
 * @returns how many records matched an id
 */
export async function bulkUpdateReadStatus(
  db: CatalogDatabase,
  updates: ReadStatusUpdate[],
): Promise<{ updated: number }> {
  if (updates.length === 0) {
    return { updated: 0 };
  }

  const updated = db.transaction((tx) => {
    let matched = 0;
    for (const { id, isRead } of updates) {
      tx.update(books).set({ isRead }).where(eq(books.id, id)).run();
      matched += db.$client.getRowsModified();
    }
    return matched;
  });
  saveDatabase(db);

  return { updated };
}

export async function getTotals(db: CatalogDatabase): Promise<CatalogTotals> {
  const [row] = await db
    .select({
      total: count(),
      read: sql<number>`coalesce(sum(${books.isRead}), 0)`.mapWith(Number),
    })
    .from(books);

  const { total, read } = row;
  const progress = total > 0 ? Math.floor((read * 100) / total) : 0;

  return { total, read, progress };
}
