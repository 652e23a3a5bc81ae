import { zValidator } from "@hono/zod-validator";
import type { CatalogDatabase } from "@server/db/client";
import {
  addBook,
  bulkUpdateReadStatus,
  CatalogValidationError,
  getTotals,
  listBooks,
  listBooksQuerySchema,
  newBookSchema,
  readStatusUpdatesSchema,
} from "@server/lib/catalog";
import { Hono, type Context } from "hono";
import { HTTPException } from "hono/http-exception";
import { logger } from "hono/logger";
import type { ZodError } from "zod";

export type AppOptions = {
  /** Log one line per request through hono/logger */
  logRequests?: boolean;
};

// Turns a failed zod parse into the same 400 body the store's errors use
function rejectInvalid(
  result: { success: true } | { success: false; error: ZodError },
  c: Context,
) {
  if (!result.success) {
    const message = result.error.issues[0]?.message ?? "Invalid request";
    return c.json({ error: message }, 400);
  }
}

function createRoutes(db: CatalogDatabase) {
  return new Hono()
    .basePath("/api")
    .get("/health", (c) => {
      return c.json({ status: "ok" });
    })
    .get(
      "/books",
      zValidator("query", listBooksQuerySchema, rejectInvalid),
      async (c) => {
        const { search, unreadOnly } = c.req.valid("query");
        const books = await listBooks(db, { search, unreadOnly });
        return c.json({ books });
      },
    )
    .post(
      "/books",
      zValidator("json", newBookSchema, rejectInvalid),
      async (c) => {
        const book = await addBook(db, c.req.valid("json"));
        return c.json({ book }, 201);
      },
    )
    .patch(
      "/books/read-status",
      zValidator("json", readStatusUpdatesSchema, rejectInvalid),
      async (c) => {
        const { updates } = c.req.valid("json");
        const result = await bulkUpdateReadStatus(db, updates);
        return c.json(result);
      },
    )
    .get("/books/totals", async (c) => {
      const totals = await getTotals(db);
      return c.json(totals);
    });
}

/**
 * Builds the HTTP API over an opened catalog database.
 * The caller is responsible for running initializeCatalog first.
 */
export function createApp(db: CatalogDatabase, options: AppOptions = {}) {
  const app = new Hono();

  if (options.logRequests) {
    app.use("*", logger());
  }

  app.route("/", createRoutes(db));

  app.notFound((c) => c.json({ error: "Not found" }, 404));

  app.onError((err, c) => {
    if (err instanceof CatalogValidationError) {
      return c.json({ error: err.message }, 400);
    }
    if (err instanceof HTTPException) {
      return c.json({ error: err.message }, err.status);
    }
    console.error("Unhandled error:", err);
    return c.json({ error: "Internal server error" }, 500);
  });

  return app;
}

// Export type for client-side type inference
export type AppType = ReturnType<typeof createRoutes>;
