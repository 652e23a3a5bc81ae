import type { Book } from "@server/db/schema";
import type { AppType } from "@server/index";
import type {
  CatalogTotals,
  ListBooksOptions,
  NewBook,
  ReadStatusUpdate,
} from "@server/lib/catalog";
import { hc, type ClientRequestOptions } from "hono/client";

export type CatalogClient = ReturnType<typeof hc<AppType>>;

/**
 * Error response from the catalog API, carrying the server's message.
 */
export class ApiError extends Error {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = "ApiError";
  }
}

export function createCatalogClient(
  baseUrl: string,
  options?: ClientRequestOptions,
): CatalogClient {
  return hc<AppType>(baseUrl, options);
}

async function toApiError(res: {
  status: number;
  statusText: string;
  json(): Promise<unknown>;
}): Promise<ApiError> {
  const body = await res.json().catch(() => null);
  const message =
    typeof body === "object" &&
    body !== null &&
    "error" in body &&
    typeof body.error === "string"
      ? body.error
      : res.statusText || `Request failed with status ${res.status}`;
  return new ApiError(res.status, message);
}

export async function fetchBooks(
  client: CatalogClient,
  { search, unreadOnly = false }: ListBooksOptions = {},
): Promise<Book[]> {
  const res = await client.api.books.$get({
    query: {
      search: search || undefined,
      unreadOnly: unreadOnly ? "true" : undefined,
    },
  });
  if (!res.ok) {
    throw await toApiError(res);
  }
  const data = await res.json();
  return data.books;
}

export async function createBook(
  client: CatalogClient,
  book: NewBook,
): Promise<Book> {
  const res = await client.api.books.$post({ json: book });
  if (!res.ok) {
    throw await toApiError(res);
  }
  const data = await res.json();
  return data.book;
}

export async function updateReadStatus(
  client: CatalogClient,
  updates: ReadStatusUpdate[],
): Promise<number> {
  const res = await client.api.books["read-status"].$patch({
    json: { updates },
  });
  if (!res.ok) {
    throw await toApiError(res);
  }
  const data = await res.json();
  return data.updated;
}

export async function fetchTotals(
  client: CatalogClient,
): Promise<CatalogTotals> {
  const res = await client.api.books.totals.$get();
  if (!res.ok) {
    throw await toApiError(res);
  }
  return await res.json();
}
