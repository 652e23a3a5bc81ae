import { loadConfig } from "@server/config";
import { describe, expect, it } from "vitest";

describe("loadConfig()", () => {
  it("falls back to defaults", () => {
    expect(loadConfig({})).toEqual({
      databasePath: "books.db",
      port: 3000,
      host: "0.0.0.0",
    });
  });

  it("treats empty variables as unset", () => {
    expect(loadConfig({ DATABASE_PATH: "", PORT: "" })).toEqual({
      databasePath: "books.db",
      port: 3000,
      host: "0.0.0.0",
    });
  });

  it("reads overrides from the environment", () => {
    expect(
      loadConfig({
        DATABASE_PATH: "/var/lib/catalog/books.db",
        PORT: "8080",
        HOST: "127.0.0.1",
      }),
    ).toEqual({
      databasePath: "/var/lib/catalog/books.db",
      port: 8080,
      host: "127.0.0.1",
    });
  });

  it("rejects a non-numeric port", () => {
    expect(() => loadConfig({ PORT: "abc" })).toThrow(
      /^Invalid configuration: PORT: /,
    );
  });
});
