import path from "path";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@": path.resolve(__dirname, "./src"),
      "@server": path.resolve(__dirname, "./server"),
    },
  },
  test: {
    environment: "node",
    projects: [
      {
        extends: true,
        test: {
          name: "server",
          include: ["test/server/**/*.test.ts"],
        },
      },
      {
        extends: true,
        test: {
          name: "client",
          include: ["test/client/**/*.test.ts"],
        },
      },
    ],
  },
});
