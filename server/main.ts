import "dotenv/config";
import { serve } from "@hono/node-server";
import { closeDatabase, createDatabase } from "@server/db/client";
import { createApp } from "@server/index";
import { initializeCatalog } from "@server/lib/catalog";
import { loadConfig } from "@server/config";

async function main() {
  const config = loadConfig();
  const db = await createDatabase(config.databasePath);

  const seeded = await initializeCatalog(db);
  if (seeded > 0) {
    console.log(`Seeded ${seeded} sample books into ${config.databasePath}`);
  }

  const app = createApp(db, { logRequests: true });
  const server = serve(
    { fetch: app.fetch, port: config.port, hostname: config.host },
    (info) => {
      console.log(`Server running on http://${info.address}:${info.port}`);
    },
  );

  const shutdown = () => {
    server.close(() => {
      closeDatabase(db);
      process.exit(0);
    });
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((error: unknown) => {
  console.error("Failed to start server:", error);
  process.exit(1);
});
