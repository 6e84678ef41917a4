import fs from "node:fs";
import path from "node:path";
import { openDatabase } from "@/db/database";
import { ExpenseStore } from "@/db/expenseStore";
import { loadConfig } from "@/lib/config";
import { createApp } from "@/server/app";

async function main() {
  const config = loadConfig();

  // One-time bootstrap; request handling never touches the filesystem layout.
  const staticDir = path.resolve(config.staticDir);
  fs.mkdirSync(staticDir, { recursive: true });

  const store = new ExpenseStore(await openDatabase(config.databasePath));
  store.initialize();
  console.info(`[db] Using ${path.resolve(config.databasePath)}`);

  const app = createApp({
    store,
    staticDir,
    timeZone: config.timeZone,
    requestLog: config.requestLog,
  });

  const server = app.listen(config.port, config.host, () => {
    console.info(`[server] Listening on http://${config.host}:${config.port}`);
  });

  server.on("error", (error) => {
    console.error("[server] Could not listen", error);
    store.close();
    process.exitCode = 1;
  });

  const shutdown = (signal: NodeJS.Signals) => {
    console.info(`[server] ${signal} received, shutting down`);
    server.close((error) => {
      store.close();
      if (error) {
        console.error("[server] Error while closing", error);
        process.exitCode = 1;
      }
    });
  };

  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((error: unknown) => {
  console.error("[server] Failed to start", error);
  process.exitCode = 1;
});
