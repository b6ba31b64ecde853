import { CatalogStore } from "../lib/catalog";
import { config } from "../lib/config";
import { closeDb, getDb } from "../lib/db";
import { runBetaPipeline } from "../lib/pipeline";
import { loadPublishedSnapshot, refreshStoreFromDb } from "../lib/publisher";
import { startScheduler } from "../lib/scheduler";
import type { Scheduler } from "../lib/scheduler";
import { startServer, stopServer } from "../lib/server/http";

const RELOAD_INTERVAL_MS = 60 * 1000;

async function main() {
  const args = process.argv.slice(2);
  const schedule = !args.includes("--no-schedule");
  const portIndex = args.indexOf("--port");
  const port = portIndex !== -1 && args[portIndex + 1] ? parseInt(args[portIndex + 1], 10) : config.port;

  const db = getDb();
  const store = new CatalogStore(loadPublishedSnapshot(db));
  console.log(`[serve] Loaded ${store.snapshot.deviceCount} devices from the last published run`);

  const server = await startServer({ port, host: config.host, store });

  let scheduler: Scheduler | null = null;
  let reloadTimer: NodeJS.Timeout | null = null;
  if (schedule) {
    scheduler = startScheduler(() => runBetaPipeline({}, { db, store }), config.scrapeIntervalMs);
  } else {
    reloadTimer = setInterval(() => refreshStoreFromDb(store, db), RELOAD_INTERVAL_MS);
  }

  const shutdown = async (signal: string) => {
    console.log(`[serve] ${signal} received, shutting down`);
    if (reloadTimer) clearInterval(reloadTimer);
    await scheduler?.stop();
    await stopServer(server);
    closeDb();
    process.exit(0);
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err) => {
        console.error("[serve] Shutdown failed:", err);
        process.exit(1);
      });
    });
  }
}

main().catch((err) => {
  console.error("Fatal error:", err);
  closeDb();
  process.exit(1);
});
