import type Database from "better-sqlite3";
import fs from "fs";
import path from "path";
import { CatalogSnapshot } from "./catalog";
import type { CatalogStore } from "./catalog";
import { getCatalog, getPublishedRunId, replaceCatalog } from "./db";
import { PublishError, errorMessage } from "./errors";
import { profiler } from "./profiler";
import type { CatalogDocument } from "./types";

export interface PublishOptions {
  runId: string;
  /** JSON file target; empty or undefined skips the file */
  filePath?: string;
  db?: Database.Database;
  store?: CatalogStore;
}

interface StagedFile {
  target: string;
  tmpPath: string;
}

/** Write the document to a temp file beside the target; nothing is visible until commitCatalogFile */
async function stageCatalogFile(filePath: string, document: CatalogDocument): Promise<StagedFile> {
  const target = path.resolve(filePath);
  const tmpPath = path.join(
    path.dirname(target),
    `.${path.basename(target)}.${process.pid}.${Date.now()}.tmp`
  );

  try {
    await fs.promises.mkdir(path.dirname(target), { recursive: true });
    await fs.promises.writeFile(tmpPath, JSON.stringify(document, null, 2) + "\n", "utf-8");
  } catch (err) {
    await fs.promises.rm(tmpPath, { force: true });
    throw new PublishError(`Failed to write ${target}: ${errorMessage(err)}`, target, { cause: err });
  }
  return { target, tmpPath };
}

async function commitCatalogFile({ target, tmpPath }: StagedFile): Promise<void> {
  try {
    await fs.promises.rename(tmpPath, target);
  } catch (err) {
    await fs.promises.rm(tmpPath, { force: true });
    throw new PublishError(`Failed to write ${target}: ${errorMessage(err)}`, target, { cause: err });
  }
}

/** Readers see either the old file or the complete new one. */
export async function writeCatalogFile(filePath: string, document: CatalogDocument): Promise<void> {
  await commitCatalogFile(await stageCatalogFile(filePath, document));
}

export async function readCatalogFile(filePath: string): Promise<CatalogDocument> {
  const document: CatalogDocument = JSON.parse(await fs.promises.readFile(filePath, "utf-8"));
  return document;
}

/**
 * Stage the file, commit the database, rename the file into place, then swap
 * the served snapshot. Any failure leaves every target on the previous
 * catalog and is rethrown as a PublishError.
 */
export async function publishCatalog(
  document: CatalogDocument,
  options: PublishOptions
): Promise<void> {
  const { runId, filePath, db, store } = options;

  const staged = filePath
    ? await profiler.time("publish:file", () => stageCatalogFile(filePath, document))
    : null;

  profiler.start("publish:db");
  let previous: { document: CatalogDocument; runId: string | null };
  try {
    previous = { document: getCatalog(db), runId: getPublishedRunId(db) };
    replaceCatalog(document, runId, db);
    profiler.stop("publish:db");
  } catch (err) {
    profiler.stop("publish:db", { error: "failed" });
    if (staged) await fs.promises.rm(staged.tmpPath, { force: true });
    throw new PublishError(`Failed to store catalog: ${errorMessage(err)}`, "database", { cause: err });
  }

  if (staged) {
    try {
      await commitCatalogFile(staged);
    } catch (err) {
      replaceCatalog(previous.document, previous.runId ?? runId, db);
      console.error(`[publisher] Rolled back database after file error`);
      throw err;
    }
    console.log(`[publisher] Wrote ${staged.target}`);
  }

  if (store) {
    store.swap(new CatalogSnapshot(document, runId));
    console.log(`[publisher] Serving catalog from run ${runId}`);
  }
}

/** The catalog currently stored in the database, as a servable snapshot */
export function loadPublishedSnapshot(db?: Database.Database): CatalogSnapshot {
  return new CatalogSnapshot(getCatalog(db), getPublishedRunId(db));
}

/**
 * Pick up a catalog published by another process (a cron-driven scrape).
 * Returns true when the served snapshot changed; a read error keeps the current one.
 */
export function refreshStoreFromDb(store: CatalogStore, db?: Database.Database): boolean {
  try {
    const runId = getPublishedRunId(db);
    if (runId === null || runId === store.snapshot.runId) return false;
    store.swap(loadPublishedSnapshot(db));
    console.log(`[publisher] Reloaded catalog from run ${runId}`);
    return true;
  } catch (err) {
    console.error("[publisher] Reload failed, still serving run", store.snapshot.runId, errorMessage(err));
    return false;
  }
}
