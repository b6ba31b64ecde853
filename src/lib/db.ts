import Database from "better-sqlite3";
import fs from "fs";
import path from "path";
import { config } from "./config";
import { RunStatus } from "./types";
import type { CatalogDocument, FirmwareRecord, PageError, PipelineRun } from "./types";

let db: Database.Database | null = null;

export function getDb(): Database.Database {
  if (db) return db;
  db = openDb(path.resolve(process.cwd(), config.dbPath));
  return db;
}

/** Open (and migrate) a database at an explicit path. ":memory:" works for tests. */
export function openDb(dbPath: string): Database.Database {
  if (dbPath !== ":memory:") {
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  const database = new Database(dbPath);
  database.pragma("journal_mode = WAL");
  initSchema(database);
  return database;
}

export function closeDb(): void {
  if (!db) return;
  db.close();
  db = null;
}

function initSchema(database: Database.Database): void {
  database.exec(`
    CREATE TABLE IF NOT EXISTS pipeline_runs (
      id                TEXT PRIMARY KEY,
      started_at        TEXT NOT NULL,
      duration_ms       INTEGER NOT NULL DEFAULT 0,
      status            TEXT NOT NULL,
      page_count        INTEGER NOT NULL DEFAULT 0,
      failed_page_count INTEGER NOT NULL DEFAULT 0,
      record_count      INTEGER NOT NULL DEFAULT 0,
      device_count      INTEGER NOT NULL DEFAULT 0,
      errors_json       TEXT NOT NULL DEFAULT '[]'
    );

    CREATE TABLE IF NOT EXISTS betas (
      identifier     TEXT PRIMARY KEY,
      identifier_key TEXT NOT NULL UNIQUE,
      firmwares      TEXT NOT NULL,
      run_id         TEXT NOT NULL,
      published_at   TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS http_cache (
      url_hash   TEXT PRIMARY KEY,
      url        TEXT NOT NULL,
      body       TEXT NOT NULL,
      fetched_at INTEGER NOT NULL,
      ttl_ms     INTEGER NOT NULL
    );
  `);
}

// ===== Pipeline runs =====

export function insertPipelineRun(run: PipelineRun, database: Database.Database = getDb()): void {
  database
    .prepare(
      `INSERT INTO pipeline_runs (
        id, started_at, duration_ms, status, page_count, failed_page_count,
        record_count, device_count, errors_json
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`
    )
    .run(
      run.id,
      run.startedAt,
      run.durationMs,
      run.status,
      run.pageCount,
      run.failedPageCount,
      run.recordCount,
      run.deviceCount,
      JSON.stringify(run.errors)
    );
}

export function getLatestRun(
  status?: RunStatus,
  database: Database.Database = getDb()
): PipelineRun | null {
  const row = (
    status
      ? database
          .prepare("SELECT * FROM pipeline_runs WHERE status = ? ORDER BY started_at DESC LIMIT 1")
          .get(status)
      : database.prepare("SELECT * FROM pipeline_runs ORDER BY started_at DESC LIMIT 1").get()
  ) as Record<string, unknown> | undefined;
  return row ? mapRowToRun(row) : null;
}

export function getRecentRuns(limit = 20, database: Database.Database = getDb()): PipelineRun[] {
  const rows = database
    .prepare("SELECT * FROM pipeline_runs ORDER BY started_at DESC LIMIT ?")
    .all(limit) as Record<string, unknown>[];
  return rows.map(mapRowToRun);
}

function mapRowToRun(row: Record<string, unknown>): PipelineRun {
  const errors: PageError[] = JSON.parse(String(row.errors_json ?? "[]"));
  return {
    id: String(row.id),
    startedAt: String(row.started_at),
    durationMs: Number(row.duration_ms),
    status: row.status === RunStatus.PUBLISHED ? RunStatus.PUBLISHED : RunStatus.FAILED,
    pageCount: Number(row.page_count),
    failedPageCount: Number(row.failed_page_count),
    recordCount: Number(row.record_count),
    deviceCount: Number(row.device_count),
    errors,
  };
}

// ===== Catalog =====

/**
 * Replace the whole catalog in one transaction. Readers in other connections
 * see either the previous document or this one, never a mix.
 */
export function replaceCatalog(
  document: CatalogDocument,
  runId: string,
  database: Database.Database = getDb()
): void {
  const insert = database.prepare(
    `INSERT INTO betas (identifier, identifier_key, firmwares, run_id, published_at)
     VALUES (?, ?, ?, ?, ?)`
  );
  const now = new Date().toISOString();

  database.transaction(() => {
    database.prepare("DELETE FROM betas").run();
    for (const [identifier, firmwares] of Object.entries(document)) {
      insert.run(identifier, identifier.toLowerCase(), JSON.stringify(firmwares), runId, now);
    }
  })();
}

export function getCatalog(database: Database.Database = getDb()): CatalogDocument {
  const rows = database
    .prepare("SELECT identifier, firmwares FROM betas ORDER BY identifier")
    .all() as { identifier: string; firmwares: string }[];

  const document: CatalogDocument = {};
  for (const row of rows) {
    const firmwares: FirmwareRecord[] = JSON.parse(row.firmwares);
    document[row.identifier] = firmwares;
  }
  return document;
}

/** Run id of the catalog currently stored, or null when nothing was published yet */
export function getPublishedRunId(database: Database.Database = getDb()): string | null {
  const row = database.prepare("SELECT run_id FROM betas LIMIT 1").get() as
    | { run_id: string }
    | undefined;
  return row?.run_id ?? null;
}
