import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type Database from "better-sqlite3";
import fs from "fs";
import os from "os";
import path from "path";
import { CatalogSnapshot, CatalogStore } from "../lib/catalog";
import { getCatalog, getPublishedRunId, openDb, replaceCatalog } from "../lib/db";
import { PublishError } from "../lib/errors";
import {
  loadPublishedSnapshot,
  publishCatalog,
  readCatalogFile,
  refreshStoreFromDb,
  writeCatalogFile,
} from "../lib/publisher";
import type { CatalogDocument } from "../lib/types";
import { makeRecord } from "./helpers";

const first: CatalogDocument = { "iPhone14,5": [makeRecord()] };
const second: CatalogDocument = {
  "iPhone14,5": [makeRecord({ build: "21A5268h" }), makeRecord()],
  "iPad13,1": [makeRecord({ identifier: "iPad13,1" })],
};

describe("catalog file", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "catalog-test-"));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  it("writes pretty JSON that reads back unchanged", async () => {
    const file = path.join(dir, "nested", "betas.json");
    await writeCatalogFile(file, second);

    expect(await readCatalogFile(file)).toEqual(second);
    const text = await fs.promises.readFile(file, "utf-8");
    expect(text.startsWith('{\n  "iPhone14,5": [')).toBe(true);
    expect(text.endsWith("]\n}\n")).toBe(true);
  });

  it("leaves no temp files behind", async () => {
    const file = path.join(dir, "betas.json");
    await writeCatalogFile(file, first);
    await writeCatalogFile(file, second);

    expect(await fs.promises.readdir(dir)).toEqual(["betas.json"]);
  });

  it("keeps the previous file when the rename fails", async () => {
    const file = path.join(dir, "betas.json");
    await writeCatalogFile(file, first);
    vi.spyOn(fs.promises, "rename").mockRejectedValueOnce(new Error("EXDEV"));

    await expect(writeCatalogFile(file, second)).rejects.toBeInstanceOf(PublishError);

    expect(await readCatalogFile(file)).toEqual(first);
    expect(await fs.promises.readdir(dir)).toEqual(["betas.json"]);
  });
});

describe("publishCatalog", () => {
  let db: Database.Database;
  let dir: string;

  beforeEach(async () => {
    db = openDb(":memory:");
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "publish-test-"));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    db.close();
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  it("updates the file, the database and the served snapshot", async () => {
    const store = new CatalogStore();
    const file = path.join(dir, "betas.json");

    await publishCatalog(second, { runId: "run-2", filePath: file, db, store });

    expect(await readCatalogFile(file)).toEqual(second);
    expect(getCatalog(db)).toEqual(second);
    expect(getPublishedRunId(db)).toBe("run-2");
    expect(store.snapshot.runId).toBe("run-2");
    expect(store.snapshot.get("ipad13,1")).toEqual(second["iPad13,1"]);
  });

  it("skips the file when no path is given", async () => {
    await publishCatalog(first, { runId: "run-1", db });

    expect(getPublishedRunId(db)).toBe("run-1");
    expect(await fs.promises.readdir(dir)).toEqual([]);
  });

  it("touches nothing else when the file cannot be written", async () => {
    replaceCatalog(first, "run-1", db);
    const store = new CatalogStore(new CatalogSnapshot(first, "run-1"));
    vi.spyOn(fs.promises, "rename").mockRejectedValueOnce(new Error("EACCES"));

    await expect(
      publishCatalog(second, { runId: "run-2", filePath: path.join(dir, "betas.json"), db, store })
    ).rejects.toBeInstanceOf(PublishError);

    expect(getCatalog(db)).toEqual(first);
    expect(getPublishedRunId(db)).toBe("run-1");
    expect(store.snapshot.runId).toBe("run-1");
    expect(await fs.promises.readdir(dir)).toEqual([]);
  });

  it("keeps the previous file when the database write fails", async () => {
    const file = path.join(dir, "betas.json");
    const store = new CatalogStore();
    await publishCatalog(first, { runId: "run-1", filePath: file, db, store });
    db.close();

    await expect(
      publishCatalog(second, { runId: "run-2", filePath: file, db, store })
    ).rejects.toBeInstanceOf(PublishError);

    expect(await readCatalogFile(file)).toEqual(first);
    expect(await fs.promises.readdir(dir)).toEqual(["betas.json"]);
    expect(store.snapshot.runId).toBe("run-1");
    db = openDb(":memory:");
  });

  it("keeps the served snapshot when the database write fails", async () => {
    const store = new CatalogStore(new CatalogSnapshot(first, "run-1"));
    db.close();

    const error = await publishCatalog(second, { runId: "run-2", db, store }).catch(
      (err: unknown) => err
    );

    expect(error).toBeInstanceOf(PublishError);
    expect(error instanceof PublishError && error.target).toBe("database");
    expect(store.snapshot.runId).toBe("run-1");
    db = openDb(":memory:");
  });
});

describe("loading the published catalog", () => {
  let db: Database.Database;

  beforeEach(() => {
    db = openDb(":memory:");
  });

  afterEach(() => {
    db.close();
  });

  it("builds a snapshot from the database", () => {
    replaceCatalog(second, "run-2", db);

    const snapshot = loadPublishedSnapshot(db);

    expect(snapshot.runId).toBe("run-2");
    expect(snapshot.deviceCount).toBe(2);
    expect(snapshot.get("iPhone14,5")).toEqual(second["iPhone14,5"]);
  });

  it("refreshes the store only when another run was published", () => {
    const store = new CatalogStore();
    expect(refreshStoreFromDb(store, db)).toBe(false);

    replaceCatalog(first, "run-1", db);
    expect(refreshStoreFromDb(store, db)).toBe(true);
    expect(store.snapshot.runId).toBe("run-1");
    expect(refreshStoreFromDb(store, db)).toBe(false);
  });

  it("keeps serving the current snapshot when the database cannot be read", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const store = new CatalogStore(new CatalogSnapshot(first, "run-1"));
    db.close();

    expect(refreshStoreFromDb(store, db)).toBe(false);
    expect(store.snapshot.runId).toBe("run-1");
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy.mock.calls[0][0]).toBe("[publisher] Reload failed, still serving run");

    errorSpy.mockRestore();
    db = openDb(":memory:");
  });
});
