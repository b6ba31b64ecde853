import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type Database from "better-sqlite3";
import fs, { readFileSync } from "fs";
import os from "os";
import path from "path";
import { fileURLToPath } from "url";
import { CatalogSnapshot, CatalogStore } from "../lib/catalog";
import type { CollectorSource } from "../lib/collector";
import {
  getCatalog,
  getLatestRun,
  getPublishedRunId,
  getRecentRuns,
  openDb,
  replaceCatalog,
} from "../lib/db";
import { CheckerUnavailable, FetchError } from "../lib/errors";
import { runBetaPipeline } from "../lib/pipeline";
import { readCatalogFile } from "../lib/publisher";
import type { SigningChecker } from "../lib/signing/types";
import { DeviceFamily, RunStatus } from "../lib/types";
import type { CatalogDocument, CollectedFirmware, PipelineScope } from "../lib/types";
import { parseFirmwareTables } from "../lib/wiki/firmware-table";
import { makeRecord } from "./helpers";

const IPHONE_PAGE = "Beta Firmware/iPhone/17.x";
const IPAD_PAGE = "Beta Firmware/iPad/17.x";

const IPHONE_HTML = readFileSync(
  fileURLToPath(new URL("./fixtures/beta-firmware-iphone.html", import.meta.url)),
  "utf-8"
);
const IPAD_HTML = `<table class="wikitable">
<tr><th>Version</th><th>Build</th><th>Keys</th><th>Release Date</th><th>Download URL</th></tr>
<tr><td>17.0 beta</td><td>21A5248v</td><td>iPad13,1</td><td>June 5, 2023</td>
<td><a href="https://updates.example.com/seed/iPad13,1_17.0_21A5248v_Restore.ipsw">ipsw</a></td></tr>
</table>`;

const IPHONE_RECORDS = parseFirmwareTables(IPHONE_HTML, IPHONE_PAGE).records;

const SCOPE: PipelineScope = {
  families: [DeviceFamily.IPHONE, DeviceFamily.IPAD],
  skipSigningCheck: false,
};

function fakeSource(pages: Record<string, string | Error>): CollectorSource {
  return {
    listPageTitles: async () => [...Object.keys(pages), "Beta Firmware/iPhone/8.x", "Main Page"],
    fetchPageHtml: async (title) => {
      const page = pages[title];
      if (page === undefined) throw new Error(`unexpected page ${title}`);
      if (page instanceof Error) throw page;
      return page;
    },
  };
}

class FakeChecker implements SigningChecker {
  readonly name = "fake";
  readonly checked: CollectedFirmware[] = [];

  constructor(private readonly verdict: boolean | Error) {}

  async isSigned(firmware: CollectedFirmware): Promise<boolean> {
    this.checked.push(firmware);
    if (this.verdict instanceof Error) throw this.verdict;
    return this.verdict;
  }
}

describe("runBetaPipeline", () => {
  let db: Database.Database;
  let store: CatalogStore;
  const previous: CatalogDocument = {
    "iPhone14,5": [makeRecord({ signed: true, signedCheckedAt: "2023-12-31T00:00:00.000Z" })],
  };

  beforeEach(() => {
    db = openDb(":memory:");
    replaceCatalog(previous, "run-0", db);
    store = new CatalogStore(new CatalogSnapshot(previous, "run-0"));
  });

  afterEach(() => {
    db.close();
  });

  it("collects, checks and publishes every selected page", async () => {
    const checker = new FakeChecker(true);
    const { run, catalog } = await runBetaPipeline(SCOPE, {
      source: fakeSource({ [IPHONE_PAGE]: IPHONE_HTML, [IPAD_PAGE]: IPAD_HTML }),
      checker,
      db,
      store,
      catalogPath: "",
    });

    const deviceCount = new Set(IPHONE_RECORDS.map((r) => r.identifier)).size + 1;
    expect(run.status).toBe(RunStatus.PUBLISHED);
    expect(run.pageCount).toBe(2);
    expect(run.failedPageCount).toBe(0);
    expect(run.recordCount).toBe(IPHONE_RECORDS.length + 1);
    expect(run.deviceCount).toBe(deviceCount);
    expect(checker.checked).toHaveLength(IPHONE_RECORDS.length + 1);

    expect(catalog && Object.keys(catalog)).toHaveLength(deviceCount);
    expect(catalog?.["iPad13,1"]).toEqual([
      {
        identifier: "iPad13,1",
        version: "17.0 beta",
        build: "21A5248v",
        url: "https://updates.example.com/seed/iPad13,1_17.0_21A5248v_Restore.ipsw",
        releaseDate: "2023-06-05",
        filesize: null,
        signed: true,
        signedCheckedAt: expect.any(String),
      },
    ]);

    expect(getCatalog(db)).toEqual(catalog);
    expect(getPublishedRunId(db)).toBe(run.id);
    expect(store.snapshot.runId).toBe(run.id);
    expect(getLatestRun(undefined, db)).toEqual(run);
  });

  it("writes the catalog file and keeps it when a later publish fails", async () => {
    const dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "pipeline-test-"));
    const catalogPath = path.join(dir, "betas.json");
    const source = fakeSource({ [IPHONE_PAGE]: IPHONE_HTML, [IPAD_PAGE]: IPAD_HTML });
    try {
      const { catalog } = await runBetaPipeline(SCOPE, {
        source,
        checker: new FakeChecker(true),
        db,
        store,
        catalogPath,
      });
      expect(await readCatalogFile(catalogPath)).toEqual(catalog);

      const publishedRunId = store.snapshot.runId;
      db.exec(`CREATE TRIGGER fail_betas BEFORE INSERT ON betas
        BEGIN SELECT RAISE(ABORT, 'disk full'); END`);
      await expect(
        runBetaPipeline(SCOPE, { source, checker: new FakeChecker(false), db, store, catalogPath })
      ).rejects.toThrow("Failed to store catalog: disk full");

      expect(await readCatalogFile(catalogPath)).toEqual(catalog);
      expect(await fs.promises.readdir(dir)).toEqual(["betas.json"]);
      expect(store.snapshot.runId).toBe(publishedRunId);
      expect(getCatalog(db)).toEqual(catalog);
      expect(getRecentRuns(10, db).map((r) => r.status).sort()).toEqual([
        RunStatus.FAILED,
        RunStatus.PUBLISHED,
      ]);
    } finally {
      await fs.promises.rm(dir, { recursive: true, force: true });
    }
  });

  it("keeps the published catalog when the wiki is unreachable", async () => {
    const source: CollectorSource = {
      listPageTitles: () => Promise.reject(new FetchError("HTTP 502", "https://wiki.example.com", 502)),
      fetchPageHtml: () => Promise.reject(new Error("not reached")),
    };

    const { run, catalog } = await runBetaPipeline(SCOPE, {
      source,
      checker: new FakeChecker(true),
      db,
      store,
      catalogPath: "",
    });

    expect(catalog).toBeNull();
    expect(run.status).toBe(RunStatus.FAILED);
    expect(run.failedPageCount).toBe(0);
    expect(run.errors).toHaveLength(1);
    expect(run.errors[0].page).toBe("pipeline");
    expect(run.errors[0].error).toBe("HTTP 502");
    expect(getCatalog(db)).toEqual(previous);
    expect(store.snapshot.runId).toBe("run-0");
    expect(getLatestRun(undefined, db)?.status).toBe(RunStatus.FAILED);
  });

  it("publishes nothing when every page fails", async () => {
    const { run, catalog } = await runBetaPipeline(SCOPE, {
      source: fakeSource({ [IPHONE_PAGE]: new Error("HTTP 500"), [IPAD_PAGE]: new Error("HTTP 500") }),
      checker: new FakeChecker(true),
      db,
      store,
      catalogPath: "",
    });

    expect(catalog).toBeNull();
    expect(run.status).toBe(RunStatus.FAILED);
    expect(run.failedPageCount).toBe(2);
    expect(run.errors.map((e) => e.page)).toEqual([IPHONE_PAGE, IPAD_PAGE, "pipeline"]);
    expect(getPublishedRunId(db)).toBe("run-0");
    expect(store.snapshot.runId).toBe("run-0");
  });

  it("publishes the pages that did load", async () => {
    const { run, catalog } = await runBetaPipeline(SCOPE, {
      source: fakeSource({ [IPHONE_PAGE]: IPHONE_HTML, [IPAD_PAGE]: new Error("HTTP 500") }),
      checker: new FakeChecker(false),
      db,
      store,
      catalogPath: "",
    });

    expect(run.status).toBe(RunStatus.PUBLISHED);
    expect(run.failedPageCount).toBe(1);
    expect(run.errors).toEqual([
      { page: IPAD_PAGE, error: "HTTP 500", timestamp: expect.any(String) },
    ]);
    expect(run.recordCount).toBe(IPHONE_RECORDS.length);
    expect(catalog?.["iPad13,1"]).toBeUndefined();
    expect(store.snapshot.runId).toBe(run.id);
  });

  it("keeps the last known signing status when the checker is down", async () => {
    const { catalog } = await runBetaPipeline(SCOPE, {
      source: fakeSource({ [IPHONE_PAGE]: IPHONE_HTML, [IPAD_PAGE]: IPAD_HTML }),
      checker: new FakeChecker(new CheckerUnavailable("offline", "", "")),
      db,
      store,
      catalogPath: "",
    });

    const known = catalog?.["iPhone14,5"].find((r) => r.build === "21A5248v");
    expect(known?.signed).toBe(true);
    expect(known?.signedCheckedAt).toBe("2023-12-31T00:00:00.000Z");
    expect(catalog?.["iPad13,1"][0].signed).toBeNull();
  });

  it("does not call the checker when signing checks are skipped", async () => {
    const checker = new FakeChecker(true);
    const { run } = await runBetaPipeline(
      { ...SCOPE, skipSigningCheck: true },
      {
        source: fakeSource({ [IPHONE_PAGE]: IPHONE_HTML, [IPAD_PAGE]: IPAD_HTML }),
        checker,
        db,
        store,
        catalogPath: "",
      }
    );

    expect(run.status).toBe(RunStatus.PUBLISHED);
    expect(checker.checked).toHaveLength(0);
  });

  it("only reads pages of the requested families", async () => {
    const source = fakeSource({ [IPHONE_PAGE]: IPHONE_HTML, [IPAD_PAGE]: IPAD_HTML });
    const { run, catalog } = await runBetaPipeline(
      { families: [DeviceFamily.IPAD], skipSigningCheck: true },
      { source, db, store, catalogPath: "" }
    );

    expect(run.pageCount).toBe(1);
    expect(catalog && Object.keys(catalog)).toEqual(["iPad13,1"]);
  });
});
