import type Database from "better-sqlite3";
import { randomUUID } from "crypto";
import { buildCatalog, countRecords } from "./catalog";
import type { CatalogStore } from "./catalog";
import { collectBetaFirmwares, listBetaPages, wikiSource } from "./collector";
import type { CollectorSource } from "./collector";
import { config } from "./config";
import { getCatalog, getDb, insertPipelineRun } from "./db";
import { enrichFirmwares } from "./enricher";
import { errorMessage } from "./errors";
import { profiler } from "./profiler";
import { publishCatalog } from "./publisher";
import { pruneHttpCache } from "./scraping/http-cache";
import { TssSigningChecker } from "./signing/tsschecker";
import type { SigningChecker } from "./signing/types";
import { RunStatus } from "./types";
import type {
  CollectedFirmware,
  PageError,
  PipelineResult,
  PipelineRun,
  PipelineScope,
} from "./types";
import { ALL_FAMILIES } from "./wiki/beta-pages";

const DEFAULT_SCOPE: PipelineScope = {
  families: ALL_FAMILIES,
  skipSigningCheck: !config.enableSigningCheck,
};

export interface PipelineDeps {
  source?: CollectorSource;
  checker?: SigningChecker;
  db?: Database.Database;
  store?: CatalogStore;
  /** JSON output path; defaults to config.catalogPath, "" disables */
  catalogPath?: string;
}

/**
 * One collect → enrich → publish pass. A run that collects nothing (the wiki
 * is unreachable, or every page failed) is recorded as failed and leaves the
 * published catalog untouched. Publish failures are recorded, then rethrown.
 */
export async function runBetaPipeline(
  scope?: Partial<PipelineScope>,
  deps: PipelineDeps = {}
): Promise<PipelineResult> {
  const mergedScope: PipelineScope = { ...DEFAULT_SCOPE, ...scope };
  const {
    source = wikiSource,
    db = getDb(),
    store,
    catalogPath = config.catalogPath,
  } = deps;

  const runId = randomUUID();
  const startedAt = new Date().toISOString();
  const startTime = Date.now();
  const errors: PageError[] = [];
  const collected: CollectedFirmware[] = [];
  let pageCount = 0;

  profiler.reset();

  const finish = (
    status: RunStatus,
    fields: Pick<PipelineRun, "recordCount" | "deviceCount">
  ): PipelineRun => {
    const run: PipelineRun = {
      id: runId,
      startedAt,
      durationMs: Date.now() - startTime,
      status,
      pageCount,
      failedPageCount: errors.filter((e) => e.page !== "pipeline").length,
      errors,
      ...fields,
    };
    insertPipelineRun(run, db);
    profiler.printSummary();
    return run;
  };

  const fail = (page: string, err: unknown) => {
    errors.push({ page, error: errorMessage(err), timestamp: new Date().toISOString() });
  };

  // Collect
  profiler.start("pipeline:collect");
  try {
    const pages = await listBetaPages(mergedScope.families, source);
    pageCount = pages.length;
    console.log(`[pipeline] ${pages.length} beta pages for ${mergedScope.families.join(", ")}`);

    for await (const result of collectBetaFirmwares(pages, source)) {
      if ("error" in result) fail(result.title, result.error);
      else collected.push(...result.records);
    }
    profiler.stop("pipeline:collect", { pages: pageCount, firmwares: collected.length });
  } catch (err) {
    profiler.stop("pipeline:collect", { error: "failed" });
    console.error("[pipeline] Could not list beta pages:", errorMessage(err));
    fail("pipeline", err);
    return { run: finish(RunStatus.FAILED, { recordCount: 0, deviceCount: 0 }), catalog: null };
  }

  if (collected.length === 0) {
    console.error("[pipeline] Collected no firmwares, keeping the previous catalog");
    fail("pipeline", new Error("No firmwares collected"));
    return { run: finish(RunStatus.FAILED, { recordCount: 0, deviceCount: 0 }), catalog: null };
  }

  // Enrich
  const previous = getCatalog(db);
  const checker = mergedScope.skipSigningCheck ? null : (deps.checker ?? new TssSigningChecker());
  const { records } = await profiler.time(
    "pipeline:enrich",
    () =>
      enrichFirmwares(collected, {
        checker,
        previous,
        concurrency: config.maxConcurrentChecks,
      }),
    { checker: checker?.name ?? "skipped" }
  );

  // Publish
  const catalog = buildCatalog(records);
  const recordCount = countRecords(catalog);
  const deviceCount = Object.keys(catalog).length;
  try {
    await profiler.time("pipeline:publish", () =>
      publishCatalog(catalog, { runId, filePath: catalogPath, db, store })
    );
  } catch (err) {
    console.error("[pipeline] Publish failed, previous catalog still served:", errorMessage(err));
    fail("pipeline", err);
    finish(RunStatus.FAILED, { recordCount, deviceCount });
    throw err;
  }

  pruneHttpCache(db);

  const run = finish(RunStatus.PUBLISHED, { recordCount, deviceCount });
  console.log(
    `[pipeline] Published ${recordCount} firmwares for ${deviceCount} devices in ${run.durationMs}ms (${run.failedPageCount} pages failed)`
  );
  return { run, catalog };
}
