import { closeDb, getRecentRuns } from "../lib/db";
import { runBetaPipeline } from "../lib/pipeline";
import { RunStatus } from "../lib/types";
import type { DeviceFamily, PipelineScope } from "../lib/types";
import { ALL_FAMILIES, parseFamily } from "../lib/wiki/beta-pages";

function printRecentRuns(limit: number) {
  const runs = getRecentRuns(limit);
  if (runs.length === 0) {
    console.log("No pipeline runs recorded yet.");
    return;
  }
  for (const run of runs) {
    console.log(
      `${run.startedAt}  ${run.status.padEnd(9)} ${String(run.recordCount).padStart(5)} firmwares  ` +
        `${String(run.deviceCount).padStart(4)} devices  ${run.failedPageCount}/${run.pageCount} pages failed  ${run.durationMs}ms`
    );
  }
}

async function main() {
  const args = process.argv.slice(2);

  // --runs [N]: print the last N runs and exit
  const runsIndex = args.indexOf("--runs");
  if (runsIndex !== -1) {
    const limit = parseInt(args[runsIndex + 1] ?? "", 10);
    printRecentRuns(Number.isNaN(limit) ? 10 : limit);
    closeDb();
    return;
  }
  const families: DeviceFamily[] = [];
  const scope: Partial<PipelineScope> = {};
  let catalogPath: string | undefined;

  for (let i = 0; i < args.length; i++) {
    if (args[i] === "--family" && args[i + 1]) {
      const family = parseFamily(args[i + 1]);
      if (!family) {
        console.error(`Unknown family "${args[i + 1]}". Available: ${ALL_FAMILIES.join(", ")}`);
        process.exit(1);
      }
      families.push(family);
      i++;
    } else if (args[i] === "--skip-signing") {
      scope.skipSigningCheck = true;
    } else if (args[i] === "--out" && args[i + 1]) {
      catalogPath = args[i + 1];
      i++;
    }
  }

  console.log(`Scraping beta firmwares for: ${(families.length > 0 ? families : ALL_FAMILIES).join(", ")}`);

  if (families.length > 0) scope.families = families;
  const { run } = await runBetaPipeline(scope, { catalogPath });

  console.log(`\n=== Summary ===`);
  console.log(`Status: ${run.status}`);
  console.log(`Pages: ${run.pageCount} (${run.failedPageCount} failed)`);
  console.log(`Devices: ${run.deviceCount}`);
  console.log(`Firmwares: ${run.recordCount}`);
  for (const e of run.errors) {
    console.log(`  ${e.page}: ${e.error}`);
  }

  closeDb();
  process.exit(run.status === RunStatus.PUBLISHED ? 0 : 1);
}

main().catch((err) => {
  console.error("Fatal error:", err);
  closeDb();
  process.exit(1);
});
