import { errorMessage } from "./errors";
import { profiler } from "./profiler";
import type { CollectedFirmware, DeviceFamily } from "./types";
import { selectBetaPages } from "./wiki/beta-pages";
import type { BetaPageRef } from "./wiki/beta-pages";
import { fetchPageHtml, listBetaPageTitles } from "./wiki/client";
import { parseFirmwareTables } from "./wiki/firmware-table";

export type PageResult =
  | { title: string; records: CollectedFirmware[] }
  | { title: string; error: Error };

export interface CollectorSource {
  listPageTitles(): Promise<string[]>;
  fetchPageHtml(title: string): Promise<string>;
}

export const wikiSource: CollectorSource = {
  listPageTitles: listBetaPageTitles,
  fetchPageHtml,
};

/** Resolve which beta pages a run will read. Throws when the page list cannot be fetched. */
export async function listBetaPages(
  families: DeviceFamily[],
  source: CollectorSource = wikiSource
): Promise<BetaPageRef[]> {
  const titles = await source.listPageTitles();
  return selectBetaPages(titles, families);
}

/**
 * Yield the firmwares of each page in turn. A page that fails to load or parse
 * yields its error and the sequence moves on to the next page.
 */
export async function* collectBetaFirmwares(
  pages: BetaPageRef[],
  source: CollectorSource = wikiSource
): AsyncGenerator<PageResult> {
  for (const page of pages) {
    const label = `collect:${page.title}`;
    profiler.start(label);
    try {
      const html = await source.fetchPageHtml(page.title);
      const { records, tableCount, skippedRows } = parseFirmwareTables(html, page.title);
      profiler.stop(label, { records: records.length });
      console.log(
        `[collector] ${page.title}: ${records.length} firmwares from ${tableCount} tables (${skippedRows} rows skipped)`
      );
      yield { title: page.title, records };
    } catch (err) {
      profiler.stop(label, { error: "failed" });
      console.warn(`[collector] Skipping ${page.title}:`, errorMessage(err));
      yield { title: page.title, error: err instanceof Error ? err : new Error(String(err)) };
    }
  }
}
