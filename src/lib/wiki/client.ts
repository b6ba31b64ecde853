import { config } from "../config";
import { ParseError } from "../errors";
import { fetchJson, isRecord } from "../scraping/utils";
import { BETA_PAGE_PREFIX } from "./beta-pages";

function apiUrl(params: Record<string, string>): string {
  const url = new URL(config.wikiApiUrl);
  for (const [key, value] of Object.entries({ format: "json", formatversion: "2", ...params })) {
    url.searchParams.set(key, value);
  }
  return url.toString();
}

/**
 * List every page title under "Beta Firmware/", following continuation tokens.
 * Listing is never cached: a stale list would hide newly created pages.
 */
export async function listBetaPageTitles(): Promise<string[]> {
  const titles: string[] = [];
  let cont: Record<string, string> = {};

  for (;;) {
    const url = apiUrl({
      action: "query",
      list: "allpages",
      apprefix: BETA_PAGE_PREFIX,
      aplimit: "max",
      ...cont,
    });
    const body = await fetchJson(url, { cacheTtlMs: 0 });

    const query = isRecord(body) ? body.query : undefined;
    const pages = isRecord(query) ? query.allpages : undefined;
    if (!Array.isArray(pages)) {
      throw new ParseError("allpages response has no query.allpages list", BETA_PAGE_PREFIX);
    }
    for (const page of pages) {
      if (isRecord(page) && typeof page.title === "string") titles.push(page.title);
    }

    const next = isRecord(body) ? body.continue : undefined;
    if (!isRecord(next)) break;
    cont = {};
    for (const [key, value] of Object.entries(next)) {
      if (typeof value === "string") cont[key] = value;
    }
    if (!cont.apcontinue) break;
  }

  return titles;
}

function parsedText(body: unknown): string | null {
  const parse = isRecord(body) ? body.parse : undefined;
  return isRecord(parse) && typeof parse.text === "string" ? parse.text : null;
}

/** Rendered HTML of one wiki page. Only responses carrying page text are cached. */
export async function fetchPageHtml(title: string): Promise<string> {
  const url = apiUrl({ action: "parse", page: title, prop: "text", redirects: "1" });
  const body = await fetchJson(url, {
    cacheTtlMs: config.wikiCacheTtlMs,
    cacheIf: (json) => parsedText(json) !== null,
  });

  if (isRecord(body) && isRecord(body.error)) {
    const info = typeof body.error.info === "string" ? body.error.info : "unknown error";
    throw new ParseError(`Wiki API error for "${title}": ${info}`, title);
  }

  const text = parsedText(body);
  if (text === null) {
    throw new ParseError(`Wiki API returned no page text for "${title}"`, title);
  }
  return text;
}
