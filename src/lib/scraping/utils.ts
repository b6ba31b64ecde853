import { config } from "../config";
import { FetchError } from "../errors";
import { ProxyAgent, fetch as undiciFetch } from "undici";
import { getHttpCache, setHttpCache } from "./http-cache";

export async function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function getProxyDispatcher(): ProxyAgent | undefined {
  const proxyUrl =
    process.env.HTTPS_PROXY ||
    process.env.https_proxy ||
    process.env.HTTP_PROXY ||
    process.env.http_proxy;
  if (!proxyUrl) return undefined;
  return new ProxyAgent(proxyUrl);
}

export interface FetchPageOptions {
  retries?: number;
  retryDelayMs?: number;
  timeoutMs?: number;
  /** 0 skips the cache, undefined uses the cache default */
  cacheTtlMs?: number;
  /** Wait this long before a real network request (cache hits are not delayed) */
  politeDelayMs?: number;
  accept?: string;
  /** Store the body in the cache only when this returns true */
  shouldCache?: (body: string) => boolean;
}

export interface FetchJsonOptions extends Omit<FetchPageOptions, "accept" | "shouldCache"> {
  /** Store the response only when the parsed body passes, e.g. not an API error */
  cacheIf?: (body: unknown) => boolean;
}

export async function fetchPage(url: string, options: FetchPageOptions = {}): Promise<string> {
  const {
    retries = 3,
    retryDelayMs = 2000,
    timeoutMs = 15000,
    cacheTtlMs,
    politeDelayMs = 0,
    accept = "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
    shouldCache,
  } = options;

  const cached = getHttpCache(url, cacheTtlMs);
  if (cached) return cached;

  if (politeDelayMs > 0) await delay(politeDelayMs);

  const dispatcher = getProxyDispatcher();

  for (let attempt = 0; attempt <= retries; attempt++) {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);
    try {
      const response = await undiciFetch(url, {
        headers: {
          "User-Agent": config.getRandomUserAgent(),
          Accept: accept,
          "Accept-Language": "en-US,en;q=0.9",
        },
        signal: controller.signal,
        dispatcher,
      });

      if (response.status === 429 || response.status === 503) {
        if (attempt < retries) {
          await delay(retryDelayMs * Math.pow(2, attempt));
          continue;
        }
        throw new FetchError(
          `Rate limited (${response.status}) after ${retries} retries: ${url}`,
          url,
          response.status
        );
      }

      if (!response.ok) {
        throw new FetchError(`HTTP ${response.status} for ${url}`, url, response.status);
      }

      const body = await response.text();
      if (!shouldCache || shouldCache(body)) setHttpCache(url, body, { ttlMs: cacheTtlMs });
      return body;
    } catch (error: unknown) {
      if (error instanceof FetchError) throw error;
      if (attempt < retries && error instanceof Error && error.name === "AbortError") {
        await delay(retryDelayMs * Math.pow(2, attempt));
        continue;
      }
      if (attempt === retries) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new FetchError(`Failed to fetch ${url}: ${reason}`, url, undefined, { cause: error });
      }
    } finally {
      clearTimeout(timeout);
    }
  }

  throw new FetchError(`Failed to fetch ${url} after ${retries} retries`, url);
}

/** fetchPage for JSON APIs. Returns the parsed body as unknown; callers narrow it. */
export async function fetchJson(url: string, options: FetchJsonOptions = {}): Promise<unknown> {
  const { cacheIf, ...pageOptions } = options;
  const body = await fetchPage(url, {
    ...pageOptions,
    accept: "application/json",
    shouldCache: cacheIf ? (text) => cacheIf(parseJson(text)) : undefined,
  });
  try {
    return JSON.parse(body);
  } catch (error) {
    throw new FetchError(`Invalid JSON from ${url}`, url, undefined, { cause: error });
  }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
