import { Response } from "undici";
import type { CatalogStore } from "../catalog";

const BETAS_PATH = /^\/betas\/([^/]+)\/?$/;

/** GET /betas/{identifier} */
export function getBetas(identifier: string, store: CatalogStore): Response {
  const firmwares = store.snapshot.get(identifier);
  if (!firmwares) {
    return Response.json({ error: "Unknown identifier" }, { status: 404 });
  }
  return Response.json(firmwares);
}

function decodeSegment(segment: string): string | null {
  try {
    return decodeURIComponent(segment);
  } catch {
    // malformed percent-escape
    return null;
  }
}

export function handleRequest(method: string, rawUrl: string, store: CatalogStore): Response {
  try {
    const { pathname } = new URL(rawUrl, "http://localhost");
    const match = pathname.match(BETAS_PATH);
    if (!match) {
      return Response.json({ error: "Not found" }, { status: 404 });
    }
    if (method !== "GET" && method !== "HEAD") {
      return Response.json({ error: "Method not allowed" }, { status: 405, headers: { Allow: "GET, HEAD" } });
    }
    const identifier = decodeSegment(match[1]);
    if (identifier === null) {
      return Response.json({ error: "Unknown identifier" }, { status: 404 });
    }
    return getBetas(identifier, store);
  } catch (error) {
    console.error("[api/betas] Error:", error);
    return Response.json(
      { error: error instanceof Error ? error.message : "Failed to fetch firmwares" },
      { status: 500 }
    );
  }
}
