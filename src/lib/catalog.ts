import { firmwareKey } from "./types";
import type { CatalogDocument, FirmwareRecord } from "./types";

const BUILD_PARTS = /^(\d+)([A-Z])(\d+)([a-z]?)$/;

/**
 * Order Apple build numbers ("21A5277j"): major, train letter, build number,
 * then suffix letter. Unparseable builds fall back to plain string order.
 */
export function compareBuilds(a: string, b: string): number {
  const pa = a.match(BUILD_PARTS);
  const pb = b.match(BUILD_PARTS);
  if (!pa || !pb) return compareStrings(a, b);

  return (
    parseInt(pa[1], 10) - parseInt(pb[1], 10) ||
    compareStrings(pa[2], pb[2]) ||
    parseInt(pa[3], 10) - parseInt(pb[3], 10) ||
    compareStrings(pa[4], pb[4])
  );
}

function compareStrings(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Group records by identifier. The first record wins for a repeated
 * (identifier, build); identifiers sort ascending, builds newest first.
 */
export function buildCatalog(records: FirmwareRecord[]): CatalogDocument {
  const seen = new Set<string>();
  const groups = new Map<string, FirmwareRecord[]>();

  for (const record of records) {
    const key = firmwareKey(record.identifier, record.build);
    if (seen.has(key)) continue;
    seen.add(key);

    const group = groups.get(record.identifier);
    if (group) group.push(record);
    else groups.set(record.identifier, [record]);
  }

  const document: CatalogDocument = {};
  for (const identifier of Array.from(groups.keys()).sort(compareStrings)) {
    const group = groups.get(identifier) ?? [];
    document[identifier] = group.sort(
      (a, b) => compareBuilds(b.build, a.build) || compareStrings(a.url, b.url)
    );
  }
  return document;
}

export function countRecords(document: CatalogDocument): number {
  return Object.values(document).reduce((sum, records) => sum + records.length, 0);
}

/** Deep-frozen copy of one published catalog */
export class CatalogSnapshot {
  readonly document: Readonly<CatalogDocument>;
  private readonly byKey = new Map<string, readonly FirmwareRecord[]>();

  constructor(
    document: CatalogDocument,
    readonly runId: string | null = null
  ) {
    const copy = structuredClone(document);
    for (const [identifier, records] of Object.entries(copy)) {
      for (const record of records) Object.freeze(record);
      this.byKey.set(identifier.toLowerCase(), Object.freeze(records));
    }
    this.document = Object.freeze(copy);
  }

  static empty(): CatalogSnapshot {
    return new CatalogSnapshot({});
  }

  /** Records for an identifier, matched case-insensitively; null when unknown */
  get(identifier: string): readonly FirmwareRecord[] | null {
    return this.byKey.get(identifier.toLowerCase()) ?? null;
  }

  get deviceCount(): number {
    return this.byKey.size;
  }
}

/** Holds the snapshot currently being served; a publish replaces the reference in one step */
export class CatalogStore {
  private current: CatalogSnapshot;

  constructor(initial: CatalogSnapshot = CatalogSnapshot.empty()) {
    this.current = initial;
  }

  get snapshot(): CatalogSnapshot {
    return this.current;
  }

  swap(next: CatalogSnapshot): CatalogSnapshot {
    const previous = this.current;
    this.current = next;
    return previous;
  }
}
