import { DeviceFamily } from "../types";

export const BETA_PAGE_PREFIX = "Beta Firmware/";

// Older beta pages list OTA-only or developer-portal builds with no public IPSW
const MIN_MAJOR_VERSION: Record<DeviceFamily, number> = {
  [DeviceFamily.APPLE_TV]: 7,
  [DeviceFamily.IPAD]: 9,
  [DeviceFamily.IPHONE]: 9,
  [DeviceFamily.IPOD_TOUCH]: 9,
};

export const ALL_FAMILIES: DeviceFamily[] = Object.values(DeviceFamily);

export interface BetaPageRef {
  title: string;
  family: DeviceFamily;
  majorVersion: number;
}

/**
 * Parse a title such as "Beta Firmware/iPad Pro/17.x". Returns null for pages
 * that are not per-major-version listings or belong to no known family.
 */
export function parseBetaPageTitle(title: string): BetaPageRef | null {
  if (!title.startsWith(BETA_PAGE_PREFIX)) return null;

  const parts = title.split("/");
  if (parts.length !== 3) return null;

  const [, familyPart, versionPart] = parts;
  const versionMatch = versionPart.match(/^(\d+)\.x$/);
  if (!versionMatch) return null;

  // "iPad Air", "iPad Pro" and "iPad mini" pages belong to the iPad family
  const family = ALL_FAMILIES.find((f) => familyPart.startsWith(f));
  if (!family) return null;

  return { title, family, majorVersion: parseInt(versionMatch[1], 10) };
}

export function selectBetaPages(titles: string[], families: DeviceFamily[]): BetaPageRef[] {
  const wanted = new Set(families);
  const selected: BetaPageRef[] = [];
  const seen = new Set<string>();

  for (const title of titles) {
    const ref = parseBetaPageTitle(title);
    if (!ref || !wanted.has(ref.family)) continue;
    if (ref.majorVersion < MIN_MAJOR_VERSION[ref.family]) continue;
    if (seen.has(title)) continue;
    seen.add(title);
    selected.push(ref);
  }

  return selected;
}

export function parseFamily(raw: string): DeviceFamily | null {
  const lower = raw.toLowerCase().replace(/\s+/g, "");
  return ALL_FAMILIES.find((f) => f.toLowerCase().replace(/\s+/g, "") === lower) ?? null;
}
