import * as cheerio from "cheerio";
import { ParseError } from "../errors";
import { firmwareKey } from "../types";
import type { CollectedFirmware } from "../types";

const DEVICE_PATTERN = /(?:iPhone|AppleTV|iPad|iPod)\d+,\d+/g;
const BUILD_PATTERN = /\b\d{1,2}[A-Z]\d{1,4}[a-z]?\b/g;
const IPSW_URL_PATTERN = /^https?:\/\/\S+\.ipsw$/i;

const MONTHS: Record<string, number> = {
  january: 1,
  february: 2,
  march: 3,
  april: 4,
  may: 5,
  june: 6,
  july: 7,
  august: 8,
  september: 9,
  october: 10,
  november: 11,
  december: 12,
};

interface GridCell {
  text: string;
  links: string[];
}

interface ColumnMap {
  version: number;
  build: number;
  devices: number;
  releaseDate: number | null;
  download: number | null;
  size: number | null;
}

export interface FirmwareTableResult {
  records: CollectedFirmware[];
  tableCount: number;
  skippedRows: number;
}

/**
 * Extract every IPSW listed in the firmware tables of a rendered beta page.
 * Throws ParseError when the page has no table with Version, Build and device columns.
 */
export function parseFirmwareTables(html: string, page: string): FirmwareTableResult {
  const $ = cheerio.load(html);
  const records: CollectedFirmware[] = [];
  const seen = new Set<string>();
  let tableCount = 0;
  let skippedRows = 0;

  $("table").each((tableIndex) => {
    const grid = readGrid($, tableIndex);
    if (grid.length < 2) return;

    const columns = mapColumns(grid[0]);
    if (!columns) return;
    tableCount++;

    for (const row of grid.slice(1)) {
      const firmwares = readRow(row, columns);
      if (firmwares.length === 0) {
        skippedRows++;
        continue;
      }
      for (const firmware of firmwares) {
        const key = firmwareKey(firmware.identifier, firmware.build);
        if (seen.has(key)) continue;
        seen.add(key);
        records.push(firmware);
      }
    }
  });

  if (tableCount === 0) {
    throw new ParseError(`No firmware table found on "${page}"`, page);
  }

  return { records, tableCount, skippedRows };
}

/** Table rows as a rectangular grid, with rowspan/colspan cells repeated into every slot they cover */
function readGrid($: cheerio.CheerioAPI, tableIndex: number): GridCell[][] {
  const grid: GridCell[][] = [];
  const carried: { cell: GridCell; rowsLeft: number }[] = [];

  $("table")
    .eq(tableIndex)
    .find("tr")
    .each((_, tr) => {
      const row: GridCell[] = [];
      let col = 0;

      const fillCarried = () => {
        while (carried[col] && carried[col].rowsLeft > 0) {
          row[col] = carried[col].cell;
          carried[col].rowsLeft--;
          col++;
        }
      };

      $(tr)
        .children("th, td")
        .each((_, el) => {
          fillCarried();

          const $cell = $(el).clone();
          $cell.find("sup.reference").remove();
          $cell.find("br").replaceWith("\n");
          const cell: GridCell = {
            text: $cell.text().replace(/[ \t]+/g, " ").trim(),
            links: $cell
              .find("a[href]")
              .map((_, a) => $(a).attr("href"))
              .get(),
          };

          const colspan = Math.max(1, parseInt($(el).attr("colspan") ?? "1", 10) || 1);
          const rowspan = Math.max(1, parseInt($(el).attr("rowspan") ?? "1", 10) || 1);
          for (let i = 0; i < colspan; i++) {
            row[col] = cell;
            carried[col] = { cell, rowsLeft: rowspan - 1 };
            col++;
          }
        });

      fillCarried();
      // Trailing columns still covered by a rowspan from an earlier row
      for (let c = col; c < carried.length; c++) {
        const pending = carried[c];
        if (pending && pending.rowsLeft > 0) {
          row[c] = pending.cell;
          pending.rowsLeft--;
        }
      }

      if (row.length > 0) grid.push(Array.from(row, (cell) => cell ?? { text: "", links: [] }));
    });

  return grid;
}

function mapColumns(header: GridCell[]): ColumnMap | null {
  const names = header.map((cell) => cell.text.toLowerCase());
  const find = (...patterns: RegExp[]): number | null => {
    for (const pattern of patterns) {
      const index = names.findIndex((name) => pattern.test(name));
      if (index !== -1) return index;
    }
    return null;
  };

  const version = find(/^version/);
  const build = find(/^build/);
  const devices = find(/keys/, /codename/, /device/);
  if (version === null || build === null || devices === null) return null;

  return {
    version,
    build,
    devices,
    releaseDate: find(/release date/, /^date/),
    download: find(/download/, /url/),
    size: find(/size/),
  };
}

function readRow(row: GridCell[], columns: ColumnMap): CollectedFirmware[] {
  const version = row[columns.version]?.text.replace(/\s+/g, " ").trim();
  if (!version) return [];

  const builds = uniqueMatches(row[columns.build]?.text ?? "", BUILD_PATTERN);
  const devices = uniqueMatches(row[columns.devices]?.text ?? "", DEVICE_PATTERN);
  const linkCells = columns.download !== null ? [row[columns.download]] : row;
  const urls = uniqueValues(
    linkCells.flatMap((cell) => cell?.links ?? []).filter((href) => IPSW_URL_PATTERN.test(href))
  );
  if (builds.length === 0 || devices.length === 0 || urls.length === 0) return [];

  const sizes = columns.size !== null ? parseSizes(row[columns.size]?.text ?? "") : [];
  const releaseDate =
    columns.releaseDate !== null ? parseReleaseDate(row[columns.releaseDate]?.text ?? "") : null;

  return devices.map((identifier, d) => {
    const urlIndex = pairIndex(d, devices.length, urls.length);
    return {
      identifier,
      version,
      build: builds[pairIndex(d, devices.length, builds.length)],
      url: urls[urlIndex],
      releaseDate,
      filesize: sizes.length === urls.length ? sizes[urlIndex] : null,
    };
  });
}

/**
 * Which of `count` builds or URLs belongs to device `index` of `deviceCount`.
 * Rows listing several IPSWs cover the devices in equal consecutive groups.
 */
export function pairIndex(index: number, deviceCount: number, count: number): number {
  if (count <= 1) return 0;
  return Math.min(count - 1, Math.floor((index * count) / deviceCount));
}

export function parseSizes(raw: string): number[] {
  const sizes: number[] = [];
  for (const word of raw.replace(/,/g, "").split(/\s+/)) {
    if (!/^\d+$/.test(word)) continue;
    const value = parseInt(word, 10);
    if (value > 10) sizes.push(value);
  }
  return sizes;
}

/** "June 5, 2023" or "2023-06-05" → "2023-06-05" */
export function parseReleaseDate(raw: string): string | null {
  const text = raw.trim();
  const iso = text.match(/^(\d{4})-(\d{2})-(\d{2})/);
  if (iso) return `${iso[1]}-${iso[2]}-${iso[3]}`;

  const long = text.match(/^([A-Za-z]+)\.?\s+(\d{1,2}),?\s+(\d{4})/);
  if (!long) return null;
  const month = Object.entries(MONTHS).find(([name]) => name.startsWith(long[1].toLowerCase()));
  if (!month || long[1].length < 3) return null;

  const day = parseInt(long[2], 10);
  if (day < 1 || day > 31) return null;
  return `${long[3]}-${String(month[1]).padStart(2, "0")}-${String(day).padStart(2, "0")}`;
}

function uniqueMatches(text: string, pattern: RegExp): string[] {
  return uniqueValues(Array.from(text.matchAll(pattern), (m) => m[0]));
}

function uniqueValues(values: string[]): string[] {
  return Array.from(new Set(values));
}
