import { inflateRawSync } from "zlib";
import { fetch as undiciFetch } from "undici";
import { config } from "../config";
import { FetchError } from "../errors";

const EOCD_SIGNATURE = 0x06054b50;
const ZIP64_LOCATOR_SIGNATURE = 0x07064b50;
const ZIP64_EOCD_SIGNATURE = 0x06064b50;
const CENTRAL_HEADER_SIGNATURE = 0x02014b50;
const LOCAL_HEADER_SIGNATURE = 0x04034b50;

const EOCD_SIZE = 22;
const ZIP64_LOCATOR_SIZE = 20;
const ZIP64_EOCD_SIZE = 56;
const MAX_COMMENT_SIZE = 0xffff;

const METHOD_STORED = 0;
const METHOD_DEFLATE = 8;

/** Random access to a file that is too large to download, such as a multi-gigabyte IPSW */
export interface RangeSource {
  /** The last `length` bytes (or the whole file when shorter) and the file's total size */
  readTail(length: number): Promise<{ data: Buffer; totalSize: number }>;
  /** Bytes in [start, end) */
  read(start: number, end: number): Promise<Buffer>;
}

export interface ZipEntry {
  name: string;
  method: number;
  compressedSize: number;
  uncompressedSize: number;
  localHeaderOffset: number;
}

export function httpRangeSource(url: string, timeoutMs = 30000): RangeSource {
  async function rangeRequest(range: string): Promise<{ data: Buffer; contentRange: string }> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);
    try {
      const response = await undiciFetch(url, {
        headers: { Range: range, "User-Agent": config.getRandomUserAgent() },
        signal: controller.signal,
      });
      if (response.status !== 206) {
        // A server that ignores Range would stream the whole IPSW
        await response.body?.cancel();
        throw new FetchError(`Expected 206 for range ${range}, got ${response.status}: ${url}`, url, response.status);
      }
      const data = Buffer.from(await response.arrayBuffer());
      return { data, contentRange: response.headers.get("content-range") ?? "" };
    } catch (error) {
      if (error instanceof FetchError) throw error;
      const reason = error instanceof Error ? error.message : String(error);
      throw new FetchError(`Range request failed for ${url}: ${reason}`, url, undefined, { cause: error });
    } finally {
      clearTimeout(timeout);
    }
  }

  return {
    async readTail(length) {
      const { data, contentRange } = await rangeRequest(`bytes=-${length}`);
      const total = contentRange.match(/\/(\d+)$/);
      if (!total) throw new FetchError(`Missing Content-Range total for ${url}`, url, 206);
      return { data, totalSize: parseInt(total[1], 10) };
    },
    async read(start, end) {
      const { data } = await rangeRequest(`bytes=${start}-${end - 1}`);
      return data;
    },
  };
}

/** Read the central directory of a (possibly ZIP64) archive */
export async function listZipEntries(source: RangeSource): Promise<ZipEntry[]> {
  const { data: tail, totalSize } = await source.readTail(
    EOCD_SIZE + MAX_COMMENT_SIZE + ZIP64_LOCATOR_SIZE
  );
  const tailStart = totalSize - tail.length;

  let eocd = -1;
  for (let i = tail.length - EOCD_SIZE; i >= 0; i--) {
    if (tail.readUInt32LE(i) === EOCD_SIGNATURE) {
      eocd = i;
      break;
    }
  }
  if (eocd === -1) throw new Error("End of central directory not found");

  let entryCount = tail.readUInt16LE(eocd + 10);
  let cdSize = tail.readUInt32LE(eocd + 12);
  let cdOffset = tail.readUInt32LE(eocd + 16);

  const locator = eocd - ZIP64_LOCATOR_SIZE;
  if (locator >= 0 && tail.readUInt32LE(locator) === ZIP64_LOCATOR_SIGNATURE) {
    const zip64Offset = Number(tail.readBigUInt64LE(locator + 8));
    const record =
      zip64Offset >= tailStart
        ? tail.subarray(zip64Offset - tailStart, zip64Offset - tailStart + ZIP64_EOCD_SIZE)
        : await source.read(zip64Offset, zip64Offset + ZIP64_EOCD_SIZE);
    if (record.readUInt32LE(0) !== ZIP64_EOCD_SIGNATURE) {
      throw new Error("Malformed ZIP64 end of central directory");
    }
    entryCount = Number(record.readBigUInt64LE(32));
    cdSize = Number(record.readBigUInt64LE(40));
    cdOffset = Number(record.readBigUInt64LE(48));
  }

  const directory =
    cdOffset >= tailStart
      ? tail.subarray(cdOffset - tailStart, cdOffset - tailStart + cdSize)
      : await source.read(cdOffset, cdOffset + cdSize);

  const entries: ZipEntry[] = [];
  let pos = 0;
  for (let i = 0; i < entryCount; i++) {
    if (directory.readUInt32LE(pos) !== CENTRAL_HEADER_SIGNATURE) {
      throw new Error(`Malformed central directory entry at ${cdOffset + pos}`);
    }
    const nameLength = directory.readUInt16LE(pos + 28);
    const extraLength = directory.readUInt16LE(pos + 30);
    const commentLength = directory.readUInt16LE(pos + 32);
    const entry: ZipEntry = {
      name: directory.toString("utf8", pos + 46, pos + 46 + nameLength),
      method: directory.readUInt16LE(pos + 10),
      compressedSize: directory.readUInt32LE(pos + 20),
      uncompressedSize: directory.readUInt32LE(pos + 24),
      localHeaderOffset: directory.readUInt32LE(pos + 42),
    };
    applyZip64Extra(entry, directory.subarray(pos + 46 + nameLength, pos + 46 + nameLength + extraLength));
    entries.push(entry);
    pos += 46 + nameLength + extraLength + commentLength;
  }

  return entries;
}

// 0xFFFFFFFF in a 32-bit field means the real value is in the ZIP64 extra field, in this order
function applyZip64Extra(entry: ZipEntry, extra: Buffer): void {
  let pos = 0;
  while (pos + 4 <= extra.length) {
    const id = extra.readUInt16LE(pos);
    const size = extra.readUInt16LE(pos + 2);
    if (id === 0x0001) {
      let field = pos + 4;
      if (entry.uncompressedSize === 0xffffffff) {
        entry.uncompressedSize = Number(extra.readBigUInt64LE(field));
        field += 8;
      }
      if (entry.compressedSize === 0xffffffff) {
        entry.compressedSize = Number(extra.readBigUInt64LE(field));
        field += 8;
      }
      if (entry.localHeaderOffset === 0xffffffff) {
        entry.localHeaderOffset = Number(extra.readBigUInt64LE(field));
      }
      return;
    }
    pos += 4 + size;
  }
}

export async function readZipEntry(source: RangeSource, entry: ZipEntry): Promise<Buffer> {
  const header = await source.read(entry.localHeaderOffset, entry.localHeaderOffset + 30);
  if (header.readUInt32LE(0) !== LOCAL_HEADER_SIGNATURE) {
    throw new Error(`Malformed local header for ${entry.name}`);
  }
  const dataStart = entry.localHeaderOffset + 30 + header.readUInt16LE(26) + header.readUInt16LE(28);
  const data = await source.read(dataStart, dataStart + entry.compressedSize);

  if (entry.method === METHOD_STORED) return data;
  if (entry.method === METHOD_DEFLATE) return inflateRawSync(data);
  throw new Error(`Unsupported compression method ${entry.method} for ${entry.name}`);
}

/** Fetch one member of a remote archive without downloading the rest. Null when no entry matches. */
export async function extractRemoteEntry(
  source: RangeSource,
  pick: (entries: ZipEntry[]) => ZipEntry | undefined
): Promise<{ name: string; data: Buffer } | null> {
  const entry = pick(await listZipEntries(source));
  if (!entry) return null;
  return { name: entry.name, data: await readZipEntry(source, entry) };
}
