import { errorMessage } from "./errors";
import { profiler } from "./profiler";
import type { SigningChecker } from "./signing/types";
import { firmwareKey } from "./types";
import type { CatalogDocument, CollectedFirmware, FirmwareRecord } from "./types";

export interface EnrichOptions {
  /** null skips checking: every record keeps its previous status */
  checker: SigningChecker | null;
  previous?: CatalogDocument;
  concurrency?: number;
  now?: () => Date;
}

export interface EnrichResult {
  records: FirmwareRecord[];
  checked: number;
  failed: number;
}

type SigningStatus = Pick<FirmwareRecord, "signed" | "signedCheckedAt">;

const UNKNOWN: SigningStatus = { signed: null, signedCheckedAt: null };

export function indexSigningStatus(document: CatalogDocument): Map<string, SigningStatus> {
  const index = new Map<string, SigningStatus>();
  for (const records of Object.values(document)) {
    for (const r of records) {
      index.set(firmwareKey(r.identifier, r.build), {
        signed: r.signed,
        signedCheckedAt: r.signedCheckedAt,
      });
    }
  }
  return index;
}

/**
 * Attach signing status to each firmware. A failed check never downgrades a
 * known status: the record keeps the previous run's value and its older
 * signedCheckedAt. Output order matches input order.
 */
export async function enrichFirmwares(
  firmwares: CollectedFirmware[],
  options: EnrichOptions
): Promise<EnrichResult> {
  const { checker, previous = {}, concurrency = 4, now = () => new Date() } = options;
  const known = indexSigningStatus(previous);
  const lastKnown = (f: CollectedFirmware) => known.get(firmwareKey(f.identifier, f.build)) ?? UNKNOWN;

  if (!checker) {
    return {
      records: firmwares.map((f) => ({ ...f, ...lastKnown(f) })),
      checked: 0,
      failed: 0,
    };
  }

  const records: FirmwareRecord[] = [];
  let checked = 0;
  let failed = 0;
  const batchSize = Math.max(1, concurrency);

  for (let i = 0; i < firmwares.length; i += batchSize) {
    const batch = firmwares.slice(i, i + batchSize);
    const results = await Promise.all(
      batch.map(async (firmware): Promise<FirmwareRecord> => {
        const label = `check:${firmware.identifier}:${firmware.build}`;
        profiler.start(label);
        try {
          const signed = await checker.isSigned(firmware);
          profiler.stop(label, { signed: String(signed) });
          checked++;
          return { ...firmware, signed, signedCheckedAt: now().toISOString() };
        } catch (err) {
          profiler.stop(label, { error: "failed" });
          failed++;
          console.warn(
            `[enricher] ${checker.name} failed for ${firmware.identifier} ${firmware.build}:`,
            errorMessage(err)
          );
          return { ...firmware, ...lastKnown(firmware) };
        }
      })
    );
    records.push(...results);
  }

  console.log(`[enricher] Checked ${checked} firmwares, ${failed} unavailable`);
  return { records, checked, failed };
}
