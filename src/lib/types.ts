// ===== Enums =====

export enum DeviceFamily {
  APPLE_TV = "Apple TV",
  IPAD = "iPad",
  IPHONE = "iPhone",
  IPOD_TOUCH = "iPod touch",
}

export enum RunStatus {
  PUBLISHED = "published",
  FAILED = "failed",
}

// ===== Firmware (collector output) =====

/** One IPSW as listed on a wiki beta page, before signing status is known */
export interface CollectedFirmware {
  identifier: string; // device model code, e.g. "iPhone14,5"
  version: string; // "17.0 beta 3"
  build: string; // "21A5277j"
  url: string;
  releaseDate: string | null; // YYYY-MM-DD
  filesize: number | null; // bytes
}

/** A firmware with its signing status attached */
export interface FirmwareRecord extends CollectedFirmware {
  signed: boolean | null; // null = unknown
  signedCheckedAt: string | null; // last successful check
}

/** identifier → records, newest build first */
export type CatalogDocument = Record<string, FirmwareRecord[]>;

// ===== Pipeline =====

export interface PipelineScope {
  families: DeviceFamily[];
  skipSigningCheck: boolean;
}

export interface PageError {
  page: string;
  error: string;
  timestamp: string;
}

export interface PipelineRun {
  id: string;
  startedAt: string;
  durationMs: number;
  status: RunStatus;
  pageCount: number;
  failedPageCount: number;
  recordCount: number;
  deviceCount: number;
  errors: PageError[];
}

export interface PipelineResult {
  run: PipelineRun;
  catalog: CatalogDocument | null; // null when nothing was published
}

export function firmwareKey(identifier: string, build: string): string {
  return `${identifier.toLowerCase()}|${build}`;
}
