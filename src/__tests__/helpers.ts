import type { CollectedFirmware, FirmwareRecord } from "../lib/types";

export function makeFirmware(overrides: Partial<CollectedFirmware> = {}): CollectedFirmware {
  const identifier = overrides.identifier ?? "iPhone14,5";
  const build = overrides.build ?? "21A5248v";
  return {
    identifier,
    version: "17.0 beta",
    build,
    url: `https://updates.example.com/seed/${identifier}_${build}_Restore.ipsw`,
    releaseDate: "2023-06-05",
    filesize: 7123456789,
    ...overrides,
  };
}

export function makeRecord(overrides: Partial<FirmwareRecord> = {}): FirmwareRecord {
  return {
    ...makeFirmware(overrides),
    signed: false,
    signedCheckedAt: "2023-06-06T00:00:00.000Z",
    ...overrides,
  };
}
