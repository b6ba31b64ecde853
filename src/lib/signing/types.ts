import type { CollectedFirmware } from "../types";

/**
 * Answers whether Apple currently signs a firmware build for a device.
 * Implementations throw CheckerUnavailable when they cannot tell.
 */
export interface SigningChecker {
  name: string;
  isSigned(firmware: CollectedFirmware): Promise<boolean>;
}
