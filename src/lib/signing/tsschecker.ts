import { spawn } from "child_process";
import fs from "fs";
import os from "os";
import path from "path";
import { config } from "../config";
import { CheckerUnavailable, errorMessage } from "../errors";
import { fetchJson, isRecord } from "../scraping/utils";
import type { CollectedFirmware } from "../types";
import { extractRemoteEntry, httpRangeSource } from "./remote-zip";
import type { ZipEntry } from "./remote-zip";
import type { SigningChecker } from "./types";

// Downloads behind a developer login cannot be range-read anonymously
const RESTRICTED_HOSTS = ["developer.apple.com", "adcdownload.apple.com"];

export interface CommandResult {
  code: number | null;
  stdout: string;
  stderr: string;
}

export interface TssCheckerDeps {
  lookupBoardConfig(identifier: string): Promise<string>;
  fetchManifest(url: string): Promise<Buffer>;
  runCommand(file: string, args: string[], timeoutMs: number): Promise<CommandResult>;
}

export interface TssCheckerOptions {
  binaryPath: string;
  timeoutMs: number;
}

/** true / false from tsschecker's verdict line, null when it printed neither */
export function parseTssOutput(stdout: string): boolean | null {
  if (/IS NOT being signed/i.test(stdout)) return false;
  if (/IS being signed/i.test(stdout)) return true;
  return null;
}

function isMissingBinary(err: unknown): err is Error {
  return err instanceof Error && "code" in err && (err.code === "ENOENT" || err.code === "EACCES");
}

export function isRestrictedUrl(url: string): boolean {
  try {
    const host = new URL(url).hostname;
    return RESTRICTED_HOSTS.some((h) => host === h || host.endsWith(`.${h}`));
  } catch {
    return true;
  }
}

/** BuildManifest.plist, or failing that the first entry with "Manifest" in its name */
export function pickManifestEntry(entries: ZipEntry[]): ZipEntry | undefined {
  return (
    entries.find((e) => path.posix.basename(e.name) === "BuildManifest.plist") ??
    entries.find((e) => e.name.includes("Manifest"))
  );
}

function boardConfigOf(body: unknown): string | null {
  const boards = isRecord(body) ? body.boards : undefined;
  const first: unknown = Array.isArray(boards) ? boards[0] : undefined;
  return isRecord(first) && typeof first.boardconfig === "string" ? first.boardconfig : null;
}

export async function lookupBoardConfig(identifier: string): Promise<string> {
  const url = `${config.ipswApiUrl}/device/${encodeURIComponent(identifier)}?type=ipsw`;
  const body = await fetchJson(url, {
    retries: 2,
    cacheTtlMs: 24 * 60 * 60 * 1000,
    cacheIf: (json) => boardConfigOf(json) !== null,
  });
  const boardConfig = boardConfigOf(body);
  if (boardConfig === null) throw new Error(`No board config listed for ${identifier}`);
  return boardConfig;
}

export async function fetchManifest(url: string): Promise<Buffer> {
  const entry = await extractRemoteEntry(httpRangeSource(url), pickManifestEntry);
  if (!entry) throw new Error(`No build manifest inside ${url}`);
  return entry.data;
}

export function runCommand(file: string, args: string[], timeoutMs: number): Promise<CommandResult> {
  return new Promise((resolve, reject) => {
    const child = spawn(file, args, { stdio: ["ignore", "pipe", "pipe"] });
    let stdout = "";
    let stderr = "";

    const timer = setTimeout(() => {
      child.kill("SIGKILL");
      reject(new Error(`${file} timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    child.stdout.setEncoding("utf8");
    child.stderr.setEncoding("utf8");
    child.stdout.on("data", (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.on("data", (chunk: string) => {
      stderr += chunk;
    });

    child.on("error", (err) => {
      clearTimeout(timer);
      reject(err);
    });
    child.on("close", (code) => {
      clearTimeout(timer);
      resolve({ code, stdout, stderr });
    });
  });
}

/**
 * Signing status through tsschecker. Beta builds are missing from the public
 * firmware index tsschecker normally consults, so each check hands it the
 * build manifest pulled out of the IPSW itself.
 */
export class TssSigningChecker implements SigningChecker {
  readonly name = "tsschecker";
  private readonly boardConfigs = new Map<string, Promise<string>>();
  /** Resolves to the reason the binary cannot run, or null once it has run */
  private preflight: Promise<Error | null> | null = null;
  private readonly options: TssCheckerOptions;
  private readonly deps: TssCheckerDeps;

  constructor(options: Partial<TssCheckerOptions> = {}, deps: Partial<TssCheckerDeps> = {}) {
    this.options = {
      binaryPath: options.binaryPath ?? config.tsscheckerPath,
      timeoutMs: options.timeoutMs ?? config.checkerTimeoutMs,
    };
    this.deps = {
      lookupBoardConfig: deps.lookupBoardConfig ?? lookupBoardConfig,
      fetchManifest: deps.fetchManifest ?? fetchManifest,
      runCommand: deps.runCommand ?? runCommand,
    };
  }

  async isSigned(firmware: CollectedFirmware): Promise<boolean> {
    const { identifier, build, url } = firmware;
    const unavailable = (reason: string, cause?: unknown) =>
      new CheckerUnavailable(`${identifier} ${build}: ${reason}`, identifier, build, { cause });

    if (isRestrictedUrl(url)) throw unavailable(`IPSW host requires a login: ${url}`);

    const missing = await this.checkBinary();
    if (missing) {
      throw unavailable(`could not run ${this.options.binaryPath}: ${missing.message}`, missing);
    }

    let boardConfig: string;
    let manifest: Buffer;
    try {
      [boardConfig, manifest] = await Promise.all([
        this.getBoardConfig(identifier),
        this.deps.fetchManifest(url),
      ]);
    } catch (err) {
      throw unavailable(errorMessage(err), err);
    }

    const tmpDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "tss-"));
    try {
      const manifestPath = path.join(tmpDir, "BuildManifest.plist");
      await fs.promises.writeFile(manifestPath, manifest);

      let result: CommandResult;
      try {
        result = await this.deps.runCommand(
          this.options.binaryPath,
          ["-d", identifier, "-B", boardConfig, "-m", manifestPath],
          this.options.timeoutMs
        );
      } catch (err) {
        if (isMissingBinary(err)) this.preflight = Promise.resolve(err);
        throw unavailable(`could not run ${this.options.binaryPath}: ${errorMessage(err)}`, err);
      }

      const signed = parseTssOutput(result.stdout);
      if (signed === null) {
        const detail = result.stderr.trim().split("\n").pop() || `exit code ${result.code}`;
        throw unavailable(`no signing verdict from ${this.options.binaryPath} (${detail})`);
      }
      return signed;
    } finally {
      await fs.promises.rm(tmpDir, { recursive: true, force: true });
    }
  }

  /** Run `tsschecker -h` once, so a missing binary fails before any IPSW is read */
  private checkBinary(): Promise<Error | null> {
    if (!this.preflight) {
      const { binaryPath, timeoutMs } = this.options;
      this.preflight = this.deps.runCommand(binaryPath, ["-h"], timeoutMs).then(
        () => null,
        (err: unknown) => {
          const error = err instanceof Error ? err : new Error(String(err));
          console.warn(`[tsschecker] ${binaryPath} is not runnable, skipping signing checks:`, error.message);
          return error;
        }
      );
    }
    return this.preflight;
  }

  private getBoardConfig(identifier: string): Promise<string> {
    const key = identifier.toLowerCase();
    let pending = this.boardConfigs.get(key);
    if (!pending) {
      // A failed lookup is retried by the next record of the device
      pending = this.deps.lookupBoardConfig(identifier).catch((err: unknown) => {
        this.boardConfigs.delete(key);
        throw err;
      });
      this.boardConfigs.set(key, pending);
    }
    return pending;
  }
}
