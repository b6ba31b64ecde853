/**
 * Lightweight profiling for pipeline runs.
 * Records phase name + elapsed ms, then prints a summary table.
 */

interface TimerEntry {
  label: string;
  startMs: number;
  endMs?: number;
  meta?: Record<string, number | string>;
}

interface CompletedEntry {
  label: string;
  durationMs: number;
  meta?: Record<string, number | string>;
}

// Sub-phase prefixes printed under each pipeline phase
const SUB_PHASES: Record<string, string> = {
  "pipeline:collect": "collect:",
  "pipeline:enrich": "check:",
  "pipeline:publish": "publish:",
};

const MAX_SUB_ENTRIES = 10;

class PipelineProfiler {
  private timers: TimerEntry[] = [];
  private active = new Map<string, TimerEntry>();

  start(label: string): void {
    const entry: TimerEntry = { label, startMs: Date.now() };
    this.active.set(label, entry);
    this.timers.push(entry);
  }

  stop(label: string, meta?: Record<string, number | string>): number {
    const entry = this.active.get(label);
    if (!entry) {
      console.warn(`[profiler] No active timer for "${label}"`);
      return 0;
    }
    entry.endMs = Date.now();
    if (meta) entry.meta = { ...entry.meta, ...meta };
    this.active.delete(label);
    return entry.endMs - entry.startMs;
  }

  /** Wrap an async operation with timing */
  async time<T>(label: string, fn: () => Promise<T>, meta?: Record<string, number | string>): Promise<T> {
    this.start(label);
    try {
      const result = await fn();
      this.stop(label, meta);
      return result;
    } catch (err) {
      this.stop(label, { error: "failed" });
      throw err;
    }
  }

  /** Print pipeline phases in run order, each followed by its slowest sub-phases */
  printSummary(): void {
    const completed: CompletedEntry[] = [];
    for (const t of this.timers) {
      if (t.endMs === undefined) continue;
      completed.push({ label: t.label, durationMs: t.endMs - t.startMs, meta: t.meta });
    }
    if (completed.length === 0) return;

    console.log("\n=== Pipeline Profile ===");

    for (const entry of completed.filter((t) => t.label.startsWith("pipeline:"))) {
      printEntry(entry, 0);

      const prefix = SUB_PHASES[entry.label];
      if (!prefix) continue;
      const subs = completed
        .filter((t) => t.label.startsWith(prefix))
        .sort((a, b) => b.durationMs - a.durationMs);
      for (const sub of subs.slice(0, MAX_SUB_ENTRIES)) {
        printEntry(sub, 1);
      }
      if (subs.length > MAX_SUB_ENTRIES) {
        console.log(`    ... and ${subs.length - MAX_SUB_ENTRIES} more`);
      }
    }

    console.log("");
  }

  reset(): void {
    this.timers = [];
    this.active.clear();
  }
}

function printEntry(entry: CompletedEntry, indent: number): void {
  const pad = "  ".repeat(indent);
  const label = entry.label.padEnd(45 - indent * 2);
  const duration = `${entry.durationMs}ms`.padStart(8);
  const metaStr = entry.meta
    ? "  " + Object.entries(entry.meta).map(([k, v]) => `${k}=${v}`).join(", ")
    : "";
  console.log(`${pad}${label} ${duration}${metaStr}`);
}

// Singleton profiler instance
export const profiler = new PipelineProfiler();
