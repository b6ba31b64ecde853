import { errorMessage } from "./errors";

export interface Scheduler {
  stop(): Promise<void>;
}

/**
 * Run `task` now and then `intervalMs` after each run finishes. Runs never
 * overlap; a failing run is logged and the schedule continues.
 */
export function startScheduler(task: () => Promise<unknown>, intervalMs: number): Scheduler {
  let timer: NodeJS.Timeout | null = null;
  let stopped = false;
  let inFlight: Promise<void> = Promise.resolve();

  const tick = () => {
    timer = null;
    inFlight = task()
      .then(
        () => undefined,
        (err: unknown) => {
          console.error("[scheduler] Run failed:", errorMessage(err));
        }
      )
      .then(() => {
        if (stopped) return;
        console.log(`[scheduler] Next run in ${Math.round(intervalMs / 60000)} min`);
        timer = setTimeout(tick, intervalMs);
      });
  };

  tick();

  return {
    async stop() {
      stopped = true;
      if (timer) clearTimeout(timer);
      timer = null;
      await inFlight;
    },
  };
}
