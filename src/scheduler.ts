import { errorMessage } from "./errors.js";
import { log } from "./logger.js";

export type SchedulerOptions = {
  intervalMs: number;
  /** How often to wake and check whether a run is due */
  wakeMs: number;
  onError?: (err: unknown) => void;
  now?: () => number;
};

export type SchedulerHandle = {
  stop(): void;
  /** Resolves once the in-flight run (if any) settles */
  idle(): Promise<void>;
};

/**
 * Run `job` now, then whenever `intervalMs` has passed since the last start,
 * checked every `wakeMs`. Never overlaps runs.
 */
export function startScheduler(
  job: () => Promise<unknown>,
  opts: SchedulerOptions
): SchedulerHandle {
  const now = opts.now ?? Date.now;
  let lastStart = 0;
  let inFlight: Promise<void> | null = null;

  const run = () => {
    lastStart = now();
    inFlight = job()
      .then(() => undefined)
      .catch((err) => {
        if (opts.onError) opts.onError(err);
        else log.error("[SCHED] job failed", { error: errorMessage(err) });
      })
      .finally(() => {
        inFlight = null;
      });
  };

  const tick = () => {
    if (inFlight) return;
    if (now() - lastStart >= opts.intervalMs) run();
  };

  run();
  const timer = setInterval(tick, opts.wakeMs);

  return {
    stop: () => clearInterval(timer),
    idle: async () => {
      while (inFlight) await inFlight;
    },
  };
}
