import { errorMessage } from "../errors.js";
import { log } from "../logger.js";
import type { IpoEntry } from "../types.js";
import { detectNew } from "./detectNew.js";
import { parseEntries } from "./parseEntry.js";

export type IpoStore = {
  loadKnownIds(): Set<number>;
  insertIfAbsent(entries: readonly IpoEntry[]): number;
};

export type CycleDeps = {
  store: IpoStore;
  /** Rows as delivered upstream, unvalidated */
  acquire: () => Promise<unknown[]>;
  notify: (entry: IpoEntry) => Promise<boolean>;
};

export type CycleReport = {
  fetched: number;
  parsed: number;
  fresh: IpoEntry[];
  notified: number;
  failed: number;
};

/**
 * One poll: fetch → parse → diff → persist → notify. Acquisition and
 * delivery failures are logged and absorbed; store failures propagate.
 */
export async function runCheckCycle(deps: CycleDeps): Promise<CycleReport> {
  const started = Date.now();
  log.info("[CYCLE] checking for new IPO entries");

  const known = deps.store.loadKnownIds();

  let raws: unknown[] = [];
  try {
    raws = await deps.acquire();
  } catch (err) {
    log.error("[CYCLE] acquisition error", { error: errorMessage(err) });
  }

  const entries = parseEntries(raws);
  const fresh = detectNew(entries, known);
  const report: CycleReport = {
    fetched: raws.length,
    parsed: entries.length,
    fresh,
    notified: 0,
    failed: 0,
  };

  if (!fresh.length) {
    log.info("[CYCLE] No new IPO entries found", {
      fetched: raws.length,
      tookMs: Date.now() - started,
    });
    return report;
  }

  log.info(`[CYCLE] Found ${fresh.length} new IPO entries`);
  const inserted = deps.store.insertIfAbsent(fresh);
  log.info("[DB] saved", { inserted });

  for (const entry of fresh) {
    let ok = false;
    try {
      ok = await deps.notify(entry);
    } catch (err) {
      log.error("[CYCLE] notify threw", {
        id: entry.id,
        error: errorMessage(err),
      });
    }
    if (ok) report.notified++;
    else report.failed++;
  }

  log.info("[CYCLE] end", {
    fresh: fresh.length,
    notified: report.notified,
    failed: report.failed,
    tookMs: Date.now() - started,
  });
  return report;
}
