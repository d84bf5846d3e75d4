import {
  CapabilityUnavailableError,
  errorMessage,
} from "../errors.js";
import { log } from "../logger.js";
import type { CalendarRequest } from "../types.js";
import { decodeCalendarPayload } from "./ipoCalendar.js";

/**
 * One tier of the acquisition chain. `attempt` resolves with the decoded
 * JSON body or throws TransportError / DecodeError.
 */
export interface FetchStrategy {
  readonly name: string;
  readonly maxAttempts: number;
  /** Set when this tier cannot run in the current deployment. */
  readonly unavailableReason?: string;
  attempt(req: CalendarRequest): Promise<unknown>;
}

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) =>
  new Promise((resolve) => setTimeout(resolve, ms));

/** Delay after failed attempt `attempt` (1-based): 2^attempt seconds. */
export const backoffMs = (attempt: number) => 2 ** attempt * 1000;

/**
 * Run one strategy up to its attempt budget. Returns the rows on the first
 * attempt whose body carries a `data` collection, or null once exhausted.
 */
export async function attemptWithRetries(
  strategy: FetchStrategy,
  req: CalendarRequest,
  wait: Sleep = sleep
): Promise<unknown[] | null> {
  for (let attempt = 1; attempt <= strategy.maxAttempts; attempt++) {
    try {
      const rows = decodeCalendarPayload(await strategy.attempt(req));
      log.info(`[FETCH] ${strategy.name} ok`, { attempt, rows: rows.length });
      return rows;
    } catch (err) {
      log.warn(`[FETCH] ${strategy.name} failed`, {
        attempt,
        of: strategy.maxAttempts,
        error: errorMessage(err),
      });
      if (attempt < strategy.maxAttempts) {
        const delay = backoffMs(attempt);
        log.info(`[FETCH] ${strategy.name} retrying`, { inMs: delay });
        await wait(delay);
      }
    }
  }
  return null;
}

/**
 * Try each tier in order until one yields rows. Never throws for
 * acquisition failures; an exhausted chain yields [].
 */
export async function fetchIpoRecords(
  strategies: readonly FetchStrategy[],
  req: CalendarRequest,
  wait: Sleep = sleep
): Promise<unknown[]> {
  for (const strategy of strategies) {
    if (strategy.unavailableReason) {
      const err = new CapabilityUnavailableError(
        `${strategy.name} tier unavailable: ${strategy.unavailableReason}`
      );
      log.error("[FETCH] giving up this cycle", { error: err });
      return [];
    }
    const rows = await attemptWithRetries(strategy, req, wait);
    if (rows) return rows;
    log.warn(`[FETCH] ${strategy.name} exhausted, falling back`);
  }
  log.error("[FETCH] all acquisition tiers exhausted");
  return [];
}
