#!/usr/bin/env node
// src/run_alerts.ts
import "dotenv/config";
import { loadConfig } from "./config.js";
import { IpoDB } from "./db/IpoDB.js";
import { StoreError, errorMessage } from "./errors.js";
import { attachLogFile, log } from "./logger.js";
import { createTelegramNotifier } from "./notify/telegram.js";
import { runCheckCycle } from "./pipeline/checkCycle.js";
import { fetchIpoRecords, type FetchStrategy } from "./providers/chain.js";
import { buildCalendarRequest } from "./providers/ipoCalendar.js";
import { BrowserStrategy, detectBrowser } from "./providers/strategies/browser.js";
import { DirectHttpStrategy } from "./providers/strategies/direct.js";
import { ImpersonatedHttpStrategy } from "./providers/strategies/impersonated.js";
import { startScheduler } from "./scheduler.js";

const cfg = loadConfig();
attachLogFile(cfg.logFile);

function fatal(err: unknown): never {
  log.error("[BOOT] fatal", {
    error: errorMessage(err),
    cause: err instanceof StoreError ? errorMessage(err.cause) : undefined,
  });
  process.exit(1);
}

/* ---------------- wiring ---------------- */
function openStore(): IpoDB {
  try {
    return new IpoDB(cfg.dbPath);
  } catch (err) {
    fatal(err);
  }
}
const db = openStore();
log.info("[BOOT] using DB:", cfg.dbPath, { known: db.count() });

const { acquisition } = cfg;
const capability = detectBrowser(acquisition.browser);
if (capability.available) {
  log.info("[BOOT] browser tier ready", { chromium: capability.executablePath });
} else {
  log.warn("[BOOT] browser tier unavailable", { reason: capability.reason });
}

const strategies: FetchStrategy[] = [
  new DirectHttpStrategy({ timeoutMs: acquisition.timeoutMs }),
  new ImpersonatedHttpStrategy({
    maxAttempts: acquisition.maxRetries,
    timeoutMs: acquisition.timeoutMs,
  }),
  new BrowserStrategy(capability, {
    maxAttempts: acquisition.maxRetries,
    settleMs: acquisition.browser.settleMs,
  }),
];
const request = buildCalendarRequest(acquisition.pageLength);
const notify = createTelegramNotifier(cfg.telegram);

const cycle = () =>
  runCheckCycle({
    store: db,
    acquire: () => fetchIpoRecords(strategies, request),
    notify,
  });

/* ---------------- boot ---------------- */
async function main() {
  log.info("Starting IPO Alert System", {
    everyHours: cfg.schedule.intervalMs / 3_600_000,
    telegram: Boolean(cfg.telegram.botToken && cfg.telegram.chatId),
  });

  if (process.argv.includes("--once")) {
    await cycle();
    db.close();
    return;
  }

  const scheduler = startScheduler(cycle, {
    ...cfg.schedule,
    onError: (err) => {
      if (err instanceof StoreError) fatal(err);
      log.error("[CYCLE] unexpected error", { error: errorMessage(err) });
    },
  });

  const shutdown = (signal: string) => {
    log.info("[BOOT] shutting down", { signal });
    scheduler.stop();
    scheduler
      .idle()
      .then(() => db.close())
      .then(() => process.exit(0), fatal);
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch(fatal);
