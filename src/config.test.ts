import { describe, expect, it } from "vitest";
import { loadConfig } from "./config.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    const cfg = loadConfig({});
    expect(cfg).toEqual({
      telegram: { botToken: undefined, chatId: undefined },
      dbPath: "./data/ipo_data.db",
      logFile: "./ipo_alert.log",
      schedule: { intervalMs: 7_200_000, wakeMs: 60_000 },
      acquisition: {
        timeoutMs: 30_000,
        maxRetries: 3,
        pageLength: 100,
        browser: { enabled: true, executablePath: undefined, settleMs: 5_000 },
      },
    });
  });

  it("coerces and trims environment strings", () => {
    const cfg = loadConfig({
      TELEGRAM_BOT_TOKEN: " test-token ",
      TELEGRAM_CHAT_ID: "   ",
      CHECK_INTERVAL_HOURS: "0.5",
      MAX_RETRIES: "5",
      BROWSER_ENABLED: "false",
      LOG_FILE: "",
    });
    expect(cfg.telegram).toEqual({ botToken: "test-token", chatId: undefined });
    expect(cfg.schedule.intervalMs).toBe(1_800_000);
    expect(cfg.acquisition.maxRetries).toBe(5);
    expect(cfg.acquisition.browser.enabled).toBe(false);
    expect(cfg.logFile).toBeUndefined();
  });

  it("reads boolean flags case-insensitively", () => {
    expect(loadConfig({ BROWSER_ENABLED: "TRUE" }).acquisition.browser.enabled).toBe(true);
    expect(loadConfig({ BROWSER_ENABLED: " False " }).acquisition.browser.enabled).toBe(false);
    expect(loadConfig({ BROWSER_ENABLED: "No" }).acquisition.browser.enabled).toBe(false);
  });

  it("rejects an unknown flag value", () => {
    expect(() => loadConfig({ BROWSER_ENABLED: "maybe" })).toThrow();
  });

  it("rejects a zero retry budget", () => {
    expect(() => loadConfig({ MAX_RETRIES: "0" })).toThrow();
  });
});
