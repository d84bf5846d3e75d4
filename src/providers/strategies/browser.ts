import { existsSync } from "fs";
import { chromium } from "playwright-core";
import type { AppConfig } from "../../config.js";
import { TransportError, errorMessage } from "../../errors.js";
import { log } from "../../logger.js";
import type { CalendarRequest } from "../../types.js";
import type { FetchStrategy } from "../chain.js";
import { calendarUrlWithQuery, parseJsonBody } from "../ipoCalendar.js";

/** The slice of playwright's Browser this tier drives. */
export interface BrowserLike {
  newContext(options: {
    userAgent?: string;
    extraHTTPHeaders?: Record<string, string>;
    locale?: string;
  }): Promise<{
    newPage(): Promise<{
      goto(
        url: string,
        options: { waitUntil: "networkidle"; timeout: number }
      ): Promise<unknown>;
      waitForTimeout(ms: number): Promise<void>;
      locator(selector: string): { innerText(): Promise<string> };
    }>;
  }>;
  close(): Promise<void>;
}

export type LaunchBrowser = (executablePath: string) => Promise<BrowserLike>;

export const launchChromium: LaunchBrowser = (executablePath) =>
  chromium.launch({ executablePath, headless: true });

export type BrowserCapability =
  | { available: true; executablePath: string }
  | { available: false; reason: string };

/** Checked once at startup; the chain skips the tier when unavailable. */
export function detectBrowser(
  browser: AppConfig["acquisition"]["browser"],
  exists: (path: string) => boolean = existsSync
): BrowserCapability {
  if (!browser.enabled) {
    return { available: false, reason: "disabled by BROWSER_ENABLED" };
  }
  let candidate = browser.executablePath;
  if (!candidate) {
    try {
      candidate = chromium.executablePath();
    } catch (err) {
      return {
        available: false,
        reason: `no Chromium registered with playwright (${errorMessage(err)})`,
      };
    }
  }
  if (!candidate || !exists(candidate)) {
    return {
      available: false,
      reason: `Chromium executable not found${candidate ? ` at ${candidate}` : ""}`,
    };
  }
  return { available: true, executablePath: candidate };
}

/**
 * Tier 3: load the endpoint in a real Chromium, let any challenge settle,
 * then read the rendered body as JSON. One browser per attempt.
 */
export class BrowserStrategy implements FetchStrategy {
  readonly name = "browser";
  readonly maxAttempts: number;
  readonly unavailableReason?: string;
  private executablePath?: string;
  private settleMs: number;
  private navigationTimeoutMs: number;
  private launch: LaunchBrowser;

  constructor(
    capability: BrowserCapability,
    opts: {
      maxAttempts?: number;
      settleMs?: number;
      navigationTimeoutMs?: number;
      launch?: LaunchBrowser;
    } = {}
  ) {
    if (capability.available) this.executablePath = capability.executablePath;
    else this.unavailableReason = capability.reason;
    this.maxAttempts = opts.maxAttempts ?? 3;
    this.settleMs = opts.settleMs ?? 5_000;
    this.navigationTimeoutMs = opts.navigationTimeoutMs ?? 60_000;
    this.launch = opts.launch ?? launchChromium;
  }

  async attempt(req: CalendarRequest): Promise<unknown> {
    if (!this.executablePath) {
      throw new TransportError(
        `browser tier unavailable: ${this.unavailableReason ?? "unknown"}`
      );
    }
    // a real browser sends its own fetch headers; only carry identity over
    const userAgent = req.headers["User-Agent"];
    const language = req.headers["Accept-Language"];
    const browser = await this.launch(this.executablePath).catch((err) => {
      throw new TransportError(`browser launch: ${errorMessage(err)}`, {
        cause: err,
      });
    });
    let body: string;
    try {
      const context = await browser.newContext({
        userAgent,
        extraHTTPHeaders: language ? { "Accept-Language": language } : {},
        locale: "en-US",
      });
      const page = await context.newPage();
      await page.goto(calendarUrlWithQuery(req), {
        waitUntil: "networkidle",
        timeout: this.navigationTimeoutMs,
      });
      await page.waitForTimeout(this.settleMs);
      body = await page.locator("body").innerText();
    } catch (err) {
      throw new TransportError(`browser navigation: ${errorMessage(err)}`, {
        cause: err,
      });
    } finally {
      await browser.close().catch((err) => {
        log.warn("[FETCH] browser close failed", { error: errorMessage(err) });
      });
    }
    return parseJsonBody(body);
  }
}
