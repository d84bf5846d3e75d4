import { gotScraping } from "got-scraping";
import { TransportError, errorMessage } from "../../errors.js";
import type { CalendarRequest } from "../../types.js";
import type { FetchStrategy } from "../chain.js";
import { parseJsonBody } from "../ipoCalendar.js";

export type ScrapeRequest = (opts: {
  url: string;
  searchParams: Record<string, string | number>;
  headers: Record<string, string>;
  timeoutMs: number;
}) => Promise<{ statusCode: number; body: string }>;

/** got-scraping: browser-like TLS ciphers + a generated Chrome header set. */
export const scrapeWithGot: ScrapeRequest = async (opts) => {
  const res = await gotScraping({
    url: opts.url,
    searchParams: opts.searchParams,
    headers: opts.headers,
    timeout: { request: opts.timeoutMs },
    throwHttpErrors: false,
    retry: { limit: 0 },
    headerGeneratorOptions: {
      browsers: [{ name: "chrome", minVersion: 120 }],
      devices: ["desktop"],
      operatingSystems: ["windows"],
    },
  });
  return { statusCode: res.statusCode, body: res.body };
};

/** Tier 2: fingerprint-evading HTTP client with a retry budget. */
export class ImpersonatedHttpStrategy implements FetchStrategy {
  readonly name = "impersonated";
  readonly maxAttempts: number;
  private timeoutMs: number;
  private request: ScrapeRequest;

  constructor(
    opts: { maxAttempts?: number; timeoutMs?: number; request?: ScrapeRequest } = {}
  ) {
    this.maxAttempts = opts.maxAttempts ?? 3;
    this.timeoutMs = opts.timeoutMs ?? 30_000;
    this.request = opts.request ?? scrapeWithGot;
  }

  async attempt(req: CalendarRequest): Promise<unknown> {
    // the generated fingerprint supplies its own User-Agent
    const { "User-Agent": _ua, ...headers } = req.headers;
    let res;
    try {
      res = await this.request({
        url: req.url,
        searchParams: req.params,
        headers,
        timeoutMs: this.timeoutMs,
      });
    } catch (err) {
      throw new TransportError(`GET ${req.url}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
    if (res.statusCode !== 200) {
      throw new TransportError(`HTTP ${res.statusCode}`, {
        status: res.statusCode,
      });
    }
    return parseJsonBody(res.body);
  }
}
