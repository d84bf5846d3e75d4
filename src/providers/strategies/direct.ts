import axios, { type AxiosInstance } from "axios";
import { TransportError, errorMessage } from "../../errors.js";
import type { CalendarRequest } from "../../types.js";
import type { FetchStrategy } from "../chain.js";
import { parseJsonBody } from "../ipoCalendar.js";

/** Tier 1: a plain GET, no fingerprinting, single shot. */
export class DirectHttpStrategy implements FetchStrategy {
  readonly name = "direct";
  readonly maxAttempts = 1;
  private http: AxiosInstance;

  constructor(opts: { timeoutMs?: number; http?: AxiosInstance } = {}) {
    this.http =
      opts.http ?? axios.create({ timeout: opts.timeoutMs ?? 30_000 });
  }

  async attempt(req: CalendarRequest): Promise<unknown> {
    let res;
    try {
      res = await this.http.get<string>(req.url, {
        params: req.params,
        headers: req.headers,
        responseType: "text",
        // keep the raw body; JSON errors are ours to report
        transformResponse: (d: unknown) => d,
        validateStatus: () => true,
      });
    } catch (err) {
      throw new TransportError(`GET ${req.url}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
    if (res.status < 200 || res.status >= 300) {
      throw new TransportError(`HTTP ${res.status}`, { status: res.status });
    }
    return parseJsonBody(String(res.data));
  }
}
