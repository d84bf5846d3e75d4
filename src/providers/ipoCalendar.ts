import { z } from "zod";
import { DecodeError } from "../errors.js";
import type { CalendarRequest } from "../types.js";

export const CALENDAR_URL =
  "https://www.nepsealpha.com/investment-calandar/ipo";

/** Table columns, in the order the calendar page requests them. */
const COLUMNS = [
  "symbol",
  "units",
  "opening_date",
  "closing_date",
  "issue_manager",
  "status",
  "view",
] as const;

const HEADERS: Record<string, string> = {
  "User-Agent":
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10.15; rv:135.0) Gecko/20100101 Firefox/135.0",
  Accept: "application/json, text/javascript, */*; q=0.01",
  "Accept-Language": "en-US,en;q=0.5",
  "X-Requested-With": "XMLHttpRequest",
  Connection: "keep-alive",
  Referer: CALENDAR_URL,
  "Sec-Fetch-Dest": "empty",
  "Sec-Fetch-Mode": "cors",
  "Sec-Fetch-Site": "same-origin",
};

/** DataTables server-side query: every column searchable, no filter. */
export function buildCalendarParams(
  pageLength = 100
): Record<string, string | number> {
  const params: Record<string, string | number> = { draw: 1 };
  COLUMNS.forEach((col, i) => {
    params[`columns[${i}][data]`] = col;
    params[`columns[${i}][name]`] = col;
    params[`columns[${i}][searchable]`] = "true";
    params[`columns[${i}][orderable]`] = "true";
    params[`columns[${i}][search][value]`] = "";
    params[`columns[${i}][search][regex]`] = "false";
  });
  params.start = 0;
  params.length = pageLength;
  params["search[value]"] = "";
  params["search[regex]"] = "false";
  return params;
}

export function buildCalendarRequest(pageLength = 100): CalendarRequest {
  return {
    url: CALENDAR_URL,
    params: buildCalendarParams(pageLength),
    headers: { ...HEADERS },
  };
}

/** URL with the query inlined (what a browser navigates to). */
export function calendarUrlWithQuery(req: CalendarRequest): string {
  const u = new URL(req.url);
  for (const [k, v] of Object.entries(req.params)) {
    u.searchParams.set(k, String(v));
  }
  return u.toString();
}

// rows stay unchecked here; a bad row is the parser's to skip
const PayloadSchema = z.object({
  data: z.array(z.unknown()),
});

/** Parse a body string; non-JSON is a DecodeError. */
export function parseJsonBody(body: string): unknown {
  try {
    return JSON.parse(body);
  } catch (err) {
    throw new DecodeError(
      `response is not JSON: ${body.slice(0, 120).replace(/\s+/g, " ")}`,
      { cause: err }
    );
  }
}

/** Rows of the `data` collection, or DecodeError if the key is absent. */
export function decodeCalendarPayload(json: unknown): unknown[] {
  const parsed = PayloadSchema.safeParse(json);
  if (!parsed.success) {
    throw new DecodeError("response lacks a `data` collection", {
      cause: parsed.error,
    });
  }
  return parsed.data.data;
}
