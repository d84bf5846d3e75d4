import * as cheerio from "cheerio";
import { MalformedRecordError } from "../errors.js";
import { log } from "../logger.js";
import type { IpoEntry, RawIpoRecord } from "../types.js";

/** Visible text of an HTML fragment, trimmed. Plain strings pass through. */
export function stripMarkup(fragment: unknown): string {
  if (fragment === null || fragment === undefined) return "";
  const html = String(fragment);
  if (!html.includes("<") && !html.includes("&")) return html.trim();
  const $ = cheerio.load(html, null, false);
  return $.root().text().trim();
}

/** First anchor href inside a fragment, if any. */
export function extractHref(fragment: unknown): string | undefined {
  if (typeof fragment !== "string" || !fragment.trim()) return undefined;
  const $ = cheerio.load(fragment, null, false);
  const href = $("a[href]").first().attr("href")?.trim();
  return href || undefined;
}

function toId(v: unknown): number | undefined {
  if (typeof v === "number" && Number.isInteger(v)) return v;
  if (typeof v === "string" && /^\d+$/.test(v.trim())) return Number(v.trim());
  return undefined;
}

const displayText = (v: unknown) =>
  v === null || v === undefined ? "" : String(v).trim();

const nonEmptyString = (v: unknown): v is string =>
  typeof v === "string" && v.trim() !== "";

const REQUIRED = ["id", "symbol", "company_name"];

function isRecord(v: unknown): v is RawIpoRecord {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/**
 * Normalize one upstream row. Throws MalformedRecordError when the row is
 * not an object or `id`, `symbol` or `company_name` is unusable.
 *
 * The anchor in `view` wins over the plain `url` field when both are
 * present; upstream has never documented which is authoritative.
 */
export function parseEntry(raw: unknown): IpoEntry {
  if (!isRecord(raw)) throw new MalformedRecordError(REQUIRED);
  const id = toId(raw.id);
  const missing: string[] = [];
  if (id === undefined) missing.push("id");
  if (!nonEmptyString(raw.symbol)) missing.push("symbol");
  if (!nonEmptyString(raw.company_name)) missing.push("company_name");
  if (id === undefined || missing.length) throw new MalformedRecordError(missing);

  const symbol = String(raw.symbol);
  const plainUrl = raw.url;
  const url =
    extractHref(raw.view) ??
    (nonEmptyString(plainUrl) ? plainUrl.trim() : undefined);

  const entry: IpoEntry = {
    id,
    symbol,
    symbolClean: stripMarkup(symbol),
    companyName: displayText(raw.company_name),
    units: displayText(raw.units),
    openingDate: stripMarkup(raw.opening_date),
    closingDate: stripMarkup(raw.closing_date),
    issueManager: displayText(raw.issue_manager),
    price: displayText(raw.price),
    status: stripMarkup(raw.status),
  };
  if (url) entry.url = url;
  return entry;
}

/** Parse a batch, skipping (and logging) rows that are not usable records. */
export function parseEntries(raws: readonly unknown[]): IpoEntry[] {
  const out: IpoEntry[] = [];
  for (const [idx, raw] of raws.entries()) {
    try {
      out.push(parseEntry(raw));
    } catch (err) {
      if (!(err instanceof MalformedRecordError)) throw err;
      log.warn("[PARSE] skip malformed record", {
        idx,
        id: isRecord(raw) ? raw.id : undefined,
        missing: err.missing,
      });
    }
  }
  return out;
}
