import { describe, expect, it } from "vitest";
import { MalformedRecordError } from "../errors.js";
import { rawRecord } from "../test/fixtures.js";
import { extractHref, parseEntries, parseEntry, stripMarkup } from "./parseEntry.js";

describe("parseEntry", () => {
  it("normalizes a markup-wrapped calendar row", () => {
    expect(parseEntry(rawRecord())).toEqual({
      id: 101,
      symbol: "<span>ABC</span>",
      symbolClean: "ABC",
      companyName: "Alpha Co",
      units: "1000",
      openingDate: "2024-01-01",
      closingDate: "2024-01-05",
      issueManager: "Mgr",
      price: "100",
      status: "Open",
      url: "https://x/101",
    });
  });

  it("is idempotent", () => {
    const raw = rawRecord();
    expect(parseEntry(raw)).toEqual(parseEntry(raw));
  });

  it("keeps string prices as-is", () => {
    expect(parseEntry(rawRecord({ price: "100.50" })).price).toBe("100.50");
  });

  it("accepts a numeric-string id", () => {
    expect(parseEntry(rawRecord({ id: "205" })).id).toBe(205);
  });

  it("falls back to the plain url field when view has no anchor", () => {
    const e = parseEntry(rawRecord({ view: "", url: "https://x/plain" }));
    expect(e.url).toBe("https://x/plain");
  });

  it("prefers the embedded link over the plain url field", () => {
    const e = parseEntry(rawRecord({ url: "https://x/other" }));
    expect(e.url).toBe("https://x/101");
  });

  it("leaves url unset when neither source has one", () => {
    const e = parseEntry(rawRecord({ view: "<span>n/a</span>" }));
    expect(e.url).toBeUndefined();
    expect("url" in e).toBe(false);
  });

  it("fills missing display fields with empty strings", () => {
    const e = parseEntry({ id: 7, symbol: "XYZ", company_name: "Xyz Ltd" });
    expect(e.units).toBe("");
    expect(e.price).toBe("");
    expect(e.status).toBe("");
    expect(e.symbolClean).toBe("XYZ");
  });

  it("throws MalformedRecordError naming every missing field", () => {
    let caught: unknown;
    try {
      parseEntry({ units: "10" });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(MalformedRecordError);
    expect(caught instanceof MalformedRecordError && caught.missing).toEqual([
      "id",
      "symbol",
      "company_name",
    ]);
  });

  it("rejects rows that are not objects", () => {
    for (const row of [null, "ABC", 42, [rawRecord()]]) {
      expect(() => parseEntry(row)).toThrow(MalformedRecordError);
    }
  });

  it("rejects a non-integer id", () => {
    expect(() => parseEntry(rawRecord({ id: 1.5 }))).toThrow(MalformedRecordError);
  });
});

describe("parseEntries", () => {
  it("skips rows without an id and keeps the rest in order", () => {
    const out = parseEntries([
      rawRecord({ id: 1 }),
      rawRecord({ id: undefined }),
      rawRecord({ id: 3 }),
    ]);
    expect(out.map((e) => e.id)).toEqual([1, 3]);
  });

  it("skips null and non-object rows without dropping the batch", () => {
    const out = parseEntries([rawRecord({ id: 1 }), null, 7, rawRecord({ id: 2 })]);
    expect(out.map((e) => e.id)).toEqual([1, 2]);
  });
});

describe("markup helpers", () => {
  it("decodes entities and nested tags", () => {
    expect(stripMarkup("<b> A &amp; <i>B</i> </b>")).toBe("A & B");
  });

  it("returns the first anchor href", () => {
    expect(extractHref('<a>no</a><a href="/one">1</a><a href="/two">2</a>')).toBe(
      "/one"
    );
  });

  it("ignores non-string link fields", () => {
    expect(extractHref(null)).toBeUndefined();
  });
});
