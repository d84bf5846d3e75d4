import { describe, expect, it } from "vitest";
import { entry } from "../test/fixtures.js";
import { detectNew } from "./detectNew.js";

describe("detectNew", () => {
  it("returns only unseen ids", () => {
    const fresh = detectNew([entry(101), entry(102), entry(103)], new Set([101, 102]));
    expect(fresh.map((e) => e.id)).toEqual([103]);
  });

  it("preserves fetched order", () => {
    const fresh = detectNew([entry(9), entry(2), entry(5), entry(4)], new Set([5]));
    expect(fresh.map((e) => e.id)).toEqual([9, 2, 4]);
  });

  it("reports an id repeated within one batch once", () => {
    const fresh = detectNew([entry(1), entry(1, { status: "Closed" })], new Set());
    expect(fresh).toHaveLength(1);
    expect(fresh[0].status).toBe("Open");
  });

  it("does not mutate its inputs", () => {
    const entries = [entry(1), entry(2)];
    const known = new Set([1]);
    detectNew(entries, known);
    expect(entries).toHaveLength(2);
    expect([...known]).toEqual([1]);
  });
});
