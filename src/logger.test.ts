import { mkdtempSync, readFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { attachLogFile, log } from "./logger.js";

describe("log", () => {
  afterEach(() => {
    attachLogFile(undefined);
    vi.restoreAllMocks();
  });

  it("prefixes a timestamp and level tag", () => {
    const spy = vi.spyOn(console, "warn").mockImplementation(() => {});
    log.warn("[FETCH] slow", { ms: 5 });
    const [stamp, level, ...rest] = spy.mock.calls[0];
    expect(String(stamp)).toMatch(/^\d{4}-\d{2}-\d{2}T/);
    expect(level).toBe("[WARN]");
    expect(rest).toEqual(["[FETCH] slow", { ms: 5 }]);
  });

  it("mirrors lines to an attached file", () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    const file = join(mkdtempSync(join(tmpdir(), "ipo-log-")), "alerts.log");
    attachLogFile(file);
    log.info("[BOOT] ready", 3);
    expect(readFileSync(file, "utf8")).toMatch(/^\S+ \[INFO\] \[BOOT\] ready 3\n$/);
  });
});
