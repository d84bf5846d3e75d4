import { appendFileSync } from "fs";
import { format } from "util";

let logFile: string | undefined;

function emit(
  sink: (...a: unknown[]) => void,
  level: "INFO" | "WARN" | "ERROR",
  a: unknown[]
) {
  const stamp = new Date().toISOString();
  sink(stamp, `[${level}]`, ...a);
  if (!logFile) return;
  try {
    appendFileSync(logFile, `${format(stamp, `[${level}]`, ...a)}\n`);
  } catch (err) {
    // the console still has the line; stop retrying a broken file
    console.error(stamp, "[ERROR]", "[LOG] file sink disabled", err);
    logFile = undefined;
  }
}

/** Tiny logger wrapper for consistent tags */
export const log = {
  info: (...a: unknown[]) => emit(console.log, "INFO", a),
  warn: (...a: unknown[]) => emit(console.warn, "WARN", a),
  error: (...a: unknown[]) => emit(console.error, "ERROR", a),
};

/** Mirror every subsequent line to `path` (append). `undefined` detaches. */
export function attachLogFile(path: string | undefined) {
  logFile = path;
}
