import { z } from "zod";

const flag = z
  .string()
  .default("true")
  .transform((v) => v.trim().toLowerCase())
  .pipe(z.enum(["true", "false", "1", "0", "yes", "no"]))
  .transform((v) => v === "true" || v === "1" || v === "yes");

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

/** Validate & normalize environment variables */
export const EnvSchema = z.object({
  TELEGRAM_BOT_TOKEN: optionalString,
  TELEGRAM_CHAT_ID: optionalString,
  DB_PATH: z.string().default("./data/ipo_data.db"),
  LOG_FILE: z.string().default("./ipo_alert.log"),
  CHECK_INTERVAL_HOURS: z.coerce.number().positive().default(2),
  WAKE_SECONDS: z.coerce.number().positive().default(60),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  MAX_RETRIES: z.coerce.number().int().min(1).default(3),
  PAGE_LENGTH: z.coerce.number().int().positive().default(100),
  BROWSER_ENABLED: flag,
  BROWSER_EXECUTABLE_PATH: optionalString,
  BROWSER_SETTLE_MS: z.coerce.number().int().min(0).default(5_000),
});

export type AppConfig = {
  telegram: { botToken?: string; chatId?: string };
  dbPath: string;
  /** Empty = console only */
  logFile?: string;
  schedule: { intervalMs: number; wakeMs: number };
  acquisition: {
    timeoutMs: number;
    maxRetries: number;
    pageLength: number;
    browser: {
      enabled: boolean;
      executablePath?: string;
      settleMs: number;
    };
  };
};

/** Build the process-wide config once at startup; callers pass it down. */
export function loadConfig(
  source: Record<string, string | undefined> = process.env
): AppConfig {
  const env = EnvSchema.parse(source);
  return {
    telegram: {
      botToken: env.TELEGRAM_BOT_TOKEN,
      chatId: env.TELEGRAM_CHAT_ID,
    },
    dbPath: env.DB_PATH,
    logFile: env.LOG_FILE.trim() || undefined,
    schedule: {
      intervalMs: Math.round(env.CHECK_INTERVAL_HOURS * 60 * 60 * 1000),
      wakeMs: Math.round(env.WAKE_SECONDS * 1000),
    },
    acquisition: {
      timeoutMs: env.HTTP_TIMEOUT_MS,
      maxRetries: env.MAX_RETRIES,
      pageLength: env.PAGE_LENGTH,
      browser: {
        enabled: env.BROWSER_ENABLED,
        executablePath: env.BROWSER_EXECUTABLE_PATH,
        settleMs: env.BROWSER_SETTLE_MS,
      },
    },
  };
}
