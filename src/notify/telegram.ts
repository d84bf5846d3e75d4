import axios, { type AxiosInstance } from "axios";
import type { AppConfig } from "../config.js";
import { DeliveryError, errorMessage } from "../errors.js";
import { log } from "../logger.js";
import type { IpoEntry } from "../types.js";

export type Notify = (entry: IpoEntry) => Promise<boolean>;

/** Legacy `Markdown` parse mode only reserves these four. */
export function escapeMarkdown(s: string) {
  return s.replace(/([_*`[])/g, "\\$1");
}

export function formatIpoAlert(entry: IpoEntry): string {
  const lines = [
    "🚨 *NEW IPO ALERT* 🚨",
    "",
    `*Symbol:* ${escapeMarkdown(entry.symbolClean)}`,
    `*Company:* ${escapeMarkdown(entry.companyName)}`,
    `*Units:* ${escapeMarkdown(entry.units)}`,
    `*Price:* NPR ${escapeMarkdown(entry.price)}`,
    `*Opening Date:* ${escapeMarkdown(entry.openingDate)}`,
    `*Closing Date:* ${escapeMarkdown(entry.closingDate)}`,
    `*Issue Manager:* ${escapeMarkdown(entry.issueManager)}`,
    `*Status:* ${escapeMarkdown(entry.status)}`,
  ];
  let text = lines.join("\n") + "\n";
  if (entry.url) text += `\n[View Details](${entry.url})`;
  return text;
}

/**
 * Send via Bot Token + Chat ID. Resolves false (never throws) when config
 * is missing or the API rejects the message. No retries.
 */
export function createTelegramNotifier(
  telegram: AppConfig["telegram"],
  http: AxiosInstance = axios.create({ timeout: 10_000 })
): Notify {
  const { botToken, chatId } = telegram;

  return async (entry) => {
    if (!botToken || !chatId) {
      log.error(
        "[TELEGRAM] configuration missing; set TELEGRAM_BOT_TOKEN and TELEGRAM_CHAT_ID"
      );
      return false;
    }
    const url = `https://api.telegram.org/bot${botToken}/sendMessage`;
    const payload = {
      chat_id: chatId,
      text: formatIpoAlert(entry),
      parse_mode: "Markdown",
      disable_web_page_preview: false,
    };
    try {
      await http.post(url, payload);
      log.info("[TELEGRAM] alert sent", { symbol: entry.symbolClean });
      return true;
    } catch (err) {
      // no `cause`: the axios error carries the token-bearing request URL
      const failure = new DeliveryError(
        `sendMessage failed for ${entry.symbolClean}: ${errorMessage(err)}`
      );
      log.error("[TELEGRAM] delivery failed", { error: failure });
      return false;
    }
  };
}
