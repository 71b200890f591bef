import { errorMessage, type FetchFn } from "../../shared/src/http";
import type { Notifier, NotifyStatus } from "./types";

export type TelegramSettings = {
  token: string;
  chatId: string;
  timeoutMs?: number;
};

const TELEGRAM_API = "https://api.telegram.org";

export class TelegramNotifier implements Notifier {
  constructor(
    private readonly settings: TelegramSettings,
    private readonly fetchImpl: FetchFn = fetch
  ) {}

  async notify(message: string): Promise<NotifyStatus> {
    const { token, chatId } = this.settings;
    if (!token || !chatId) {
      return { delivered: false, reason: "telegram not configured" };
    }

    try {
      const res = await this.fetchImpl(`${TELEGRAM_API}/bot${token}/sendMessage`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ chat_id: chatId, text: message, parse_mode: "Markdown" }),
        signal: AbortSignal.timeout(this.settings.timeoutMs ?? 10_000),
      });

      if (!res.ok) {
        return { delivered: false, reason: `HTTP ${res.status}: ${await res.text()}` };
      }
      return { delivered: true };
    } catch (err) {
      return { delivered: false, reason: errorMessage(err) };
    }
  }
}
