import { Api } from "grammy";
import { errorMessage } from "../lib/errors";
import type { Notifier } from "./types";

/** The slice of the Bot API this notifier uses. */
export type MessageSender = Pick<Api, "sendMessage">;

/**
 * Sends notifications as Telegram messages. The recipient is a numeric
 * chat id; HTML bodies are dropped in favour of the plain text.
 */
export class TelegramNotifier implements Notifier {
  private readonly api: MessageSender;

  constructor(tokenOrApi: string | MessageSender) {
    this.api = typeof tokenOrApi === "string" ? new Api(tokenOrApi) : tokenOrApi;
  }

  notify(to: string, subject: string, text: string): void {
    const chatId = Number(to);
    if (!Number.isSafeInteger(chatId)) {
      console.warn(`[notify] Telegram recipient must be a numeric chat id, got "${to}"; dropped.`);
      return;
    }
    void this.deliver(chatId, `${subject}\n\n${text}`);
  }

  private async deliver(chatId: number, message: string): Promise<void> {
    try {
      await this.api.sendMessage(chatId, message);
      console.log(`[notify] Sent to chat ${chatId}`);
    } catch (err) {
      console.warn(`[notify] Telegram delivery to chat ${chatId} failed: ${errorMessage(err)}`);
    }
  }
}
