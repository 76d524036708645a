import type { AppConfig } from "../config";
import { ConsoleNotifier } from "./consoleNotifier";
import { TelegramNotifier } from "./telegramNotifier";
import type { Notifier } from "./types";

export type { Notifier } from "./types";
export { ConsoleNotifier } from "./consoleNotifier";
export { TelegramNotifier, type MessageSender } from "./telegramNotifier";

export function createNotifier(config: Pick<AppConfig, "notify" | "telegramBotToken">): Notifier {
  if (config.notify === "telegram" && config.telegramBotToken) {
    return new TelegramNotifier(config.telegramBotToken);
  }
  return new ConsoleNotifier();
}
