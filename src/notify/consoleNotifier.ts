import type { Notifier } from "./types";

/** Writes messages to stdout. Used when no transport is configured. */
export class ConsoleNotifier implements Notifier {
  notify(to: string, subject: string, text: string, html?: string): void {
    console.log(`[notify] To: ${to}`);
    console.log(`[notify] Subject: ${subject}`);
    console.log(text);
    if (html) console.log(html);
  }
}
