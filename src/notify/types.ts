/**
 * Outbound admin notifications.
 *
 * `notify` returns immediately. Delivery happens in the background and a
 * failed delivery is logged, never thrown.
 */
export interface Notifier {
  notify(to: string, subject: string, text: string, html?: string): void;
}
