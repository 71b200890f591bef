export type NotifyStatus =
  | { delivered: true }
  | { delivered: false; reason: string };

/** Best-effort delivery. Implementations resolve, never reject. */
export interface Notifier {
  notify(message: string): Promise<NotifyStatus>;
}
