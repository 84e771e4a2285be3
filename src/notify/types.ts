export type NotificationLevel = "success" | "info" | "warning" | "error";

export interface Notification {
  subject: string;
  message: string;
  level: NotificationLevel;
  details?: Record<string, unknown>;
}

export interface NotificationSink {
  readonly name: string;
  /** Rejects when delivery fails; callers decide whether that matters. */
  notify(notification: Notification): Promise<void>;
}
