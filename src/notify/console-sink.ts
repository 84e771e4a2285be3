import { Notification, NotificationSink } from "./types";

export class ConsoleNotificationSink implements NotificationSink {
  readonly name = "console";

  async notify(notification: Notification): Promise<void> {
    const line = `📣 [${notification.level.toUpperCase()}] ${notification.subject}: ${notification.message}`;
    if (notification.level === "error") {
      console.error(line);
    } else {
      console.log(line);
    }
  }
}
