import { Notification, NotificationSink } from "./types";
import { describeError } from "../shared/errors";

/** Delivers to every sink; one failing channel does not stop the others. */
export class MultiNotificationSink implements NotificationSink {
  readonly name: string;
  private readonly sinks: NotificationSink[];

  constructor(sinks: NotificationSink[]) {
    this.sinks = sinks;
    this.name = sinks.map((sink) => sink.name).join("+") || "none";
  }

  async notify(notification: Notification): Promise<void> {
    const results = await Promise.allSettled(this.sinks.map((sink) => sink.notify(notification)));

    results.forEach((result, index) => {
      if (result.status === "rejected") {
        console.error(`💥 ${this.sinks[index].name} notification failed: ${describeError(result.reason)}`);
      }
    });
  }
}
