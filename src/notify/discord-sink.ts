import { Notification, NotificationLevel, NotificationSink } from "./types";
import { JsonRequester, requestJson } from "../shared/http";

const COLORS: Record<NotificationLevel, number> = {
  success: 0x2ecc71,
  info: 0x3498db,
  warning: 0xffaa00,
  error: 0xed4245
};

const DESCRIPTION_LIMIT = 4000;

export class DiscordWebhookSink implements NotificationSink {
  readonly name = "discord";
  private readonly webhookUrl: URL;
  private readonly request: JsonRequester;
  private readonly now: () => Date;

  constructor(webhookUrl: string, request: JsonRequester = requestJson, now: () => Date = () => new Date()) {
    this.webhookUrl = new URL(webhookUrl);
    this.request = request;
    this.now = now;
  }

  async notify(notification: Notification): Promise<void> {
    await this.request(this.webhookUrl, {
      method: "POST",
      body: buildDiscordPayload(notification, this.now())
    });
  }
}

export function buildDiscordPayload(notification: Notification, timestamp: Date) {
  let description = notification.message;
  if (notification.details) {
    description += `\n\`\`\`json\n${JSON.stringify(notification.details, null, 2)}\n\`\`\``;
  }
  if (description.length > DESCRIPTION_LIMIT) {
    description = `${description.slice(0, DESCRIPTION_LIMIT - 1)}…`;
  }

  return {
    embeds: [
      {
        title: `🤖 ${notification.subject}`,
        description,
        color: COLORS[notification.level],
        timestamp: timestamp.toISOString()
      }
    ]
  };
}
