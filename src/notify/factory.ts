import { NotificationSink } from "./types";
import { ConsoleNotificationSink } from "./console-sink";
import { DiscordWebhookSink } from "./discord-sink";
import { FeishuWebhookSink } from "./feishu-sink";
import { MultiNotificationSink } from "./multi-sink";
import type { Settings } from "../config/settings";

export function createNotificationSink(settings: Settings["notifications"]): NotificationSink {
  const sinks: NotificationSink[] = [];

  if (settings.discordWebhookUrl) {
    sinks.push(new DiscordWebhookSink(settings.discordWebhookUrl));
  }
  if (settings.feishuWebhookUrl && settings.feishuSecret) {
    sinks.push(new FeishuWebhookSink({ webhookUrl: settings.feishuWebhookUrl, secret: settings.feishuSecret }));
  }

  if (sinks.length === 0) {
    return new ConsoleNotificationSink();
  }
  return sinks.length === 1 ? sinks[0] : new MultiNotificationSink(sinks);
}
