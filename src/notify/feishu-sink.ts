import crypto from "node:crypto";
import { Notification, NotificationSink } from "./types";
import { JsonRequester, requestJson } from "../shared/http";

export interface FeishuWebhookOptions {
  webhookUrl: string;
  secret: string;
  request?: JsonRequester;
  now?: () => Date;
}

export class FeishuWebhookSink implements NotificationSink {
  readonly name = "feishu";
  private readonly webhookUrl: URL;
  private readonly secret: string;
  private readonly request: JsonRequester;
  private readonly now: () => Date;

  constructor(options: FeishuWebhookOptions) {
    this.webhookUrl = new URL(options.webhookUrl);
    this.secret = options.secret;
    this.request = options.request ?? requestJson;
    this.now = options.now ?? (() => new Date());
  }

  async notify(notification: Notification): Promise<void> {
    const timestamp = Math.floor(this.now().getTime() / 1000).toString();

    await this.request(this.webhookUrl, {
      method: "POST",
      body: {
        timestamp,
        sign: signFeishu(timestamp, this.secret),
        msg_type: "text",
        content: {
          text: formatFeishuText(notification)
        }
      }
    });
  }
}

/** Feishu signs the empty string with `timestamp + "\n" + secret` as the HMAC key. */
export function signFeishu(timestamp: string, secret: string): string {
  const signKey = `${timestamp}\n${secret}`;
  return crypto.createHmac("sha256", signKey).update("").digest("base64");
}

export function formatFeishuText(notification: Notification): string {
  const lines = [notification.subject, notification.message];
  if (notification.details) {
    lines.push("", JSON.stringify(notification.details, null, 2));
  }
  return lines.join("\n").trimEnd();
}
