import crypto from "node:crypto";
import { afterEach, describe, expect, it, vi } from "vitest";
import { DiscordWebhookSink, buildDiscordPayload } from "./discord-sink";
import { FeishuWebhookSink, formatFeishuText, signFeishu } from "./feishu-sink";
import { MultiNotificationSink } from "./multi-sink";
import { ConsoleNotificationSink } from "./console-sink";
import { createNotificationSink } from "./factory";
import { Notification } from "./types";
import { JsonRequest } from "../shared/http";
import { NOW, RecordingSink } from "../test-utils";

const simulated: Notification = {
  subject: "Trade Simulated",
  message: "🔍 BUY 1 BYD from \"BUY 1 BYD\": Simulated",
  level: "info"
};

function fakeRequester() {
  return vi.fn(async (_url: URL, _request?: JsonRequest): Promise<unknown> => ({}));
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("Discord sink", () => {
  it("builds an embed coloured by level", () => {
    expect(buildDiscordPayload(simulated, NOW)).toEqual({
      embeds: [
        {
          title: "🤖 Trade Simulated",
          description: "🔍 BUY 1 BYD from \"BUY 1 BYD\": Simulated",
          color: 0x3498db,
          timestamp: "2026-10-19T10:00:00.000Z"
        }
      ]
    });
  });

  it("appends details as a json block", () => {
    const payload = buildDiscordPayload(
      { subject: "Trade Execution Failed", message: "boom", level: "error", details: { eventId: "evt-1" } },
      NOW
    );

    expect(payload.embeds[0].description).toBe("boom\n```json\n{\n  \"eventId\": \"evt-1\"\n}\n```");
    expect(payload.embeds[0].color).toBe(0xed4245);
  });

  it("truncates long descriptions", () => {
    const payload = buildDiscordPayload({ subject: "Long", message: "x".repeat(5000), level: "warning" }, NOW);
    expect(payload.embeds[0].description).toHaveLength(4000);
    expect(payload.embeds[0].description.endsWith("…")).toBe(true);
  });

  it("posts to the webhook", async () => {
    const request = fakeRequester();
    const sink = new DiscordWebhookSink("https://discord.test/api/webhooks/1/test-token", request, () => NOW);

    await sink.notify(simulated);

    const [url, sent] = request.mock.calls[0];
    expect(url.toString()).toBe("https://discord.test/api/webhooks/1/test-token");
    expect(sent).toEqual({ method: "POST", body: buildDiscordPayload(simulated, NOW) });
  });
});

describe("Feishu sink", () => {
  it("signs the timestamp with the secret", () => {
    const expected = crypto.createHmac("sha256", "1792404000\ntest-secret").update("").digest("base64");
    expect(signFeishu("1792404000", "test-secret")).toBe(expected);
  });

  it("formats subject, message and details as text", () => {
    expect(formatFeishuText(simulated)).toBe("Trade Simulated\n🔍 BUY 1 BYD from \"BUY 1 BYD\": Simulated");
    expect(formatFeishuText({ ...simulated, message: "done", details: { a: 1 } })).toBe(
      "Trade Simulated\ndone\n\n{\n  \"a\": 1\n}"
    );
  });

  it("posts a signed text message", async () => {
    const request = fakeRequester();
    const sink = new FeishuWebhookSink({
      webhookUrl: "https://feishu.test/hook/abc",
      secret: "test-secret",
      request,
      now: () => NOW
    });

    await sink.notify(simulated);

    const [, sent] = request.mock.calls[0];
    expect(sent).toEqual({
      method: "POST",
      body: {
        timestamp: "1792404000",
        sign: signFeishu("1792404000", "test-secret"),
        msg_type: "text",
        content: { text: "Trade Simulated\n🔍 BUY 1 BYD from \"BUY 1 BYD\": Simulated" }
      }
    });
  });
});

describe("MultiNotificationSink", () => {
  it("delivers to the remaining sinks when one fails", async () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const broken = new RecordingSink();
    broken.failWith = new Error("webhook down");
    const working = new RecordingSink();
    const sink = new MultiNotificationSink([broken, working]);

    await sink.notify(simulated);

    expect(working.received).toEqual([simulated]);
    expect(errorSpy).toHaveBeenCalledWith("💥 recording notification failed: webhook down");
    expect(sink.name).toBe("recording+recording");
  });
});

describe("ConsoleNotificationSink", () => {
  it("writes errors to stderr", async () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    await new ConsoleNotificationSink().notify({ subject: "Trade Execution Failed", message: "nope", level: "error" });
    expect(errorSpy).toHaveBeenCalledWith("📣 [ERROR] Trade Execution Failed: nope");
  });

  it("writes other levels to stdout", async () => {
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    await new ConsoleNotificationSink().notify(simulated);
    expect(logSpy).toHaveBeenCalledWith("📣 [INFO] Trade Simulated: 🔍 BUY 1 BYD from \"BUY 1 BYD\": Simulated");
  });
});

describe("createNotificationSink", () => {
  it("falls back to the console", () => {
    expect(createNotificationSink({})).toBeInstanceOf(ConsoleNotificationSink);
  });

  it("returns a single configured webhook directly", () => {
    expect(createNotificationSink({ discordWebhookUrl: "https://discord.test/hook" })).toBeInstanceOf(
      DiscordWebhookSink
    );
  });

  it("fans out to every configured webhook", () => {
    const sink = createNotificationSink({
      discordWebhookUrl: "https://discord.test/hook",
      feishuWebhookUrl: "https://feishu.test/hook",
      feishuSecret: "test-secret"
    });
    expect(sink).toBeInstanceOf(MultiNotificationSink);
    expect(sink.name).toBe("discord+feishu");
  });
});
