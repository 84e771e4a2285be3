import { Hono } from "hono";
import { serve } from "@hono/node-server";
import type { ReconcileSummary } from "../services/reconciler";

export const NOTIFICATION_PATH = "/notifications/calendar";

export interface PushServerOptions {
  /** Expected `X-Goog-Channel-Token`; unchecked when absent. */
  channelToken?: string;
  onCalendarChange: () => Promise<ReconcileSummary | null>;
}

export function createPushApp(options: PushServerOptions): Hono {
  const app = new Hono();

  app.get("/health", (c) => c.json({ ok: true }));

  app.post(NOTIFICATION_PATH, async (c) => {
    if (options.channelToken && c.req.header("x-goog-channel-token") !== options.channelToken) {
      console.warn("🚫 Rejected calendar notification with an unknown channel token");
      return c.json({ ok: false, error: "invalid channel token" }, 401);
    }

    const state = c.req.header("x-goog-resource-state");
    if (state === "sync") {
      console.log(`🔗 Calendar channel ${c.req.header("x-goog-channel-id") ?? "(unknown)"} synced`);
      return c.json({ ok: true, state });
    }

    const summary = await options.onCalendarChange();
    if (!summary) {
      return c.json({ ok: false, state: state ?? null });
    }

    return c.json({
      ok: true,
      state: state ?? null,
      scanned: summary.scanned,
      dispatched: summary.dispatched,
      failed: summary.failed,
      skippedDuplicates: summary.skippedDuplicates,
      ignored: summary.ignored
    });
  });

  return app;
}

export function startPushServer(app: Hono, port: number) {
  const server = serve({ fetch: app.fetch, port });
  console.log(`[server] listening on :${port} (calendar notifications at ${NOTIFICATION_PATH})`);
  return server;
}
