import { buildNarrowWindow, buildWideWindow } from "../calendar/event-source";
import { ReconcileDependencies, ReconcileSummary, formatSummary, reconcileAndDispatch } from "../services/reconciler";
import { ScanWindow } from "../types/calendar";
import { describeError } from "../shared/errors";

export type TriggerSource = "push" | "poll";

export interface TriggerOptions {
  now?: () => Date;
  /** Half-width of the push path's rescan window. */
  scanWindowMs?: number;
  /** How far ahead the poll path looks for events about to start. */
  lookaheadMs?: number;
}

/** Calendar changed; the notification says nothing about what, so rescan everything nearby. */
export async function runPushTrigger(
  deps: ReconcileDependencies,
  options: TriggerOptions = {}
): Promise<ReconcileSummary | null> {
  const now = (options.now ?? (() => new Date()))();
  console.log("📅 Calendar change notification received");
  return runGuarded("push", buildWideWindow(now, options.scanWindowMs), deps);
}

export async function runPollTrigger(
  deps: ReconcileDependencies,
  options: TriggerOptions = {}
): Promise<ReconcileSummary | null> {
  const now = (options.now ?? (() => new Date()))();
  console.log("⏰ Checking for upcoming trading events...");
  return runGuarded("poll", buildNarrowWindow(now, options.lookaheadMs), deps);
}

/**
 * A fault inside one invocation is logged and swallowed; the next push or
 * timer tick must still find its trigger in place.
 */
async function runGuarded(
  source: TriggerSource,
  window: ScanWindow,
  deps: ReconcileDependencies
): Promise<ReconcileSummary | null> {
  try {
    const summary = await reconcileAndDispatch(window, deps);
    console.log(formatSummary(summary));
    return summary;
  } catch (error) {
    console.error(`💥 ${source} trigger failed: ${describeError(error)}`);
    return null;
  }
}
