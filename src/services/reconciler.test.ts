import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { formatSummary, reconcileAndDispatch } from "./reconciler";
import { runPollTrigger, runPushTrigger } from "../scheduler/triggers";
import { buildWideWindow } from "../calendar/event-source";
import { FlakyStore, NOW, createHarness, makeEvent, minutesFromNow } from "../test-utils";

const options = { now: () => NOW };

describe("reconcileAndDispatch", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("dispatches an event once when both triggers see it", async () => {
    const harness = createHarness([makeEvent({ id: "evt-byd", title: "BUY 1 BYD", startTime: minutesFromNow(1) })]);

    const push = await runPushTrigger(harness.deps, options);
    const poll = await runPollTrigger(harness.deps, options);

    expect(push?.dispatched).toBe(1);
    expect(poll?.dispatched).toBe(0);
    expect(poll?.skippedDuplicates).toBe(1);
    expect(harness.service.trades).toEqual([
      {
        action: "BUY",
        quantity: 1,
        symbol: "BYD",
        correlationEventId: "evt-byd",
        correlationEventTitle: "BUY 1 BYD"
      }
    ]);
    expect(console.log).toHaveBeenCalledWith("⏭️ Skipping already executed event: BUY 1 BYD (ID: evt-byd)");
  });

  it("dispatches an event once when both triggers run at the same time", async () => {
    const harness = createHarness([makeEvent({ id: "evt-byd", title: "BUY 1 BYD", startTime: minutesFromNow(1) })]);

    const [push, poll] = await Promise.all([
      runPushTrigger(harness.deps, options),
      runPollTrigger(harness.deps, options)
    ]);

    expect(harness.service.trades).toHaveLength(1);
    expect((push?.dispatched ?? 0) + (poll?.dispatched ?? 0)).toBe(1);
    expect((push?.skippedDuplicates ?? 0) + (poll?.skippedDuplicates ?? 0)).toBe(1);
    expect((await harness.ledger.list()).map((record) => record.eventId)).toEqual(["evt-byd"]);
  });

  it("records every event when overlapping scans mark different events", async () => {
    const harness = createHarness([
      makeEvent({ id: "evt-soon", title: "BUY 1 BYD", startTime: minutesFromNow(1) }),
      makeEvent({ id: "evt-later", title: "SELL 2 NIO", startTime: minutesFromNow(90) })
    ]);

    await Promise.all([runPollTrigger(harness.deps, options), runPushTrigger(harness.deps, options)]);
    const rescan = await runPushTrigger(harness.deps, options);

    expect(harness.service.trades.map((trade) => trade.correlationEventId).sort()).toEqual(["evt-later", "evt-soon"]);
    expect(rescan?.dispatched).toBe(0);
    expect(rescan?.skippedDuplicates).toBe(2);
  });

  it("counts a batch with failed items as failed", async () => {
    const harness = createHarness([
      makeEvent({ id: "evt-rebalance", title: "Rebalance", description: "BUY 10 TSLA, SELL 5 AAPL" })
    ]);
    harness.service.outcome = {
      status: "executed",
      message: "2 orders",
      results: [
        { status: "executed", message: "ok" },
        { status: "error", message: "Insufficient funds" }
      ]
    };

    const summary = await reconcileAndDispatch(buildWideWindow(NOW), harness.deps);

    expect(summary.dispatched).toBe(0);
    expect(summary.failed).toBe(1);
    expect(harness.sink.received.map((notification) => notification.subject)).toEqual(["Batch Partially Failed"]);
  });

  it("explains why a candidate was ignored when verbose", async () => {
    const harness = createHarness([makeEvent({ id: "evt-zero", title: "BUY 0 AAPL" })]);

    await reconcileAndDispatch(buildWideWindow(NOW), { ...harness.deps, verbose: true });

    expect(console.log).toHaveBeenCalledWith("   No trade instruction (Quantity must be positive, got 0)");
  });

  it("dispatches when the ledger store cannot be reached", async () => {
    const store = new FlakyStore();
    store.failReads = true;
    const harness = createHarness(
      [makeEvent({ id: "evt-byd", title: "BUY 1 BYD", startTime: minutesFromNow(1) })],
      store
    );

    const summary = await runPollTrigger(harness.deps, options);

    expect(summary?.dispatched).toBe(1);
    expect(harness.service.trades).toHaveLength(1);
    expect(console.warn).toHaveBeenCalledWith(
      "⚠️ Ledger read failed; treating evt-byd as not yet dispatched: store read timeout"
    );
  });

  it("keeps a failed dispatch marked so it is not retried", async () => {
    const harness = createHarness([makeEvent({ id: "evt-1", title: "SELL 5 AAPL", startTime: minutesFromNow(1) })]);
    harness.service.outcome = { status: "error", message: "Insufficient funds" };

    const first = await runPollTrigger(harness.deps, options);
    const second = await runPollTrigger(harness.deps, options);

    expect(first?.failed).toBe(1);
    expect(second?.skippedDuplicates).toBe(1);
    expect(harness.service.trades).toHaveLength(1);
    expect(await harness.ledger.has("evt-1")).toBe(true);
    expect(harness.sink.received.map((notification) => notification.subject)).toEqual(["Trade Execution Failed"]);
  });

  it("ignores candidates without an instruction and leaves them unmarked", async () => {
    const harness = createHarness([
      makeEvent({ id: "evt-review", title: "Trade review", startTime: minutesFromNow(1) }),
      makeEvent({ id: "evt-zero", title: "BUY 0 AAPL", startTime: minutesFromNow(1) })
    ]);

    const summary = await reconcileAndDispatch(buildWideWindow(NOW), harness.deps);

    expect(summary.scanned).toBe(2);
    expect(summary.ignored).toBe(2);
    expect(summary.reports).toEqual([]);
    expect(await harness.ledger.list()).toEqual([]);
  });

  it("dispatches batch events and singles in calendar order", async () => {
    const harness = createHarness([
      makeEvent({
        id: "evt-rebalance",
        title: "Rebalance",
        description: "BUY 10 TSLA, SELL 5 AAPL",
        startTime: minutesFromNow(-30)
      }),
      makeEvent({ id: "evt-byd", title: "BUY 1 BYD", startTime: minutesFromNow(1) })
    ]);

    const summary = await reconcileAndDispatch(buildWideWindow(NOW), harness.deps);

    expect(summary.dispatched).toBe(2);
    expect(summary.reports.map((report) => report.eventId)).toEqual(["evt-rebalance", "evt-byd"]);
    expect(harness.service.batches).toEqual([
      {
        rawTradesText: "Rebalance\nBUY 10 TSLA, SELL 5 AAPL",
        correlationEventId: "evt-rebalance",
        correlationEventTitle: "Rebalance"
      }
    ]);
    expect((await harness.ledger.list()).map((record) => record.eventId)).toEqual(["evt-rebalance", "evt-byd"]);
  });

  it("skips an event another invocation marked after the lookup", async () => {
    const harness = createHarness([makeEvent({ id: "evt-byd", title: "BUY 1 BYD", startTime: minutesFromNow(1) })]);
    await harness.ledger.markDispatched("evt-byd", "BUY 1 BYD");
    vi.spyOn(harness.ledger, "has").mockResolvedValue(false);

    const summary = await reconcileAndDispatch(buildWideWindow(NOW), harness.deps);

    expect(summary.skippedDuplicates).toBe(1);
    expect(harness.service.trades).toEqual([]);
  });

  it("formats a one-line summary", async () => {
    const harness = createHarness([makeEvent({ id: "evt-byd", title: "BUY 1 BYD", startTime: minutesFromNow(1) })]);

    const summary = await reconcileAndDispatch(buildWideWindow(NOW), harness.deps);

    expect(formatSummary(summary)).toBe(
      "📊 wide scan: 1 candidate(s), 1 dispatched, 0 failed, 0 already executed, 0 without instructions"
    );
  });
});

describe("triggers", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("scans the wide window on a push", async () => {
    const harness = createHarness([
      makeEvent({ id: "evt-past", title: "BUY 1 BYD", startTime: minutesFromNow(-120) }),
      makeEvent({ id: "evt-later", title: "SELL 1 BYD", startTime: minutesFromNow(120) })
    ]);

    const summary = await runPushTrigger(harness.deps, options);

    expect(summary?.window.kind).toBe("wide");
    expect(summary?.dispatched).toBe(2);
    expect(harness.calendar.calls).toEqual([
      { start: new Date("2026-10-18T10:00:00.000Z"), end: new Date("2026-10-20T10:00:00.000Z") }
    ]);
  });

  it("only takes events about to start on a poll", async () => {
    const harness = createHarness([
      makeEvent({ id: "evt-soon", title: "BUY 1 BYD", startTime: minutesFromNow(1) }),
      makeEvent({ id: "evt-later", title: "SELL 1 BYD", startTime: minutesFromNow(5) })
    ]);

    const summary = await runPollTrigger(harness.deps, options);

    expect(summary?.window.kind).toBe("narrow");
    expect(summary?.reports.map((report) => report.eventId)).toEqual(["evt-soon"]);
  });

  it("honours custom window widths", async () => {
    const harness = createHarness([makeEvent({ id: "evt-later", title: "SELL 1 BYD", startTime: minutesFromNow(5) })]);

    const summary = await runPollTrigger(harness.deps, { ...options, lookaheadMs: 10 * 60 * 1000 });

    expect(summary?.dispatched).toBe(1);
  });

  it("logs and swallows a calendar failure", async () => {
    const harness = createHarness();
    harness.calendar.failWith = new Error("calendar unavailable");

    await expect(runPollTrigger(harness.deps, options)).resolves.toBeNull();
    expect(console.error).toHaveBeenCalledWith("💥 poll trigger failed: calendar unavailable");
  });
});
