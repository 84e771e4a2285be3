import { CalendarClient } from "./calendar/types";
import { EventSourceAdapter } from "./calendar/event-source";
import { InstructionParser } from "./parser/instruction-parser";
import { ExecutionLedger } from "./ledger/execution-ledger";
import { KeyValueStore } from "./store/types";
import { MemoryKeyValueStore } from "./store/memory-kv-store";
import { BatchTradeRequest, ExecutionService, ServiceHealth, SingleTradeRequest } from "./execution/types";
import { Notification, NotificationSink } from "./notify/types";
import { TradeDispatcher } from "./services/trade-dispatcher";
import { ReconcileDependencies } from "./services/reconciler";
import { CalendarEvent } from "./types/calendar";
import { BatchExecutionOutcome, ExecutionOutcome } from "./types/execution";

export const NOW = new Date("2026-10-19T10:00:00.000Z");

export function minutesFromNow(minutes: number): Date {
  return new Date(NOW.getTime() + minutes * 60 * 1000);
}

export function makeEvent(overrides: Partial<CalendarEvent> & { id: string }): CalendarEvent {
  return {
    title: "",
    description: "",
    startTime: NOW,
    ...overrides
  };
}

/** Returns the events whose start falls inside the requested range, like a calendar query would. */
export class FakeCalendarClient implements CalendarClient {
  readonly name = "fake";
  readonly calls: Array<{ start: Date; end: Date }> = [];
  events: CalendarEvent[];
  failWith?: Error;

  constructor(events: CalendarEvent[] = []) {
    this.events = events;
  }

  async getEvents(start: Date, end: Date): Promise<CalendarEvent[]> {
    this.calls.push({ start, end });
    if (this.failWith) {
      throw this.failWith;
    }
    return this.events.filter(
      (event) => event.startTime.getTime() >= start.getTime() && event.startTime.getTime() <= end.getTime()
    );
  }
}

export class FakeExecutionService implements ExecutionService {
  readonly name = "fake";
  readonly trades: SingleTradeRequest[] = [];
  readonly batches: BatchTradeRequest[] = [];
  outcome: BatchExecutionOutcome = { status: "executed", message: "Order placed", orderId: "ord-1" };
  failWith?: Error;

  async submitTrade(request: SingleTradeRequest): Promise<ExecutionOutcome> {
    this.trades.push(request);
    if (this.failWith) {
      throw this.failWith;
    }
    return this.outcome;
  }

  async submitBatch(request: BatchTradeRequest): Promise<BatchExecutionOutcome> {
    this.batches.push(request);
    if (this.failWith) {
      throw this.failWith;
    }
    return this.outcome;
  }

  async health(): Promise<ServiceHealth> {
    return { healthy: true, message: "fake" };
  }
}

export class RecordingSink implements NotificationSink {
  readonly name = "recording";
  readonly received: Notification[] = [];
  failWith?: Error;

  async notify(notification: Notification): Promise<void> {
    if (this.failWith) {
      throw this.failWith;
    }
    this.received.push(notification);
  }
}

/** A store whose reads and writes can be made to fail. */
export class FlakyStore implements KeyValueStore {
  readonly name = "flaky";
  readonly inner = new MemoryKeyValueStore();
  failReads = false;
  failWrites = false;

  async get(key: string): Promise<string | undefined> {
    if (this.failReads) {
      throw new Error("store read timeout");
    }
    return this.inner.get(key);
  }

  async set(key: string, value: string): Promise<void> {
    if (this.failWrites) {
      throw new Error("store write timeout");
    }
    await this.inner.set(key, value);
  }

  async delete(key: string): Promise<void> {
    await this.inner.delete(key);
  }
}

export interface Harness {
  calendar: FakeCalendarClient;
  service: FakeExecutionService;
  sink: RecordingSink;
  store: KeyValueStore;
  ledger: ExecutionLedger;
  deps: ReconcileDependencies;
}

export function createHarness(events: CalendarEvent[] = [], store: KeyValueStore = new MemoryKeyValueStore()): Harness {
  const calendar = new FakeCalendarClient(events);
  const service = new FakeExecutionService();
  const sink = new RecordingSink();
  const ledger = new ExecutionLedger(store, { now: () => NOW });

  return {
    calendar,
    service,
    sink,
    store,
    ledger,
    deps: {
      events: new EventSourceAdapter(calendar),
      parser: new InstructionParser({ defaults: { symbol: "BYD", quantity: 1 } }),
      ledger,
      dispatcher: new TradeDispatcher(service, sink, { now: () => NOW })
    }
  };
}
