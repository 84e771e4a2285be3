import { KeyValueStore } from "../store/types";
import { ExecutionRecord } from "../types/execution";
import { describeError } from "../shared/errors";

export const LEDGER_KEY = "EXECUTED_EVENTS";
export const DEFAULT_LEDGER_CAPACITY = 100;

/**
 * - `marked`: newly recorded; the caller owns the dispatch.
 * - `duplicate`: someone recorded it first; the caller must not dispatch.
 * - `unpersisted`: the store failed; the caller proceeds (fail-open).
 */
export type MarkOutcome = "marked" | "duplicate" | "unpersisted";

export type LedgerOperation = "read" | "write";

export interface LedgerFailure {
  operation: LedgerOperation;
  eventId: string;
  message: string;
}

export interface ExecutionLedgerOptions {
  capacity?: number;
  key?: string;
  now?: () => Date;
  /**
   * Called when the store starts failing. Not called again until an operation
   * succeeds, so a store that stays broken is reported once.
   */
  onStoreFailure?: (failure: LedgerFailure) => void | Promise<void>;
}

/**
 * Bounded, FIFO-evicting record of event ids already handed to the execution
 * service. State lives only in the injected store; nothing is cached between
 * calls because separate invocations share nothing but that store.
 *
 * Operations on one instance run one at a time, so the push and poll paths of a
 * single process cannot interleave a load and a write.
 */
export class ExecutionLedger {
  private readonly store: KeyValueStore;
  private readonly capacity: number;
  private readonly key: string;
  private readonly now: () => Date;
  private readonly onStoreFailure?: (failure: LedgerFailure) => void | Promise<void>;
  private queue: Promise<void> = Promise.resolve();
  private failing = false;

  constructor(store: KeyValueStore, options: ExecutionLedgerOptions = {}) {
    const capacity = options.capacity ?? DEFAULT_LEDGER_CAPACITY;
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new Error("Ledger capacity must be a positive integer");
    }
    this.store = store;
    this.capacity = capacity;
    this.key = options.key ?? LEDGER_KEY;
    this.now = options.now ?? (() => new Date());
    this.onStoreFailure = options.onStoreFailure;
  }

  has(eventId: string): Promise<boolean> {
    return this.exclusive(async () => {
      try {
        const records = await this.load();
        this.failing = false;
        return records.some((record) => record.eventId === eventId);
      } catch (error) {
        console.warn(`⚠️ Ledger read failed; treating ${eventId} as not yet dispatched: ${describeError(error)}`);
        await this.reportFailure("read", eventId, error);
        return false;
      }
    });
  }

  markDispatched(eventId: string, eventTitle = ""): Promise<MarkOutcome> {
    return this.exclusive<MarkOutcome>(async () => {
      try {
        const records = await this.load();
        if (records.some((record) => record.eventId === eventId)) {
          this.failing = false;
          return "duplicate";
        }

        records.push({
          eventId,
          eventTitle,
          dispatchedAt: this.now().toISOString(),
          outcome: "dispatched"
        });
        const retained = records.length > this.capacity ? records.slice(-this.capacity) : records;

        await this.store.set(this.key, JSON.stringify(retained));
        this.failing = false;
        console.log(`✅ Marked event as dispatched: ${eventTitle || "(untitled)"} (ID: ${eventId})`);
        return "marked";
      } catch (error) {
        console.warn(`⚠️ Ledger write failed for ${eventId}; dispatch proceeds unrecorded: ${describeError(error)}`);
        await this.reportFailure("write", eventId, error);
        return "unpersisted";
      }
    });
  }

  clear(): Promise<void> {
    return this.exclusive(() => this.store.delete(this.key));
  }

  list(): Promise<ExecutionRecord[]> {
    return this.exclusive(() => this.load());
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    // The caller sees the rejection through `run`; the queue only needs to move on.
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async reportFailure(operation: LedgerOperation, eventId: string, error: unknown): Promise<void> {
    const alreadyFailing = this.failing;
    this.failing = true;
    if (alreadyFailing || !this.onStoreFailure) {
      return;
    }
    try {
      await this.onStoreFailure({ operation, eventId, message: describeError(error) });
    } catch (hookError) {
      console.error(`💥 Failed to report ledger failure: ${describeError(hookError)}`);
    }
  }

  private async load(): Promise<ExecutionRecord[]> {
    const raw = await this.store.get(this.key);
    if (!raw) {
      return [];
    }

    const parsed: unknown = JSON.parse(raw);
    if (!Array.isArray(parsed)) {
      throw new Error(`Ledger entry '${this.key}' is not a JSON array`);
    }

    const records: ExecutionRecord[] = [];
    for (const entry of parsed) {
      const record = toRecord(entry);
      if (record && !records.some((existing) => existing.eventId === record.eventId)) {
        records.push(record);
      }
    }
    return records;
  }
}

function toRecord(entry: unknown): ExecutionRecord | null {
  // Older ledgers hold bare event ids.
  if (typeof entry === "string") {
    return { eventId: entry, eventTitle: "", dispatchedAt: "", outcome: "dispatched" };
  }
  if (!entry || typeof entry !== "object") {
    return null;
  }

  const eventId = "eventId" in entry ? entry.eventId : undefined;
  if (typeof eventId !== "string" || !eventId) {
    return null;
  }
  const eventTitle = "eventTitle" in entry && typeof entry.eventTitle === "string" ? entry.eventTitle : "";
  const dispatchedAt =
    "dispatchedAt" in entry && typeof entry.dispatchedAt === "string" ? entry.dispatchedAt : "";

  return { eventId, eventTitle, dispatchedAt, outcome: "dispatched" };
}
