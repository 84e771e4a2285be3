import { Settings } from "../config/settings";
import { CalendarClient } from "../calendar/types";
import { EventSourceAdapter } from "../calendar/event-source";
import { FileCalendarClient } from "../calendar/file-calendar-client";
import { GoogleCalendarClient, createGoogleCalendarClient } from "../calendar/google-calendar-client";
import { InstructionParser } from "../parser/instruction-parser";
import { ExecutionLedger, LedgerFailure } from "../ledger/execution-ledger";
import { KeyValueStore } from "../store/types";
import { createKeyValueStore } from "../store/factory";
import { ExecutionService } from "../execution/types";
import { createExecutionService } from "../execution/factory";
import { SimulatorExecutionService } from "../execution/simulator-execution-service";
import { createNotificationSink } from "../notify/factory";
import { Notification, NotificationSink } from "../notify/types";
import { TradeDispatcher } from "./trade-dispatcher";
import { ReconcileDependencies } from "./reconciler";
import { describeError } from "../shared/errors";

export interface RuntimeOverrides {
  /** Read events from this JSON file instead of the configured calendar. */
  calendarFile?: string;
  simulate?: boolean;
  verbose?: boolean;
}

export interface Runtime {
  settings: Settings;
  calendar: CalendarClient;
  store: KeyValueStore;
  execution: ExecutionService;
  ledger: ExecutionLedger;
  deps: ReconcileDependencies;
  close(): Promise<void>;
}

export function createParser(settings: Settings): InstructionParser {
  return new InstructionParser({ defaults: settings.defaults });
}

/** With a sink, the first store failure of a run is also sent as a notification. */
export function createLedger(
  settings: Settings,
  sink?: NotificationSink
): { store: KeyValueStore; ledger: ExecutionLedger } {
  const store = createKeyValueStore(settings.ledger);
  const ledger = new ExecutionLedger(store, {
    capacity: settings.ledger.capacity,
    onStoreFailure: sink ? (failure) => sink.notify(buildLedgerFailureNotification(store.name, failure)) : undefined
  });
  return { store, ledger };
}

export function buildLedgerFailureNotification(storeName: string, failure: LedgerFailure): Notification {
  return {
    subject: "Ledger Unavailable",
    message:
      `⚠️ The ${storeName} ledger ${failure.operation} failed for event ${failure.eventId}: ${failure.message}. ` +
      "Events are dispatched without duplicate protection until the store recovers.",
    level: "warning",
    details: { store: storeName, ...failure }
  };
}

export function createCalendarClient(settings: Settings, calendarFile?: string): CalendarClient {
  const file = calendarFile ?? (settings.calendar.source === "file" ? settings.calendar.file : undefined);
  if (file) {
    return new FileCalendarClient(file);
  }
  return createGoogleClient(settings);
}

export function createGoogleClient(settings: Settings): GoogleCalendarClient {
  return createGoogleCalendarClient(settings.calendar, settings.calendar.calendarId);
}

export function createRuntime(settings: Settings, overrides: RuntimeOverrides = {}): Runtime {
  const calendar = createCalendarClient(settings, overrides.calendarFile);
  const sink = createNotificationSink(settings.notifications);
  const { store, ledger } = createLedger(settings, sink);
  const execution = overrides.simulate ? new SimulatorExecutionService() : createExecutionService(settings.execution);
  const dispatcher = new TradeDispatcher(execution, sink);

  const deps: ReconcileDependencies = {
    events: new EventSourceAdapter(calendar),
    parser: createParser(settings),
    ledger,
    dispatcher,
    verbose: overrides.verbose ?? false
  };

  console.log(
    `⚙️ Calendar: ${calendar.name}, ledger: ${store.name} (capacity ${settings.ledger.capacity}), ` +
      `execution: ${execution.name}, notifications: ${sink.name}`
  );

  return {
    settings,
    calendar,
    store,
    execution,
    ledger,
    deps,
    close: () => closeStore(store)
  };
}

export async function closeStore(store: KeyValueStore): Promise<void> {
  if (!store.close) {
    return;
  }
  try {
    await store.close();
  } catch (error) {
    console.warn(`Failed to close ${store.name} store: ${describeError(error)}`);
  }
}
