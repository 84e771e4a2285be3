import { EventSourceAdapter } from "../calendar/event-source";
import { InstructionParser, composeEventText } from "../parser/instruction-parser";
import { ExecutionLedger } from "../ledger/execution-ledger";
import { TradeDispatcher } from "./trade-dispatcher";
import { ScanWindow } from "../types/calendar";
import { DispatchReport } from "../types/execution";
import { DispatchInput, ParseResult, describeInstruction } from "../types/trade";

export interface ReconcileDependencies {
  events: EventSourceAdapter;
  parser: InstructionParser;
  ledger: ExecutionLedger;
  dispatcher: TradeDispatcher;
  verbose?: boolean;
}

export interface ReconcileSummary {
  window: ScanWindow;
  scanned: number;
  ignored: number;
  skippedDuplicates: number;
  dispatched: number;
  failed: number;
  reports: DispatchReport[];
}

/**
 * The one place that decides whether an event is dispatched. Both trigger paths
 * come through here with their own window and share the ledger.
 *
 * Events are handled one at a time in calendar order. The ledger mark is
 * written before the execution service is called, so a second observer that
 * arrives later skips the event even if this dispatch is still in flight or
 * ends up failing.
 */
export async function reconcileAndDispatch(
  window: ScanWindow,
  deps: ReconcileDependencies
): Promise<ReconcileSummary> {
  const { events, parser, ledger, dispatcher } = deps;
  const candidates = await events.getEventsForWindow(window);

  const summary: ReconcileSummary = {
    window,
    scanned: candidates.length,
    ignored: 0,
    skippedDuplicates: 0,
    dispatched: 0,
    failed: 0,
    reports: []
  };

  for (const event of candidates) {
    if (deps.verbose) {
      console.log(`🔍 Checking event: "${event.title}" (${event.startTime.toISOString()})`);
    }

    const parsed = parser.parseEvent(event);
    const input = toDispatchInput(parsed);
    if (!input) {
      if (deps.verbose) {
        const reason = parser.explain(composeEventText(event.title, event.description))?.reason;
        console.log(`   No trade instruction${reason ? ` (${reason})` : ""}`);
      }
      summary.ignored += 1;
      continue;
    }

    if (await ledger.has(event.id)) {
      console.log(`⏭️ Skipping already executed event: ${event.title} (ID: ${event.id})`);
      summary.skippedDuplicates += 1;
      continue;
    }

    const mark = await ledger.markDispatched(event.id, event.title);
    if (mark === "duplicate") {
      console.log(`⏭️ Event ${event.id} was marked by another invocation; skipping`);
      summary.skippedDuplicates += 1;
      continue;
    }

    console.log(`📈 Dispatching ${describeParse(parsed)} from "${event.title}" via ${dispatcher.serviceName}`);
    const report = await dispatcher.submit(input, event.id, event.title);
    summary.reports.push(report);
    if (report.success) {
      summary.dispatched += 1;
    } else {
      summary.failed += 1;
    }
  }

  return summary;
}

function toDispatchInput(parsed: ParseResult): DispatchInput | null {
  switch (parsed.kind) {
    case "single":
      return parsed.instruction;
    case "batch":
      return parsed.batch;
    case "none":
    default:
      return null;
  }
}

function describeParse(parsed: ParseResult): string {
  if (parsed.kind === "single") {
    return describeInstruction(parsed.instruction);
  }
  if (parsed.kind === "batch") {
    return `batch of ${parsed.batch.instructions.length} trade(s)`;
  }
  return "nothing";
}

export function formatSummary(summary: ReconcileSummary): string {
  return (
    `📊 ${summary.window.kind} scan: ${summary.scanned} candidate(s), ` +
    `${summary.dispatched} dispatched, ${summary.failed} failed, ` +
    `${summary.skippedDuplicates} already executed, ${summary.ignored} without instructions`
  );
}
