import { ExecutionService } from "../execution/types";
import { isExecutionSuccess } from "../execution/factory";
import { Notification, NotificationSink } from "../notify/types";
import { DispatchOutcome, DispatchReport, ExecutionOutcome } from "../types/execution";
import { DispatchInput, describeInstruction, isTradeBatch } from "../types/trade";
import { describeError } from "../shared/errors";

export interface TradeDispatcherOptions {
  now?: () => Date;
}

/**
 * One call to the execution service, one outcome, one report. Nothing here
 * retries: a failed dispatch goes to a human through the notification sink.
 */
export class TradeDispatcher {
  private readonly service: ExecutionService;
  private readonly sink: NotificationSink;
  private readonly now: () => Date;

  constructor(service: ExecutionService, sink: NotificationSink, options: TradeDispatcherOptions = {}) {
    this.service = service;
    this.sink = sink;
    this.now = options.now ?? (() => new Date());
  }

  get serviceName(): string {
    return this.service.name;
  }

  async submit(input: DispatchInput, correlationEventId: string, correlationEventTitle: string): Promise<DispatchReport> {
    const submittedAt = this.now().toISOString();
    const outcome = await this.callService(input, correlationEventId, correlationEventTitle);
    const success = isExecutionSuccess(outcome.status) && failedBatchItems(outcome).length === 0;

    const status = success ? "SUCCESS" : "FAILED";
    console.log(`  [${status}] ${summarizeInput(input)} (event ${correlationEventId}) - ${outcome.message}`);

    const report: DispatchReport = {
      eventId: correlationEventId,
      eventTitle: correlationEventTitle,
      input,
      outcome,
      success,
      submittedAt
    };

    try {
      await this.sink.notify(buildOutcomeNotification(report));
    } catch (error) {
      console.error(`💥 Failed to deliver ${this.sink.name} notification: ${describeError(error)}`);
    }

    return report;
  }

  private async callService(
    input: DispatchInput,
    correlationEventId: string,
    correlationEventTitle: string
  ): Promise<DispatchOutcome> {
    try {
      if (isTradeBatch(input)) {
        return await this.service.submitBatch({
          rawTradesText: input.rawText,
          correlationEventId,
          correlationEventTitle
        });
      }
      return await this.service.submitTrade({
        ...input,
        correlationEventId,
        correlationEventTitle
      });
    } catch (error) {
      return {
        status: "error",
        message: `Execution service call failed: ${describeError(error)}`
      };
    }
  }
}

/** Per-trade failures inside a batch the service accepted as a whole. */
export function failedBatchItems(outcome: DispatchOutcome): ExecutionOutcome[] {
  if (!("results" in outcome) || !outcome.results) {
    return [];
  }
  return outcome.results.filter((result) => !isExecutionSuccess(result.status));
}

export function summarizeInput(input: DispatchInput): string {
  if (isTradeBatch(input)) {
    const trades = input.instructions.map(describeInstruction).join("; ");
    return `batch of ${input.instructions.length} trade(s) [${trades}]`;
  }
  return describeInstruction(input);
}

export function buildOutcomeNotification(report: DispatchReport): Notification {
  const { outcome } = report;
  const summary = `${summarizeInput(report.input)} from "${report.eventTitle}"`;
  const details = {
    correlationEventId: report.eventId,
    correlationEventTitle: report.eventTitle,
    input: report.input,
    outcome
  };

  const failedItems = failedBatchItems(outcome);
  if (isExecutionSuccess(outcome.status) && failedItems.length > 0) {
    const total = "results" in outcome && outcome.results ? outcome.results.length : failedItems.length;
    const reasons = failedItems.map((item) => item.message).join("; ");
    return {
      subject: "Batch Partially Failed",
      message:
        `⚠️ ${summary}: ${failedItems.length} of ${total} trade(s) failed (${reasons}). ` +
        "The event stays marked as dispatched and will not be retried.",
      level: "error",
      details
    };
  }

  switch (outcome.status) {
    case "executed":
      return {
        subject: "Trade Executed Successfully",
        message: `✅ ${summary}: ${outcome.message}`,
        level: "success",
        details
      };
    case "simulated":
      return {
        subject: "Trade Simulated",
        message: `🔍 ${summary}: ${outcome.message}`,
        level: "info",
        details
      };
    case "error":
    default:
      return {
        subject: "Trade Execution Failed",
        message: `❌ ${summary}: ${outcome.message}. The event stays marked as dispatched and will not be retried.`,
        level: "error",
        details
      };
  }
}
