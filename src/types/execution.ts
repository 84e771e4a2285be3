import type { DispatchInput } from "./trade";

export type ExecutionStatus = "simulated" | "executed" | "error";

export interface ExecutionOutcome {
  status: ExecutionStatus;
  message: string;
  orderId?: string;
}

/** A batch reply; `results` holds one outcome per trade when the service reports them. */
export interface BatchExecutionOutcome extends ExecutionOutcome {
  results?: ExecutionOutcome[];
}

export type DispatchOutcome = ExecutionOutcome | BatchExecutionOutcome;

export interface CorrelationMeta {
  correlationEventId: string;
  correlationEventTitle: string;
}

export interface ExecutionRecord {
  eventId: string;
  eventTitle: string;
  dispatchedAt: string;
  outcome: "dispatched";
}

export interface DispatchReport {
  eventId: string;
  eventTitle: string;
  input: DispatchInput;
  outcome: DispatchOutcome;
  success: boolean;
  submittedAt: string;
}
