import type { TradeInstruction } from "../types/trade";
import type { BatchExecutionOutcome, CorrelationMeta, ExecutionOutcome } from "../types/execution";

export type SingleTradeRequest = TradeInstruction & CorrelationMeta;

export interface BatchTradeRequest extends CorrelationMeta {
  rawTradesText: string;
}

export interface ServiceHealth {
  healthy: boolean;
  message: string;
  details?: Record<string, unknown>;
}

export interface ExecutionService {
  readonly name: string;

  submitTrade(request: SingleTradeRequest): Promise<ExecutionOutcome>;

  submitBatch(request: BatchTradeRequest): Promise<BatchExecutionOutcome>;

  health(): Promise<ServiceHealth>;
}
