import { BatchTradeRequest, ExecutionService, ServiceHealth, SingleTradeRequest } from "./types";
import { BatchExecutionOutcome, ExecutionOutcome } from "../types/execution";

export class SimulatorExecutionService implements ExecutionService {
  readonly name = "simulator";

  async submitTrade(request: SingleTradeRequest): Promise<ExecutionOutcome> {
    console.log(
      `[SIMULATOR] Would ${request.action} ${request.quantity} ${request.symbol} for event ${request.correlationEventId}`
    );

    return {
      status: "simulated",
      message: `Simulated ${request.action} ${request.quantity} ${request.symbol} (no external side effects)`
    };
  }

  async submitBatch(request: BatchTradeRequest): Promise<BatchExecutionOutcome> {
    console.log(`[SIMULATOR] Would submit batch for event ${request.correlationEventId}: ${request.rawTradesText}`);

    return {
      status: "simulated",
      message: "Simulated batch (no external side effects)"
    };
  }

  async health(): Promise<ServiceHealth> {
    return { healthy: true, message: "Simulator is always available" };
  }
}
