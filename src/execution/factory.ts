import { ExecutionService } from "./types";
import { HttpExecutionService } from "./http-execution-service";
import { SimulatorExecutionService } from "./simulator-execution-service";
import type { Settings } from "../config/settings";
import type { ExecutionStatus } from "../types/execution";

export function createExecutionService(settings: Settings["execution"]): ExecutionService {
  if (settings.mode === "http") {
    if (!settings.baseUrl) {
      throw new Error("EXECUTION_SERVICE_URL is required for the http execution service");
    }
    return new HttpExecutionService({ baseUrl: settings.baseUrl, apiKey: settings.apiKey });
  }
  return new SimulatorExecutionService();
}

export function isExecutionSuccess(status: ExecutionStatus): boolean {
  return status === "executed" || status === "simulated";
}
