import { z } from "zod";
import { BatchTradeRequest, ExecutionService, ServiceHealth, SingleTradeRequest } from "./types";
import { BatchExecutionOutcome, ExecutionOutcome } from "../types/execution";
import { JsonRequester, joinUrl, requestJson } from "../shared/http";

const outcomeSchema = z.object({
  status: z.enum(["simulated", "executed", "error"]),
  message: z.string().default(""),
  orderId: z
    .union([z.string(), z.number()])
    .nullish()
    .transform((value) => (value === null || value === undefined ? undefined : String(value)))
});

const batchOutcomeSchema = outcomeSchema.extend({
  results: z.array(outcomeSchema).optional()
});

const healthSchema = z
  .object({
    status: z.string().optional()
  })
  .passthrough();

export interface HttpExecutionServiceOptions {
  baseUrl: string;
  apiKey?: string;
  request?: JsonRequester;
}

/**
 * Client for the order-placement service: `POST /trade`, `POST /trades`, `GET /health`.
 */
export class HttpExecutionService implements ExecutionService {
  readonly name = "http";
  private readonly baseUrl: string;
  private readonly apiKey?: string;
  private readonly request: JsonRequester;

  constructor(options: HttpExecutionServiceOptions) {
    this.baseUrl = options.baseUrl;
    this.apiKey = options.apiKey;
    this.request = options.request ?? requestJson;
  }

  async submitTrade(request: SingleTradeRequest): Promise<ExecutionOutcome> {
    const payload = await this.request(joinUrl(this.baseUrl, "/trade"), {
      method: "POST",
      headers: this.headers(),
      body: {
        symbol: request.symbol,
        action: request.action,
        quantity: request.quantity,
        correlationEventId: request.correlationEventId,
        correlationEventTitle: request.correlationEventTitle
      }
    });
    return parseResponse(outcomeSchema, payload, "trade");
  }

  async submitBatch(request: BatchTradeRequest): Promise<BatchExecutionOutcome> {
    const payload = await this.request(joinUrl(this.baseUrl, "/trades"), {
      method: "POST",
      headers: this.headers(),
      body: {
        rawTradesText: request.rawTradesText,
        correlationEventId: request.correlationEventId,
        correlationEventTitle: request.correlationEventTitle
      }
    });
    return parseResponse(batchOutcomeSchema, payload, "batch");
  }

  async health(): Promise<ServiceHealth> {
    const payload = await this.request(joinUrl(this.baseUrl, "/health"), {
      method: "GET",
      headers: this.headers()
    });
    const parsed = healthSchema.parse(payload);
    const status = parsed.status ?? "unknown";

    return {
      healthy: status === "healthy" || status === "ok",
      message: `Execution service status: ${status}`,
      details: parsed
    };
  }

  private headers(): Record<string, string> {
    return this.apiKey ? { "X-API-Key": this.apiKey } : {};
  }
}

function parseResponse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, payload: unknown, label: string): T {
  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new Error(`Unexpected ${label} response from execution service: ${issues}`);
  }
  return parsed.data;
}
