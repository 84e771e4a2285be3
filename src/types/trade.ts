export const TRADE_ACTIONS = ["BUY", "SELL"] as const;

export type TradeAction = (typeof TRADE_ACTIONS)[number];

export interface TradeInstruction {
  symbol: string;
  action: TradeAction;
  quantity: number;
}

export interface TradeBatch {
  instructions: TradeInstruction[];
  rawText: string;
}

export type ParseResult =
  | { kind: "none" }
  | { kind: "single"; instruction: TradeInstruction }
  | { kind: "batch"; batch: TradeBatch };

export type DispatchInput = TradeInstruction | TradeBatch;

export function isTradeAction(value: string): value is TradeAction {
  return value === "BUY" || value === "SELL";
}

export function isTradeBatch(input: DispatchInput): input is TradeBatch {
  return "instructions" in input;
}

export function describeInstruction(instruction: TradeInstruction): string {
  return `${instruction.action} ${instruction.quantity} ${instruction.symbol}`;
}
