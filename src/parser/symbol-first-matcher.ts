import { InstructionMatcher, MatchResult } from "./types";
import { checkQuantity } from "./quantity";
import { isTradeAction } from "../types/trade";

const PATTERN = /\b([A-Z]{1,5})\s+(BUY|SELL)\s+(\d+)\b/;

/** `AAPL BUY 5` */
export class SymbolFirstMatcher implements InstructionMatcher {
  public readonly name = "SymbolFirstMatcher";

  match(text: string): MatchResult | null {
    const found = PATTERN.exec(text);
    if (!found) {
      return null;
    }

    const [, symbol, action, digits] = found;
    if (!isTradeAction(action)) {
      return null;
    }

    const quantity = checkQuantity(digits);
    if (!quantity.ok) {
      return { matcher: this.name, instruction: null, reason: quantity.reason };
    }

    return {
      matcher: this.name,
      instruction: { action, quantity: quantity.quantity, symbol }
    };
  }
}
