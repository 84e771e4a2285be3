import { InstructionMatcher, MatchResult } from "./types";
import { checkQuantity } from "./quantity";
import { isTradeAction } from "../types/trade";

const PATTERN = /\b(BUY|SELL)\s+(\d+)\s+([A-Z]{1,5})\b/;

/** `BUY 5 AAPL` */
export class ActionFirstMatcher implements InstructionMatcher {
  public readonly name = "ActionFirstMatcher";

  match(text: string): MatchResult | null {
    const found = PATTERN.exec(text);
    if (!found) {
      return null;
    }

    const [, action, digits, symbol] = found;
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
