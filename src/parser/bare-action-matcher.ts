import { InstructionMatcher, MatchContext, MatchResult } from "./types";
import { isTradeAction } from "../types/trade";

const PATTERN = /\b(BUY|SELL)\b/;

export class BareActionMatcher implements InstructionMatcher {
  public readonly name = "BareActionMatcher";

  match(text: string, context: MatchContext): MatchResult | null {
    const found = PATTERN.exec(text);
    if (!found || !isTradeAction(found[1])) {
      return null;
    }

    return {
      matcher: this.name,
      instruction: {
        action: found[1],
        quantity: context.defaults.quantity,
        symbol: context.defaults.symbol
      },
      reason: `No quantity/symbol given; using defaults ${context.defaults.quantity} ${context.defaults.symbol}`
    };
  }
}
