import type { TradeInstruction } from "../types/trade";

export interface InstructionDefaults {
  symbol: string;
  quantity: number;
}

export interface MatchContext {
  defaults: InstructionDefaults;
}

export interface MatchResult {
  matcher: string;
  /** `null` when the text matched structurally but carried an unusable value. */
  instruction: TradeInstruction | null;
  reason?: string;
}

export interface InstructionMatcher {
  name: string;
  /**
   * Inspect upper-cased text. Returns `null` when the pattern does not apply,
   * so the next matcher in line gets a chance.
   */
  match(text: string, context: MatchContext): MatchResult | null;
}
