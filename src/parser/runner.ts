import { InstructionMatcher, MatchContext, MatchResult } from "./types";

export function runMatchers(
  text: string,
  context: MatchContext,
  matchers: InstructionMatcher[]
): MatchResult | null {
  for (const matcher of matchers) {
    const result = matcher.match(text, context);
    if (result) {
      return result;
    }
  }
  return null;
}
