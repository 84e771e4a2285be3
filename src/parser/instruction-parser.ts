import { InstructionDefaults, InstructionMatcher, MatchContext, MatchResult } from "./types";
import { runMatchers } from "./runner";
import { ActionFirstMatcher } from "./action-first-matcher";
import { SymbolFirstMatcher } from "./symbol-first-matcher";
import { BareActionMatcher } from "./bare-action-matcher";
import { ParseResult, TradeInstruction } from "../types/trade";

const SEPARATOR_PATTERN = /[,;\n]/;
const ACTION_KEYWORD_PATTERN = /\b(BUY|SELL)\b/g;

export interface InstructionParserOptions {
  defaults: InstructionDefaults;
  matchers?: InstructionMatcher[];
}

export function createDefaultMatchers(): InstructionMatcher[] {
  return [new ActionFirstMatcher(), new SymbolFirstMatcher(), new BareActionMatcher()];
}

/** Title and description as one block of text; the description starts on its own line. */
export function composeEventText(title: string, description?: string | null): string {
  return [title, description ?? ""]
    .map((part) => part.trim())
    .filter(Boolean)
    .join("\n");
}

export class InstructionParser {
  private readonly context: MatchContext;
  private readonly matchers: InstructionMatcher[];

  constructor(options: InstructionParserOptions) {
    if (!Number.isInteger(options.defaults.quantity) || options.defaults.quantity <= 0) {
      throw new Error("Default quantity must be a positive integer");
    }
    this.context = {
      defaults: {
        symbol: options.defaults.symbol.toUpperCase(),
        quantity: options.defaults.quantity
      }
    };
    this.matchers = options.matchers ?? createDefaultMatchers();
  }

  parse(text: string): ParseResult {
    const normalized = text.toUpperCase();

    if (isBatchText(normalized)) {
      const instructions = normalized
        .split(SEPARATOR_PATTERN)
        .map((segment) => segment.trim())
        .filter(Boolean)
        .map((segment) => this.parseSingle(segment))
        .filter((instruction): instruction is TradeInstruction => instruction !== null);

      if (instructions.length === 0) {
        return { kind: "none" };
      }
      return { kind: "batch", batch: { instructions, rawText: text } };
    }

    const instruction = this.parseSingle(normalized);
    return instruction ? { kind: "single", instruction } : { kind: "none" };
  }

  parseEvent(event: { title: string; description: string }): ParseResult {
    return this.parse(composeEventText(event.title, event.description));
  }

  /** The matcher that claims `text` on its own (no batch split), with its reason if it gave one. */
  explain(text: string): MatchResult | null {
    return runMatchers(text.toUpperCase(), this.context, this.matchers);
  }

  private parseSingle(segment: string): TradeInstruction | null {
    const result = runMatchers(segment, this.context, this.matchers);
    return result?.instruction ?? null;
  }
}

function isBatchText(text: string): boolean {
  if (!SEPARATOR_PATTERN.test(text)) {
    return false;
  }
  const keywords = text.match(ACTION_KEYWORD_PATTERN) ?? [];
  return keywords.length >= 2;
}
