import { CalendarClient } from "./types";
import { CalendarEvent, ScanWindow } from "../types/calendar";
import { composeEventText } from "../parser/instruction-parser";

export const DEFAULT_TRADE_KEYWORDS = ["BUY", "SELL", "TRADE"];
export const DEFAULT_SCAN_WINDOW_MS = 24 * 60 * 60 * 1000;
export const DEFAULT_LOOKAHEAD_MS = 2 * 60 * 1000;

export interface EventSourceOptions {
  keywords?: string[];
}

export class EventSourceAdapter {
  private readonly client: CalendarClient;
  private readonly keywords: string[];

  constructor(client: CalendarClient, options: EventSourceOptions = {}) {
    this.client = client;
    this.keywords = (options.keywords ?? DEFAULT_TRADE_KEYWORDS).map((keyword) => keyword.toUpperCase());
  }

  get calendarName(): string {
    return this.client.name;
  }

  /** Calendar events in the window whose text mentions a trade keyword. */
  async getCandidateEvents(windowStart: Date, windowEnd: Date): Promise<CalendarEvent[]> {
    const events = await this.client.getEvents(windowStart, windowEnd);
    return events.filter((event) => this.mentionsKeyword(event));
  }

  async getEventsForWindow(window: ScanWindow): Promise<CalendarEvent[]> {
    const candidates = await this.getCandidateEvents(window.start, window.end);
    const latestStart = window.latestStart;
    if (!latestStart) {
      return candidates;
    }
    return candidates.filter((event) => event.startTime.getTime() <= latestStart.getTime());
  }

  private mentionsKeyword(event: CalendarEvent): boolean {
    const text = composeEventText(event.title, event.description).toUpperCase();
    return this.keywords.some((keyword) => text.includes(keyword));
  }
}

/** Full rescan around `now`, used when the calendar reports "something changed". */
export function buildWideWindow(now: Date, spanMs = DEFAULT_SCAN_WINDOW_MS): ScanWindow {
  return {
    kind: "wide",
    start: new Date(now.getTime() - spanMs),
    end: new Date(now.getTime() + spanMs)
  };
}

/** Events about to start, used by the timer. */
export function buildNarrowWindow(now: Date, lookaheadMs = DEFAULT_LOOKAHEAD_MS): ScanWindow {
  const end = new Date(now.getTime() + lookaheadMs);
  return {
    kind: "narrow",
    start: new Date(now.getTime()),
    end,
    latestStart: end
  };
}
