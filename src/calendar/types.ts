import type { CalendarEvent } from "../types/calendar";

export interface CalendarClient {
  readonly name: string;

  /** Events overlapping [start, end], in calendar order. */
  getEvents(start: Date, end: Date): Promise<CalendarEvent[]>;
}
