export interface CalendarEvent {
  id: string;
  title: string;
  description: string;
  startTime: Date;
}

export type ScanWindowKind = "wide" | "narrow";

export interface ScanWindow {
  kind: ScanWindowKind;
  start: Date;
  end: Date;
  /** Events starting after this instant are dropped even if the calendar returned them. */
  latestStart?: Date;
}
