import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { z } from "zod";
import { CalendarClient } from "./types";
import { CalendarEvent } from "../types/calendar";

const fileEventSchema = z.object({
  id: z.string().min(1),
  title: z.string().default(""),
  description: z.string().nullish(),
  startTime: z.string().refine((value) => !Number.isNaN(Date.parse(value)), "startTime must be an ISO date"),
  endTime: z.string().optional()
});

const fileSchema = z.union([z.array(fileEventSchema), z.object({ events: z.array(fileEventSchema) })]);

/**
 * Calendar backed by a JSON file, either an array of events or `{ "events": [...] }`.
 * The file is re-read on every call so edits show up like calendar mutations.
 */
export class FileCalendarClient implements CalendarClient {
  readonly name = "file";
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = resolve(process.cwd(), filePath);
  }

  async getEvents(start: Date, end: Date): Promise<CalendarEvent[]> {
    const raw = readFileSync(this.filePath, "utf8");
    const parsed = fileSchema.parse(JSON.parse(raw));
    const entries = Array.isArray(parsed) ? parsed : parsed.events;

    return entries
      .filter((entry) => {
        const startMs = Date.parse(entry.startTime);
        const endMs = entry.endTime ? Date.parse(entry.endTime) : startMs;
        return endMs >= start.getTime() && startMs <= end.getTime();
      })
      .map((entry) => ({
        id: entry.id,
        title: entry.title,
        description: entry.description ?? "",
        startTime: new Date(entry.startTime)
      }));
  }
}
