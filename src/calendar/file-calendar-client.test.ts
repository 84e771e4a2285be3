import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { FileCalendarClient } from "./file-calendar-client";

describe("FileCalendarClient", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "calendar-file-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeCalendar(contents: unknown): string {
    const filePath = join(dir, "calendar.json");
    writeFileSync(filePath, JSON.stringify(contents), "utf8");
    return filePath;
  }

  it("returns events overlapping the requested range", async () => {
    const filePath = writeCalendar([
      { id: "in", title: "BUY 1 BYD", description: null, startTime: "2026-10-19T10:01:00Z" },
      { id: "before", title: "SELL 1 BYD", startTime: "2026-10-19T08:00:00Z" },
      {
        id: "spanning",
        title: "Trading session",
        description: "SELL 2 NIO",
        startTime: "2026-10-19T09:00:00Z",
        endTime: "2026-10-19T11:00:00Z"
      }
    ]);
    const client = new FileCalendarClient(filePath);

    const events = await client.getEvents(new Date("2026-10-19T10:00:00Z"), new Date("2026-10-19T10:02:00Z"));

    expect(events).toEqual([
      { id: "in", title: "BUY 1 BYD", description: "", startTime: new Date("2026-10-19T10:01:00Z") },
      {
        id: "spanning",
        title: "Trading session",
        description: "SELL 2 NIO",
        startTime: new Date("2026-10-19T09:00:00Z")
      }
    ]);
  });

  it("accepts an object with an events array", async () => {
    const filePath = writeCalendar({ events: [{ id: "x", startTime: "2026-10-19T10:00:00Z" }] });
    const client = new FileCalendarClient(filePath);

    const events = await client.getEvents(new Date("2026-10-19T09:00:00Z"), new Date("2026-10-19T11:00:00Z"));

    expect(events).toEqual([{ id: "x", title: "", description: "", startTime: new Date("2026-10-19T10:00:00Z") }]);
  });

  it("rejects entries with an invalid start time", async () => {
    const filePath = writeCalendar([{ id: "bad", title: "BUY 1 BYD", startTime: "tomorrow-ish" }]);
    const client = new FileCalendarClient(filePath);

    await expect(client.getEvents(new Date(0), new Date())).rejects.toThrow("startTime must be an ISO date");
  });
});
