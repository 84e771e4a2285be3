import { randomUUID } from "node:crypto";
import { google, type calendar_v3 } from "googleapis";
import { CalendarClient } from "./types";
import { CalendarEvent } from "../types/calendar";

const CALENDAR_SCOPES = ["https://www.googleapis.com/auth/calendar.readonly"];
const PAGE_SIZE = 250;

/** The slice of `calendar.events` this client needs. */
export interface GoogleEventsApi {
  list(params: calendar_v3.Params$Resource$Events$List): Promise<{ data: calendar_v3.Schema$Events }>;
  watch(params: calendar_v3.Params$Resource$Events$Watch): Promise<{ data: calendar_v3.Schema$Channel }>;
}

export interface GoogleCalendarCredentials {
  clientId?: string;
  clientSecret?: string;
  refreshToken?: string;
  serviceAccountKeyFile?: string;
}

export interface WatchChannelOptions {
  address: string;
  channelId?: string;
  token?: string;
  ttlSeconds?: number;
}

export interface WatchChannel {
  id: string;
  resourceId?: string;
  expiration?: string;
}

export class GoogleCalendarClient implements CalendarClient {
  readonly name = "google";
  private readonly events: GoogleEventsApi;
  private readonly calendarId: string;

  constructor(events: GoogleEventsApi, calendarId = "primary") {
    this.events = events;
    this.calendarId = calendarId;
  }

  async getEvents(start: Date, end: Date): Promise<CalendarEvent[]> {
    const collected: CalendarEvent[] = [];
    let pageToken: string | undefined;

    do {
      const response = await this.events.list({
        calendarId: this.calendarId,
        timeMin: start.toISOString(),
        timeMax: end.toISOString(),
        singleEvents: true,
        orderBy: "startTime",
        maxResults: PAGE_SIZE,
        pageToken
      });

      for (const item of response.data.items ?? []) {
        const event = toCalendarEvent(item);
        if (event) {
          collected.push(event);
        }
      }

      pageToken = response.data.nextPageToken ?? undefined;
    } while (pageToken);

    return collected;
  }

  /** Registers a push channel so calendar mutations POST to `address`. */
  async watch(options: WatchChannelOptions): Promise<WatchChannel> {
    const channelId = options.channelId ?? randomUUID();
    const response = await this.events.watch({
      calendarId: this.calendarId,
      requestBody: {
        id: channelId,
        type: "web_hook",
        address: options.address,
        token: options.token,
        params: options.ttlSeconds ? { ttl: String(options.ttlSeconds) } : undefined
      }
    });

    return {
      id: response.data.id ?? channelId,
      resourceId: response.data.resourceId ?? undefined,
      expiration: response.data.expiration ?? undefined
    };
  }
}

export function createGoogleCalendarClient(
  credentials: GoogleCalendarCredentials,
  calendarId = "primary"
): GoogleCalendarClient {
  const calendar = google.calendar({ version: "v3", auth: createAuth(credentials) });

  return new GoogleCalendarClient(
    {
      list: (params) => calendar.events.list(params),
      watch: (params) => calendar.events.watch(params)
    },
    calendarId
  );
}

function createAuth(credentials: GoogleCalendarCredentials) {
  if (credentials.serviceAccountKeyFile) {
    return new google.auth.GoogleAuth({
      keyFile: credentials.serviceAccountKeyFile,
      scopes: CALENDAR_SCOPES
    });
  }

  const { clientId, clientSecret, refreshToken } = credentials;
  if (!clientId || !clientSecret || !refreshToken) {
    throw new Error(
      "Google Calendar needs GOOGLE_SERVICE_ACCOUNT_KEY_FILE or GOOGLE_CLIENT_ID/GOOGLE_CLIENT_SECRET/GOOGLE_REFRESH_TOKEN"
    );
  }

  const oauth2Client = new google.auth.OAuth2(clientId, clientSecret);
  oauth2Client.setCredentials({ refresh_token: refreshToken });
  return oauth2Client;
}

export function toCalendarEvent(item: calendar_v3.Schema$Event): CalendarEvent | null {
  if (!item.id || item.status === "cancelled") {
    return null;
  }

  const startRaw = item.start?.dateTime ?? item.start?.date;
  if (!startRaw) {
    return null;
  }
  const startTime = new Date(startRaw);
  if (Number.isNaN(startTime.getTime())) {
    return null;
  }

  return {
    id: item.id,
    title: item.summary ?? "",
    description: item.description ?? "",
    startTime
  };
}
