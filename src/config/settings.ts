import { z } from "zod";
import { paths } from "./paths";

const optionalString = z
  .string()
  .trim()
  .transform((value) => (value === "" ? undefined : value))
  .optional();

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const settingsSchema = z
  .object({
    EXECUTION_SERVICE: z.enum(["http", "simulator"]).default("simulator"),
    EXECUTION_SERVICE_URL: optionalString.pipe(z.string().url().optional()),
    EXECUTION_SERVICE_API_KEY: optionalString,
    DEFAULT_SYMBOL: z
      .string()
      .trim()
      .regex(/^[A-Za-z]{1,5}$/, "DEFAULT_SYMBOL must be 1-5 letters")
      .default("BYD"),
    DEFAULT_QUANTITY: positiveInt(1),
    LEDGER_STORE: z.enum(["file", "redis", "memory"]).default("file"),
    LEDGER_FILE: optionalString,
    LEDGER_CAPACITY: positiveInt(100),
    REDIS_URL: z.string().default("redis://localhost:6379"),
    CALENDAR_SOURCE: z.enum(["google", "file"]).default("google"),
    CALENDAR_FILE: optionalString,
    GOOGLE_CALENDAR_ID: z.string().default("primary"),
    GOOGLE_CLIENT_ID: optionalString,
    GOOGLE_CLIENT_SECRET: optionalString,
    GOOGLE_REFRESH_TOKEN: optionalString,
    GOOGLE_SERVICE_ACCOUNT_KEY_FILE: optionalString,
    CALENDAR_CHANNEL_TOKEN: optionalString,
    POLL_INTERVAL_SECONDS: positiveInt(300),
    POLL_LOOKAHEAD_SECONDS: positiveInt(120),
    SCAN_WINDOW_HOURS: positiveInt(24),
    DISCORD_WEBHOOK_URL: optionalString.pipe(z.string().url().optional()),
    FEISHU_WEBHOOK_URL: optionalString.pipe(z.string().url().optional()),
    FEISHU_SECRET: optionalString,
    PORT: positiveInt(8080)
  })
  .superRefine((env, ctx) => {
    if (env.EXECUTION_SERVICE === "http" && !env.EXECUTION_SERVICE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["EXECUTION_SERVICE_URL"],
        message: "EXECUTION_SERVICE_URL is required when EXECUTION_SERVICE=http"
      });
    }
    if (env.CALENDAR_SOURCE === "file" && !env.CALENDAR_FILE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["CALENDAR_FILE"],
        message: "CALENDAR_FILE is required when CALENDAR_SOURCE=file"
      });
    }
    if (env.FEISHU_WEBHOOK_URL && !env.FEISHU_SECRET) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["FEISHU_SECRET"],
        message: "FEISHU_SECRET is required together with FEISHU_WEBHOOK_URL"
      });
    }
  });

export interface Settings {
  execution: {
    mode: "http" | "simulator";
    baseUrl?: string;
    apiKey?: string;
  };
  defaults: {
    symbol: string;
    quantity: number;
  };
  ledger: {
    store: "file" | "redis" | "memory";
    file: string;
    capacity: number;
    redisUrl: string;
  };
  calendar: {
    source: "google" | "file";
    file?: string;
    calendarId: string;
    clientId?: string;
    clientSecret?: string;
    refreshToken?: string;
    serviceAccountKeyFile?: string;
    channelToken?: string;
  };
  schedule: {
    pollIntervalMs: number;
    lookaheadMs: number;
    scanWindowMs: number;
  };
  notifications: {
    discordWebhookUrl?: string;
    feishuWebhookUrl?: string;
    feishuSecret?: string;
  };
  port: number;
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = settingsSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "env"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }

  const values = parsed.data;
  return {
    execution: {
      mode: values.EXECUTION_SERVICE,
      baseUrl: values.EXECUTION_SERVICE_URL,
      apiKey: values.EXECUTION_SERVICE_API_KEY
    },
    defaults: {
      symbol: values.DEFAULT_SYMBOL.toUpperCase(),
      quantity: values.DEFAULT_QUANTITY
    },
    ledger: {
      store: values.LEDGER_STORE,
      file: values.LEDGER_FILE ?? paths.ledgerStore,
      capacity: values.LEDGER_CAPACITY,
      redisUrl: values.REDIS_URL
    },
    calendar: {
      source: values.CALENDAR_SOURCE,
      file: values.CALENDAR_FILE,
      calendarId: values.GOOGLE_CALENDAR_ID,
      clientId: values.GOOGLE_CLIENT_ID,
      clientSecret: values.GOOGLE_CLIENT_SECRET,
      refreshToken: values.GOOGLE_REFRESH_TOKEN,
      serviceAccountKeyFile: values.GOOGLE_SERVICE_ACCOUNT_KEY_FILE,
      channelToken: values.CALENDAR_CHANNEL_TOKEN
    },
    schedule: {
      pollIntervalMs: values.POLL_INTERVAL_SECONDS * 1000,
      lookaheadMs: values.POLL_LOOKAHEAD_SECONDS * 1000,
      scanWindowMs: values.SCAN_WINDOW_HOURS * 60 * 60 * 1000
    },
    notifications: {
      discordWebhookUrl: values.DISCORD_WEBHOOK_URL,
      feishuWebhookUrl: values.FEISHU_WEBHOOK_URL,
      feishuSecret: values.FEISHU_SECRET
    },
    port: values.PORT
  };
}
