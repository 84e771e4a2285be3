#!/usr/bin/env node

import { resolve } from "node:path";
import { config as loadEnv } from "dotenv";
import { Settings, loadSettings } from "./config/settings";
import { Runtime, closeStore, createGoogleClient, createLedger, createParser, createRuntime } from "./services/runtime";
import { runPollTrigger, runPushTrigger, TriggerOptions } from "./scheduler/triggers";
import { runPollLoop } from "./scheduler/poll-loop";
import { createPushApp, startPushServer } from "./server/push-server";
import { createExecutionService } from "./execution/factory";
import { composeEventText } from "./parser/instruction-parser";
import { describeInstruction } from "./types/trade";
import { describeError } from "./shared/errors";

interface CliOptions {
  positionals: string[];
  input?: string;
  simulate?: boolean;
  verbose?: boolean;
  interval?: number;
  port?: number;
  poll?: boolean;
  text?: string;
  address?: string;
  channelId?: string;
  ttl?: number;
}

interface ParsedCli {
  command: string | undefined;
  options: CliOptions;
}

async function main(): Promise<void> {
  loadEnv({ path: resolve(process.cwd(), "config.env") });
  const { command, options } = parseCli(process.argv.slice(2));

  if (command === "help" || command === undefined) {
    printHelp();
    return;
  }

  let settings: Settings;
  try {
    settings = applyOverrides(loadSettings(), options);
  } catch (error) {
    console.error(describeError(error));
    process.exitCode = 1;
    return;
  }

  switch (command) {
    case "serve":
      await handleServe(settings, options);
      break;
    case "poll":
      await handleOnce("poll", settings, options);
      break;
    case "reconcile":
      await handleOnce("push", settings, options);
      break;
    case "parse":
      handleParse(settings, options);
      break;
    case "ledger":
      await handleLedger(settings, options);
      break;
    case "health":
      await handleHealth(settings);
      break;
    case "watch-channel":
      await handleWatchChannel(settings, options);
      break;
    default:
      console.error(`Unknown command: ${command}`);
      printHelp();
      process.exitCode = 1;
  }
}

async function handleServe(settings: Settings, options: CliOptions): Promise<void> {
  const runtime = createRuntime(settings, runtimeOverrides(options));
  const triggerOptions = buildTriggerOptions(settings);

  const app = createPushApp({
    channelToken: settings.calendar.channelToken,
    onCalendarChange: () => runPushTrigger(runtime.deps, triggerOptions)
  });
  startPushServer(app, settings.port);

  if (options.poll === false) {
    console.log("⏸️ Poll loop disabled; waiting for calendar notifications only.");
    return;
  }

  const intervalSeconds = settings.schedule.pollIntervalMs / 1000;
  console.log(`📡 Starting poll loop (interval ${intervalSeconds}s)`);
  await runPollLoop({
    intervalMs: settings.schedule.pollIntervalMs,
    tick: () => runPollTrigger(runtime.deps, triggerOptions)
  });
}

async function handleOnce(source: "push" | "poll", settings: Settings, options: CliOptions): Promise<void> {
  const runtime = createRuntime(settings, runtimeOverrides(options));
  try {
    const triggerOptions = buildTriggerOptions(settings);
    const summary =
      source === "push"
        ? await runPushTrigger(runtime.deps, triggerOptions)
        : await runPollTrigger(runtime.deps, triggerOptions);

    if (!summary) {
      process.exitCode = 1;
      return;
    }
    printReports(runtime, summary.reports.length);
  } finally {
    await runtime.close();
  }
}

function printReports(runtime: Runtime, count: number): void {
  if (count === 0) {
    console.log("No trades dispatched in this run.");
    return;
  }
  console.log(`🚀 ${count} dispatch(es) sent to ${runtime.execution.name} execution service`);
}

function handleParse(settings: Settings, options: CliOptions): void {
  const text = options.text ?? options.positionals.join(" ");
  if (!text.trim()) {
    console.error("Missing text: parse --text \"BUY 5 AAPL\"");
    process.exitCode = 1;
    return;
  }

  const parser = createParser(settings);
  const composed = composeEventText(text);
  const result = parser.parse(composed);
  switch (result.kind) {
    case "single":
      console.log(`"${text}" -> ${describeInstruction(result.instruction)}`);
      break;
    case "batch":
      console.log(`"${text}" -> batch of ${result.batch.instructions.length}`);
      result.batch.instructions.forEach((instruction, index) => {
        console.log(`  ${index + 1}. ${describeInstruction(instruction)}`);
      });
      return;
    case "none":
      console.log(`"${text}" -> no trade instruction`);
      break;
  }

  const match = parser.explain(composed);
  if (match) {
    console.log(`  via ${match.matcher}${match.reason ? `: ${match.reason}` : ""}`);
  }
}

async function handleLedger(settings: Settings, options: CliOptions): Promise<void> {
  const action = options.positionals[0] ?? "list";
  const { store, ledger } = createLedger(settings);

  try {
    switch (action) {
      case "list": {
        const records = await ledger.list();
        if (records.length === 0) {
          console.log("📋 No execution history found");
          return;
        }
        console.log(`📋 Execution history (${records.length}/${settings.ledger.capacity} events):`);
        records.forEach((record, index) => {
          const when = record.dispatchedAt || "unknown time";
          const title = record.eventTitle ? ` "${record.eventTitle}"` : "";
          console.log(`  ${index + 1}. ${record.eventId}${title} @ ${when}`);
        });
        return;
      }
      case "clear":
        await ledger.clear();
        console.log("🗑️ Execution history cleared");
        return;
      default:
        console.error(`Unknown ledger action: ${action} (expected list or clear)`);
        process.exitCode = 1;
    }
  } finally {
    await closeStore(store);
  }
}

async function handleHealth(settings: Settings): Promise<void> {
  const service = createExecutionService(settings.execution);
  console.log(`🏥 Testing ${service.name} execution service health...`);
  try {
    const health = await service.health();
    const marker = health.healthy ? "✅" : "❌";
    console.log(`${marker} ${health.message}`);
    if (!health.healthy) {
      process.exitCode = 1;
    }
  } catch (error) {
    console.error(`💥 Health check error: ${describeError(error)}`);
    process.exitCode = 1;
  }
}

async function handleWatchChannel(settings: Settings, options: CliOptions): Promise<void> {
  if (!options.address) {
    console.error("Missing required option: --address <https url of /notifications/calendar>");
    process.exitCode = 1;
    return;
  }

  const client = createGoogleClient(settings);
  const channel = await client.watch({
    address: options.address,
    channelId: options.channelId,
    token: settings.calendar.channelToken,
    ttlSeconds: options.ttl
  });

  console.log(`✅ Calendar push channel registered: ${channel.id}`);
  if (channel.resourceId) {
    console.log(`   Resource ID: ${channel.resourceId}`);
  }
  if (channel.expiration) {
    console.log(`   Expires: ${new Date(Number(channel.expiration)).toISOString()}`);
  }
}

function runtimeOverrides(options: CliOptions) {
  return {
    calendarFile: options.input,
    simulate: options.simulate,
    verbose: options.verbose
  };
}

function buildTriggerOptions(settings: Settings): TriggerOptions {
  return {
    scanWindowMs: settings.schedule.scanWindowMs,
    lookaheadMs: settings.schedule.lookaheadMs
  };
}

function applyOverrides(settings: Settings, options: CliOptions): Settings {
  return {
    ...settings,
    port: options.port ?? settings.port,
    schedule: {
      ...settings.schedule,
      pollIntervalMs: options.interval !== undefined ? options.interval * 1000 : settings.schedule.pollIntervalMs
    }
  };
}

function parseCli(argv: string[]): ParsedCli {
  const [command, ...rest] = argv;
  const options: CliOptions = { positionals: [] };

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    switch (arg) {
      case "--input":
        options.input = rest[++i];
        break;
      case "--simulate":
        options.simulate = true;
        break;
      case "--verbose":
        options.verbose = true;
        break;
      case "--no-poll":
        options.poll = false;
        break;
      case "--text":
        options.text = rest[++i];
        break;
      case "--address":
        options.address = rest[++i];
        break;
      case "--channel-id":
        options.channelId = rest[++i];
        break;
      case "--interval": {
        const value = parseFloat(rest[++i] ?? "");
        if (Number.isNaN(value) || value <= 0) {
          console.warn("Invalid value for --interval; ignoring.");
        } else {
          options.interval = value;
        }
        break;
      }
      case "--port": {
        const value = parseInt(rest[++i] ?? "", 10);
        if (Number.isNaN(value) || value <= 0) {
          console.warn("Invalid value for --port; ignoring.");
        } else {
          options.port = value;
        }
        break;
      }
      case "--ttl": {
        const value = parseInt(rest[++i] ?? "", 10);
        if (Number.isNaN(value) || value <= 0) {
          console.warn("Invalid value for --ttl; ignoring.");
        } else {
          options.ttl = value;
        }
        break;
      }
      default:
        if (arg.startsWith("--")) {
          console.warn(`Unknown option ignored: ${arg}`);
        } else {
          options.positionals.push(arg);
        }
    }
  }

  return { command, options };
}

function printHelp(): void {
  console.log(`
Usage: node dist/index.js <command> [options]

Commands:
  serve [--port n] [--interval seconds] [--no-poll] [--input file] [--simulate] [--verbose]
        Listen for calendar change notifications and poll for events about to start

  poll [--input file] [--simulate] [--verbose]
        One poll-path run: dispatch events starting within the look-ahead window

  reconcile [--input file] [--simulate] [--verbose]
        One push-path run: rescan the wide window around now

  parse --text "BUY 5 AAPL"
        Show what the instruction parser makes of a piece of text

  ledger [list|clear]
        Inspect or reset the dispatched-event ledger

  health
        Check the execution service's /health endpoint

  watch-channel --address url [--channel-id id] [--ttl seconds]
        Register a Google Calendar push channel pointing at this service

  help
        Show this help

Examples:
  npm start
  node dist/index.js poll --input ./examples/calendar.json --simulate --verbose
  node dist/index.js parse --text "BUY 10 TSLA, SELL 5 AAPL"
  node dist/index.js watch-channel --address https://trades.example.com/notifications/calendar --ttl 604800
`);
}

void main().catch((error) => {
  console.error("Command failed:", describeError(error));
  process.exitCode = 1;
});
