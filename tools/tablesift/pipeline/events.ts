import { appendFileSync } from "fs";
import { dirname } from "path";
import { ensureDir } from "../lib/json.js";
import { getTelemetryContext } from "./telemetry-context.js";
import type { EventType, LogRuntimeConfig, PipelineEvent } from "./types.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface EmitInput {
  level: LogLevel;
  message: string;
  eventType?: EventType;
  stage?: PipelineEvent["stage"];
  source?: string;
  phase?: PipelineEvent["phase"];
  durationMs?: number;
  path?: string;
  bytes?: number;
  errorCode?: string;
  [key: string]: unknown;
}

const MAX_STRING_LENGTH = 240;

class EventEmitter {
  constructor(private readonly config: LogRuntimeConfig) {}

  emit(input: EmitInput): void {
    const ctx = getTelemetryContext();
    const { level, message, ...rest } = input;
    const baseEvent: PipelineEvent = {
      ...rest,
      ts: new Date().toISOString(),
      runId: this.config.runId,
      level,
      stage: input.stage ?? ctx.stage,
      source: input.source ?? ctx.source,
      eventType: input.eventType ?? "session.update",
      message,
    };

    const event = redactEvent(baseEvent);

    if (this.config.terminal) {
      this.writeTerminal(event);
    }

    if (this.config.eventsLogPath) {
      this.writeFileLine(this.config.eventsLogPath, this.renderPretty(event));
    }

    if (this.config.eventFilePath) {
      this.writeFileLine(this.config.eventFilePath, JSON.stringify(event));
    }
  }

  private writeTerminal(event: PipelineEvent): void {
    if (!shouldPrintToTerminal(event, this.config.verbose)) {
      return;
    }

    const line = this.config.format === "json" ? JSON.stringify(event) : this.renderLine(event);

    if (event.level === "error") {
      console.error(line);
      return;
    }
    if (event.level === "warn") {
      console.warn(line);
      return;
    }
    if (this.config.terminalStream === "stderr") {
      console.error(line);
      return;
    }
    console.log(line);
  }

  private renderLine(event: PipelineEvent): string {
    return this.config.verbose ? this.renderPretty(event) : this.renderCondensed(event);
  }

  renderPretty(event: PipelineEvent): string {
    const source = event.source ? `/${event.source}` : "";
    const prefix = `${event.ts} [${event.stage}${source}] [${event.eventType}]`;
    const extras = Object.entries(event)
      .filter(
        ([key]) =>
          !["ts", "runId", "level", "stage", "source", "eventType", "message"].includes(key)
      )
      .filter(([, value]) => value !== undefined && value !== null && value !== "")
      .map(([key, value]) => `${key}=${JSON.stringify(value)}`)
      .join(" ");

    return `${prefix} ${event.message}${extras ? ` ${extras}` : ""}`;
  }

  renderCondensed(event: PipelineEvent): string {
    const time = formatShortTime(event.ts);
    const phase = event.phase ? ` ${event.phase}` : "";
    const source = event.source ? `:${event.source}` : "";
    const prefix = `[${time}] ${event.stage}${source}${phase}`;
    const extras = renderCondensedExtras(event);
    return `${prefix} ${event.message}${extras ? ` ${extras}` : ""}`;
  }

  private writeFileLine(path: string, line: string): void {
    ensureDir(dirname(path));
    appendFileSync(path, `${line}\n`);
  }
}

let globalEmitter: EventEmitter | null = null;

export function initializeEventEmitter(config: LogRuntimeConfig): void {
  globalEmitter = new EventEmitter(config);
}

export function resetEventEmitter(): void {
  globalEmitter = null;
}

export function emitPipelineEvent(input: EmitInput): void {
  if (!globalEmitter) {
    return;
  }
  globalEmitter.emit(input);
}

function redactEvent(event: PipelineEvent): PipelineEvent {
  const redacted: PipelineEvent = { ...event };
  for (const [key, value] of Object.entries(event)) {
    redacted[key] = redactValue(key, value);
  }
  return redacted;
}

export function redactEventForTest(event: PipelineEvent): PipelineEvent {
  return redactEvent(event);
}

export function formatPrettyForTest(event: PipelineEvent): string {
  const emitter = new EventEmitter({
    runId: event.runId,
    format: "pretty",
    verbose: true,
    terminal: false,
  });
  return emitter.renderPretty(event);
}

export function formatCondensedForTest(event: PipelineEvent): string {
  const emitter = new EventEmitter({
    runId: event.runId,
    format: "pretty",
    verbose: false,
    terminal: false,
  });
  return emitter.renderCondensed(event);
}

export function shouldPrintToTerminalForTest(event: PipelineEvent, verbose: boolean): boolean {
  return shouldPrintToTerminal(event, verbose);
}

function redactValue(key: string, value: unknown): unknown {
  if (value == null) {
    return value;
  }

  if (isSensitiveKey(key.toLowerCase())) {
    return "[REDACTED]";
  }

  if (typeof value === "string") {
    return truncate(value, MAX_STRING_LENGTH);
  }

  if (Array.isArray(value)) {
    return value.map((item) => redactValue(key, item));
  }

  if (typeof value === "object" && !(value instanceof Date)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = redactValue(k, v);
    }
    return out;
  }

  return value;
}

function isSensitiveKey(key: string): boolean {
  return (
    key.includes("token") ||
    key.includes("apikey") ||
    key.includes("api_key") ||
    key.includes("secret") ||
    key.includes("password") ||
    key.includes("authorization")
  );
}

function truncate(value: string, max: number): string {
  if (value.length <= max) {
    return value;
  }
  return `${value.slice(0, max)}...[truncated]`;
}

function shouldPrintToTerminal(event: PipelineEvent, verbose: boolean): boolean {
  if (verbose) {
    return true;
  }

  if (event.level === "error") {
    return true;
  }

  if (event.level === "debug") {
    return false;
  }

  if (event.eventType === "file.read" || event.eventType === "file.write") {
    return false;
  }

  if (event.eventType === "extract.lifecycle" || event.eventType === "clean.lifecycle") {
    return event.phase === "end" || event.phase === "fail";
  }

  return true;
}

function renderCondensedExtras(event: PipelineEvent): string {
  const keys: string[] = ["rows", "columns", "confidence", "durationMs", "errorCode"];
  const out: string[] = [];
  for (const key of keys) {
    const value = event[key];
    if (value === undefined || value === null || value === "") {
      continue;
    }
    out.push(`${key}=${JSON.stringify(value)}`);
  }
  return out.join(" ");
}

function formatShortTime(ts: string): string {
  const match = ts.match(/T(\d{2}:\d{2}:\d{2})/);
  if (match) {
    return match[1];
  }
  return ts;
}
