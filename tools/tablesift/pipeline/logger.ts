import type { EventType, PipelineStage } from "./types.js";
import { emitPipelineEvent, type LogLevel } from "./events.js";

export interface LogMeta {
  stage?: PipelineStage;
  source?: string;
  eventType?: EventType;
  phase?: "start" | "end" | "fail" | "progress";
  durationMs?: number;
  path?: string;
  errorCode?: string;
  [key: string]: unknown;
}

export class Logger {
  constructor(private readonly defaults: LogMeta = {}) {}

  debug(message: string, meta: LogMeta = {}): void {
    this.emit("debug", message, meta);
  }

  info(message: string, meta: LogMeta = {}): void {
    this.emit("info", message, meta);
  }

  warn(message: string, meta: LogMeta = {}): void {
    this.emit("warn", message, meta);
  }

  error(message: string, meta: LogMeta = {}): void {
    this.emit("error", message, meta);
  }

  private emit(level: LogLevel, message: string, meta: LogMeta): void {
    emitPipelineEvent({
      ...this.defaults,
      ...meta,
      level,
      message,
      eventType: meta.eventType ?? this.defaults.eventType ?? "session.update",
    });
  }
}
