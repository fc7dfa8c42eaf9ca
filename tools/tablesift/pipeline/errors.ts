import { PRESET_NAMES } from "./types.js";

export class PipelineError extends Error {
  public readonly code: string;

  constructor(message: string, options: { code: string; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.code = options.code;
  }
}

export class UnknownPresetError extends PipelineError {
  constructor(preset: string) {
    super(`Unknown preset: ${preset}. Available: ${PRESET_NAMES.join(", ")}`, {
      code: "UNKNOWN_PRESET",
    });
  }
}

export class MissingMetadataError extends PipelineError {
  constructor(message: string) {
    super(message, { code: "MISSING_METADATA" });
  }
}

export class ConfigError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super(message, { code: "CONFIG_ERROR", cause });
  }
}

export class UnknownLabelError extends PipelineError {
  constructor(label: string) {
    super(`Label '${label}' not found`, { code: "UNKNOWN_LABEL" });
  }
}

export class SessionStateError extends PipelineError {
  constructor(message: string) {
    super(message, { code: "SESSION_STATE" });
  }
}

export class GridFormatError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super(message, { code: "GRID_FORMAT", cause });
  }
}

export class CleanerError extends PipelineError {
  public readonly cleanerName: string;

  constructor(cleanerName: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Cleaner ${cleanerName} failed: ${detail}`, { code: "CLEANER_FAILED", cause });
    this.cleanerName = cleanerName;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorCode(error: unknown): string {
  return error instanceof PipelineError ? error.code : "UNEXPECTED_ERROR";
}
