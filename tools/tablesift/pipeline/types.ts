export type CellValue = string | number | boolean | Date | null;
export type Grid = CellValue[][];

export interface Table {
  columns: string[];
  rows: CellValue[][];
  index: number[];
}

export interface ExtractedData {
  readonly core: Table;
  readonly metadata: ReadonlyMap<string, string>;
  readonly headerRow: number | null;
  readonly dataRange: readonly [number, number];
  readonly footer: readonly string[];
  readonly confidence: number;
  readonly warnings: readonly string[];
}

export interface DenseRegion {
  start: number;
  end: number;
}

export type Cleaner = (table: Table, filename?: string) => Table;

export const PRESET_NAMES = ["none", "minimal", "standard", "aggressive"] as const;
export type PresetName = (typeof PRESET_NAMES)[number];

export interface CleaningConfig {
  cleaners?: Cleaner[];
  cleaner?: Cleaner;
  preset?: PresetName | string;
}

export interface CombineOptions {
  addSource?: boolean;
  ignoreIndex?: boolean;
  metadata?: ReadonlyMap<string, ReadonlyMap<string, string>>;
  includeMetadata?: string[];
}

export type PipelineStage = "extract" | "clean" | "combine" | "ingest" | "system";

export type LogFormat = "pretty" | "json";
export type EventType =
  | "extract.lifecycle"
  | "extract.warning"
  | "extract.failure"
  | "clean.lifecycle"
  | "clean.failure"
  | "combine.lifecycle"
  | "session.update"
  | "file.read"
  | "file.write";

export interface PipelineEvent {
  ts: string;
  runId: string;
  level: "debug" | "info" | "warn" | "error";
  stage: PipelineStage;
  source?: string;
  eventType: EventType;
  message: string;
  phase?: "start" | "end" | "fail" | "progress";
  durationMs?: number;
  path?: string;
  bytes?: number;
  errorCode?: string;
  [key: string]: unknown;
}

export interface LogRuntimeConfig {
  runId: string;
  format: LogFormat;
  verbose: boolean;
  terminal: boolean;
  /** Where non-warning terminal lines go; stderr keeps stdout free for output. */
  terminalStream?: "stdout" | "stderr";
  eventsLogPath?: string;
  eventFilePath?: string;
}
