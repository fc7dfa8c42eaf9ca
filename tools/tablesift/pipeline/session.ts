import { resolveCleaners, cleanTable } from "../clean/presets.js";
import { combineTables } from "../combine/combine.js";
import { extractCoreData } from "../extract/core.js";
import { copyTable, tableFromGrid } from "../lib/table.js";
import { resolveExtractionOptions, type ExtractionOptions, type ExtractionOptionsInput } from "./config.js";
import {
  MissingMetadataError,
  SessionStateError,
  UnknownLabelError,
  errorCode,
  errorMessage,
} from "./errors.js";
import { Logger } from "./logger.js";
import { runWithTelemetryContext } from "./telemetry-context.js";
import type { Cleaner, CleaningConfig, ExtractedData, Grid, Table } from "./types.js";

export interface SessionOptions {
  /** Keep earlier tables when a new file arrives instead of replacing them. */
  retainData?: boolean;
  extractCore?: boolean;
  extraction?: ExtractionOptionsInput;
  /** Omit to skip cleaning entirely. */
  cleaning?: CleaningConfig;
}

export interface IngestFailure {
  label: string;
  filename: string;
  key: string;
  stage: "load" | "extract" | "clean";
  errorCode: string;
  error: string;
}

export interface IngestResult {
  label: string;
  filename: string;
  tables: string[];
  failures: IngestFailure[];
}

export type Combiner = (tables: ReadonlyMap<string, Table>) => Table;

export interface SessionCombineOptions {
  addSource?: boolean;
  ignoreIndex?: boolean;
  includeMetadata?: string[];
  combiner?: Combiner;
}

interface Zone {
  filename: string | null;
  data: Map<string, Table>;
  extracted: Map<string, ExtractedData>;
  failures: IngestFailure[];
  selected: string | null;
}

function emptyZone(): Zone {
  return {
    filename: null,
    data: new Map(),
    extracted: new Map(),
    failures: [],
    selected: null,
  };
}

/**
 * Holds the tables imported under a set of labels. Each incoming table runs
 * through extraction and cleaning on its own, so one bad sheet never costs
 * the rest of the batch.
 */
export class ImportSession {
  private readonly zones = new Map<string, Zone>();
  private readonly extraction: ExtractionOptions;
  private readonly cleaners: readonly Cleaner[] | null;
  private readonly logger = new Logger({ stage: "ingest", eventType: "session.update" });
  readonly retainData: boolean;
  readonly extractCore: boolean;

  constructor(labels: string[], options: SessionOptions = {}) {
    this.retainData = options.retainData ?? false;
    this.extractCore = options.extractCore ?? false;
    this.extraction = resolveExtractionOptions(options.extraction);
    this.cleaners = options.cleaning ? resolveCleaners(options.cleaning) : null;
    for (const label of labels) {
      this.zones.set(label, emptyZone());
    }
  }

  get labels(): string[] {
    return [...this.zones.keys()];
  }

  add(label: string): this {
    if (this.zones.has(label)) {
      this.logger.warn("Label already exists", { label });
      return this;
    }
    this.zones.set(label, emptyZone());
    return this;
  }

  remove(label: string): this {
    if (!this.zones.delete(label)) {
      this.logger.warn("Label not found", { label });
    }
    return this;
  }

  clear(label: string): this {
    this.zone(label);
    this.zones.set(label, emptyZone());
    return this;
  }

  ingest(label: string, filename: string, sheets: ReadonlyMap<string, Grid>): IngestResult {
    const zone = this.zone(label);
    if (!this.retainData) {
      zone.data.clear();
      zone.extracted.clear();
      zone.failures = [];
      zone.selected = null;
    }

    const failures: IngestFailure[] = [];
    for (const [key, grid] of sheets) {
      const outcome = runWithTelemetryContext({ stage: "ingest", source: key }, () =>
        this.processTable(label, filename, key, grid)
      );
      zone.data.set(key, outcome.table);
      if (outcome.extracted) {
        zone.extracted.set(key, outcome.extracted);
      }
      failures.push(...outcome.failures);
    }

    zone.filename = filename;
    zone.failures.push(...failures);
    if (zone.selected === null || !zone.data.has(zone.selected)) {
      zone.selected = zone.data.keys().next().value ?? null;
    }

    this.logger.info("Tables loaded", {
      label,
      filename,
      added: sheets.size,
      total: zone.data.size,
      failed: failures.length,
    });

    return { label, filename, tables: [...sheets.keys()], failures };
  }

  private processTable(
    label: string,
    filename: string,
    key: string,
    grid: Grid
  ): { table: Table; extracted: ExtractedData | null; failures: IngestFailure[] } {
    const failures: IngestFailure[] = [];
    let extracted: ExtractedData | null = null;
    let table: Table | null = null;

    if (this.extractCore) {
      try {
        extracted = extractCoreData(grid, this.extraction);
        table = copyTable(extracted.core);
      } catch (error) {
        failures.push(this.recordFailure(label, filename, key, "extract", error));
      }
    }

    table ??= tableFromGrid(grid);

    if (this.cleaners) {
      try {
        table = cleanTable(table, { cleaners: [...this.cleaners] }, filename);
      } catch (error) {
        failures.push(this.recordFailure(label, filename, key, "clean", error));
      }
    }

    return { table, extracted, failures };
  }

  private recordFailure(
    label: string,
    filename: string,
    key: string,
    stage: "extract" | "clean",
    error: unknown
  ): IngestFailure {
    const failure: IngestFailure = {
      label,
      filename,
      key,
      stage,
      errorCode: errorCode(error),
      error: errorMessage(error),
    };
    this.logger.warn(`${stage === "extract" ? "Core extraction" : "Cleaning"} failed; passing table through`, {
      eventType: stage === "extract" ? "extract.failure" : "clean.failure",
      phase: "fail",
      label,
      filename,
      errorCode: failure.errorCode,
      errorMessage: failure.error,
    });
    return failure;
  }

  get(label: string): Table | null {
    const zone = this.zone(label);
    return zone.selected === null ? null : zone.data.get(zone.selected) ?? null;
  }

  selectedKey(label: string): string | null {
    return this.zone(label).selected;
  }

  select(label: string, key: string): this {
    const zone = this.zone(label);
    if (zone.data.size === 0) {
      throw new SessionStateError(`No data loaded for '${label}'`);
    }
    if (!zone.data.has(key)) {
      throw new SessionStateError(
        `Key '${key}' not found. Available: ${[...zone.data.keys()].join(", ")}`
      );
    }
    zone.selected = key;
    return this;
  }

  getAll(label: string): ReadonlyMap<string, Table> {
    return new Map(this.zone(label).data);
  }

  filename(label: string): string | null {
    return this.zone(label).filename;
  }

  failures(label: string): readonly IngestFailure[] {
    return [...this.zone(label).failures];
  }

  getExtracted(label: string, key?: string): ExtractedData {
    const results = this.extractedFor(label);
    if (key !== undefined) {
      const result = results.get(key);
      if (!result) {
        throw new SessionStateError(`Key '${key}' not found in '${label}'`);
      }
      return result;
    }
    const [only, ...rest] = [...results.values()];
    if (rest.length > 0) {
      throw new SessionStateError(
        `'${label}' holds several extractions; pass one of: ${[...results.keys()].join(", ")}`
      );
    }
    return only;
  }

  hasExtracted(label: string): boolean {
    return this.extractCore && this.zone(label).extracted.size > 0;
  }

  getAllExtracted(label: string): ReadonlyMap<string, ExtractedData> {
    return new Map(this.extractedFor(label));
  }

  private extractedFor(label: string): Map<string, ExtractedData> {
    const zone = this.zone(label);
    if (!this.extractCore) {
      throw new SessionStateError("Core extraction is not enabled for this session");
    }
    if (zone.extracted.size === 0) {
      throw new SessionStateError(`No extracted data for '${label}'`);
    }
    return zone.extracted;
  }

  combine(label: string, options: SessionCombineOptions = {}): Table {
    const zone = this.zone(label);
    if (zone.data.size === 0) {
      throw new SessionStateError(`No data for '${label}'`);
    }
    if (options.combiner) {
      return options.combiner(new Map(zone.data));
    }

    const includeMetadata = options.includeMetadata ?? [];
    let metadata: Map<string, ReadonlyMap<string, string>> | undefined;
    if (includeMetadata.length > 0) {
      if (!this.extractCore) {
        throw new MissingMetadataError("includeMetadata requires core extraction to be enabled");
      }
      metadata = new Map(
        [...zone.extracted].map(([key, extracted]): [string, ReadonlyMap<string, string>] => [
          key,
          extracted.metadata,
        ])
      );
    }

    return runWithTelemetryContext({ stage: "combine", source: label }, () =>
      combineTables(zone.data, {
        addSource: options.addSource,
        ignoreIndex: options.ignoreIndex,
        metadata,
        includeMetadata,
      })
    );
  }

  toString(): string {
    const loaded = this.labels.filter((label) => (this.zones.get(label)?.data.size ?? 0) > 0);
    const mode = this.retainData ? "retain" : "replace";
    return `ImportSession(labels=[${this.labels.join(", ")}], loaded=[${loaded.join(", ")}], mode=${mode})`;
  }

  private zone(label: string): Zone {
    const zone = this.zones.get(label);
    if (!zone) {
      throw new UnknownLabelError(label);
    }
    return zone;
  }
}
