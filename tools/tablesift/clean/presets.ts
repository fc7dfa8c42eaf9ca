import { copyTable } from "../lib/table.js";
import { CleanerError, UnknownPresetError } from "../pipeline/errors.js";
import { emitPipelineEvent } from "../pipeline/events.js";
import { PRESET_NAMES, type Cleaner, type CleaningConfig, type PresetName, type Table } from "../pipeline/types.js";
import {
  deduplicate,
  dropEmptyCols,
  dropEmptyRows,
  inferTypes,
  normalizeColumns,
  standardizeNa,
  stripWhitespace,
} from "./cleaners.js";

export const DEFAULT_PRESET: PresetName = "standard";

export const CLEANING_PRESETS: Readonly<Record<PresetName, readonly Cleaner[]>> = Object.freeze({
  none: Object.freeze([]),
  minimal: Object.freeze([normalizeColumns, stripWhitespace]),
  standard: Object.freeze([normalizeColumns, stripWhitespace, dropEmptyRows, standardizeNa]),
  aggressive: Object.freeze([
    normalizeColumns,
    stripWhitespace,
    dropEmptyRows,
    dropEmptyCols,
    standardizeNa,
    deduplicate,
    inferTypes,
  ]),
});

export function isPresetName(name: string): name is PresetName {
  return PRESET_NAMES.some((preset) => preset === name);
}

export function getPreset(name: string): readonly Cleaner[] {
  if (!isPresetName(name)) {
    throw new UnknownPresetError(name);
  }
  return CLEANING_PRESETS[name];
}

/**
 * Runs `cleaners` in order, each on the previous output. A throwing cleaner
 * aborts the run with a CleanerError naming it.
 */
export function applyCleaners(table: Table, cleaners: readonly Cleaner[], filename?: string): Table {
  let result = copyTable(table);
  for (const cleaner of cleaners) {
    try {
      result = cleaner(result, filename);
    } catch (error) {
      throw new CleanerError(cleaner.name || "anonymous", error);
    }
  }
  return result;
}

// An explicit list beats a single cleaner, which beats a preset name.
export function resolveCleaners(config: CleaningConfig = {}): readonly Cleaner[] {
  if (config.cleaners) {
    return config.cleaners;
  }
  if (config.cleaner) {
    return [config.cleaner];
  }
  return getPreset(config.preset ?? DEFAULT_PRESET);
}

export function cleanTable(table: Table, config: CleaningConfig = {}, filename?: string): Table {
  const cleaners = resolveCleaners(config);
  const startedAt = Date.now();
  const result = applyCleaners(table, cleaners, filename);
  emitPipelineEvent({
    level: "debug",
    eventType: "clean.lifecycle",
    stage: "clean",
    message: "Cleaning applied",
    phase: "end",
    cleaners: cleaners.map((cleaner) => cleaner.name),
    rows: result.rows.length,
    columns: result.columns.length,
    durationMs: Date.now() - startedAt,
    filename,
  });
  return result;
}
