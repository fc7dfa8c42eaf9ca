export type {
  CellValue,
  Cleaner,
  CleaningConfig,
  CombineOptions,
  DenseRegion,
  ExtractedData,
  Grid,
  PresetName,
  Table,
} from "./pipeline/types.js";
export { PRESET_NAMES } from "./pipeline/types.js";
export { colDensity, rowDensity } from "./extract/density.js";
export { findDenseColumns, findDenseRegion } from "./extract/region.js";
export { detectHeaderRow, isDataLikeCell, isHeaderLikeCell, looksLikeRowNumberColumn } from "./extract/header.js";
export { extractFooter, extractMetadata } from "./extract/context.js";
export { extractCoreData, scoreConfidence } from "./extract/core.js";
export {
  deduplicate,
  dropEmptyCols,
  dropEmptyRows,
  inferTypes,
  makeNormalizeColumns,
  makeStripWhitespace,
  normalizeColumns,
  standardizeNa,
  stripWhitespace,
} from "./clean/cleaners.js";
export { CLEANING_PRESETS, applyCleaners, cleanTable, getPreset } from "./clean/presets.js";
export { combineTables } from "./combine/combine.js";
export { ImportSession } from "./pipeline/session.js";
export type { IngestFailure, IngestResult, SessionCombineOptions, SessionOptions } from "./pipeline/session.js";
export {
  extractionOptionsSchema,
  resolveExtractionOptions,
  type ExtractionOptions,
  type ExtractionOptionsInput,
  type HeaderWeights,
} from "./pipeline/config.js";
export {
  CleanerError,
  ConfigError,
  GridFormatError,
  MissingMetadataError,
  PipelineError,
  SessionStateError,
  UnknownLabelError,
  UnknownPresetError,
} from "./pipeline/errors.js";
export { initializeEventEmitter } from "./pipeline/events.js";
export { createTable, tableFromGrid } from "./lib/table.js";
export { parseCsvGrid } from "./lib/csv.js";
