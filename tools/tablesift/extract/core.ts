import {
  buildColumnNames,
  createTable,
  emptyTable,
  gridWidth,
  positionalTable,
  rangeIndex,
} from "../lib/table.js";
import {
  resolveExtractionOptions,
  type ExtractionOptions,
  type ExtractionOptionsInput,
} from "../pipeline/config.js";
import { emitPipelineEvent } from "../pipeline/events.js";
import type { ExtractedData, Grid, Table } from "../pipeline/types.js";
import { extractFooter, extractMetadata } from "./context.js";
import { averageRowDensity, columnSlice } from "./density.js";
import { detectHeaderRow, looksLikeRowNumberColumn } from "./header.js";
import { findDenseColumns, findDenseRegion } from "./region.js";

export const EMPTY_GRID_WARNING = "Empty grid provided";
export const NO_REGION_WARNING = "No dense region found; returning entire grid";
export const NO_HEADER_WARNING = "Could not detect header row; using first dense row";
export const NO_COLUMNS_WARNING = "No dense columns found; using all columns";

const NO_REGION_CONFIDENCE = 0.3;

export interface ConfidenceInput {
  gridRows: number;
  core: Table;
  placeholderColumns: number;
  warningCount: number;
}

export function scoreConfidence(input: ConfidenceInput): number {
  let score = 1.0 - input.warningCount * 0.1;

  if (input.core.rows.length > 0) {
    score *= 0.5 + 0.5 * averageRowDensity(input.core.rows);
  }

  if (input.gridRows > 0) {
    const extractionRatio = input.core.rows.length / input.gridRows;
    if (extractionRatio < 0.1) {
      score -= 0.2;
    } else if (extractionRatio > 0.8) {
      score += 0.1;
    }
  }

  const columnCount = input.core.columns.length;
  if (columnCount > 0 && input.placeholderColumns / columnCount > 0.5) {
    score -= 0.15;
  }

  return Math.max(0, Math.min(1, score));
}

/**
 * Recovers the rectangular data table buried in a messy grid, along with the
 * metadata above its header, the footer lines below it and a confidence score.
 * Problems are reported as warnings on the result, never thrown.
 */
export function extractCoreData(grid: Grid, input: ExtractionOptionsInput = {}): ExtractedData {
  const options = resolveExtractionOptions(input);
  const startedAt = Date.now();
  emitPipelineEvent({
    level: "debug",
    eventType: "extract.lifecycle",
    stage: "extract",
    message: "Core extraction started",
    phase: "start",
    gridRows: grid.length,
    gridColumns: gridWidth(grid),
  });

  const result = runExtraction(grid, options);

  for (const warning of result.warnings) {
    emitPipelineEvent({
      level: "warn",
      eventType: "extract.warning",
      stage: "extract",
      message: warning,
    });
  }
  emitPipelineEvent({
    level: "info",
    eventType: "extract.lifecycle",
    stage: "extract",
    message: "Core extraction finished",
    phase: "end",
    rows: result.core.rows.length,
    columns: result.core.columns.length,
    headerRow: result.headerRow,
    metadataKeys: [...result.metadata.keys()],
    confidence: Number(result.confidence.toFixed(3)),
    durationMs: Date.now() - startedAt,
  });

  return result;
}

function runExtraction(grid: Grid, options: ExtractionOptions): ExtractedData {
  const warnings: string[] = [];

  if (grid.length === 0) {
    return freeze({
      core: emptyTable(),
      metadata: new Map<string, string>(),
      headerRow: null,
      dataRange: [0, 0],
      footer: [],
      confidence: 0,
      warnings: [EMPTY_GRID_WARNING],
    });
  }

  const region = findDenseRegion(grid, options.densityThreshold, options.gapTolerance);
  if (!region) {
    warnings.push(NO_REGION_WARNING);
    return freeze({
      core: positionalTable(grid),
      metadata: new Map<string, string>(),
      headerRow: null,
      dataRange: [0, grid.length - 1],
      footer: [],
      confidence: NO_REGION_CONFIDENCE,
      warnings,
    });
  }

  let headerRow = detectHeaderRow(
    grid,
    region.start,
    Math.min(region.start + options.headerSearchDepth, region.end),
    options
  );
  if (headerRow === null) {
    headerRow = region.start;
    warnings.push(NO_HEADER_WARNING);
  }

  const dataStart = headerRow < region.end ? headerRow + 1 : headerRow;
  const width = gridWidth(grid);
  let columns = findDenseColumns(grid, dataStart, region.end, options.columnThreshold);
  if (columns.length === 0) {
    columns = rangeIndex(width);
    warnings.push(NO_COLUMNS_WARNING);
  }

  if (looksLikeRowNumberColumn(columnSlice(grid, columns[0]), dataStart, region.end, options)) {
    emitPipelineEvent({
      level: "debug",
      eventType: "extract.lifecycle",
      stage: "extract",
      message: "Dropping row-number column",
      phase: "progress",
      column: columns[0],
    });
    columns = columns.slice(1);
    if (columns.length === 0) {
      columns = rangeIndex(width - 1, 1);
    }
  }

  const metadata = extractMetadata(grid, headerRow, options);
  const footer = region.end + 1 < grid.length ? extractFooter(grid, region.end + 1, options) : [];

  const header = grid[headerRow];
  const { names, placeholders } = buildColumnNames(columns.map((column) => header[column] ?? null));
  const bodyStart = headerRow + 1;
  const rows = grid
    .slice(bodyStart, region.end + 1)
    .map((row) => columns.map((column) => row[column] ?? null));
  const core = createTable(names, rows);

  return freeze({
    core,
    metadata,
    headerRow,
    dataRange: [bodyStart, region.end],
    footer,
    confidence: scoreConfidence({
      gridRows: grid.length,
      core,
      placeholderColumns: placeholders,
      warningCount: warnings.length,
    }),
    warnings,
  });
}

function freeze(data: ExtractedData): ExtractedData {
  data.core.rows.forEach((row) => Object.freeze(row));
  Object.freeze(data.core.rows);
  Object.freeze(data.core.columns);
  Object.freeze(data.core.index);
  Object.freeze(data.core);
  Object.freeze(data.dataRange);
  Object.freeze(data.footer);
  Object.freeze(data.warnings);
  return Object.freeze(data);
}
