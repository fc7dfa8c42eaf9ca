import { cellText, isEmptyCell, looksNumeric, parseInteger } from "../lib/cells.js";
import { DEFAULT_EXTRACTION_OPTIONS, type ExtractionOptions } from "../pipeline/config.js";
import type { CellValue, Grid } from "../pipeline/types.js";

const ID_PATTERN = /^[A-Z]{2,}-\d+$/;

type HeaderScoringOptions = Pick<
  ExtractionOptions,
  "dataRowRatio" | "nextRowDataRatio" | "headerWeights"
>;
type RowNumberOptions = Pick<
  ExtractionOptions,
  "rowNumberMinValues" | "rowNumberSequenceRatio"
>;

export function isHeaderLikeCell(value: CellValue | undefined): boolean {
  if (isEmptyCell(value)) {
    return false;
  }
  const text = cellText(value);
  if (looksNumeric(text)) {
    return false;
  }
  return text.length > 1;
}

export function isDataLikeCell(value: CellValue | undefined): boolean {
  if (isEmptyCell(value)) {
    return false;
  }
  const text = cellText(value);
  return ID_PATTERN.test(text) || looksNumeric(text);
}

/**
 * True when the non-empty cells of `column` between `start` and `end`
 * (inclusive) count up by one from the first value for most positions.
 * A single cell that does not read as a number rules the column out.
 */
export function looksLikeRowNumberColumn(
  column: readonly CellValue[],
  start: number,
  end: number,
  options: RowNumberOptions = DEFAULT_EXTRACTION_OPTIONS
): boolean {
  const values: number[] = [];
  for (let i = Math.max(0, start); i <= Math.min(end, column.length - 1); i++) {
    const cell = column[i];
    if (isEmptyCell(cell)) {
      continue;
    }
    const parsed = parseInteger(cell);
    if (parsed === null) {
      return false;
    }
    values.push(parsed);
  }

  if (values.length < options.rowNumberMinValues) {
    return false;
  }

  const first = values[0];
  const sequential = values.filter((value, position) => value === first + position).length;
  return sequential / values.length >= options.rowNumberSequenceRatio;
}

export function scoreHeaderRow(
  grid: Grid,
  rowIndex: number,
  options: HeaderScoringOptions = DEFAULT_EXTRACTION_OPTIONS
): number | null {
  const row = grid[rowIndex];
  if (!row) {
    return null;
  }
  const filled = row.filter((value) => !isEmptyCell(value));
  if (filled.length < 2) {
    return null;
  }

  const dataRatio = filled.filter((value) => isDataLikeCell(value)).length / filled.length;
  if (dataRatio > options.dataRowRatio) {
    return null;
  }

  const weights = options.headerWeights;
  const headerRatio = filled.filter((value) => isHeaderLikeCell(value)).length / filled.length;
  const distinct = new Set(filled.map((value) => cellText(value).toLowerCase()));
  const uniqueRatio = distinct.size / filled.length;

  let dataFollows = 0;
  const next = grid[rowIndex + 1];
  if (next) {
    const nextFilled = next.filter((value) => !isEmptyCell(value));
    if (nextFilled.length > 0) {
      const nextDataRatio =
        nextFilled.filter((value) => isDataLikeCell(value)).length / nextFilled.length;
      if (nextDataRatio > options.nextRowDataRatio) {
        dataFollows = weights.dataFollows;
      }
    }
  }

  const density = filled.length / row.length;

  return (
    headerRatio * weights.headerLike +
    uniqueRatio * weights.unique +
    dataFollows +
    density * weights.density
  );
}

export function detectHeaderRow(
  grid: Grid,
  searchStart: number,
  searchEnd: number,
  options: HeaderScoringOptions = DEFAULT_EXTRACTION_OPTIONS
): number | null {
  let bestRow: number | null = null;
  let bestScore = -1;

  for (let rowIndex = Math.max(0, searchStart); rowIndex <= Math.min(searchEnd, grid.length - 1); rowIndex++) {
    const score = scoreHeaderRow(grid, rowIndex, options);
    if (score === null) {
      continue;
    }
    // strict comparison: the earliest row wins a tie
    if (score > bestScore) {
      bestScore = score;
      bestRow = rowIndex;
    }
  }

  return bestRow;
}
