import { cellText, isEmptyCell, looksNumeric, parseInteger } from "../lib/cells.js";
import { DEFAULT_EXTRACTION_OPTIONS, type ExtractionOptions } from "../pipeline/config.js";
import type { CellValue, Grid } from "../pipeline/types.js";

type ContextOptions = Pick<ExtractionOptions, "rowNumberMaxValue">;

interface PositionedCell {
  column: number;
  text: string;
}

const COLON_PAIR = /^([^:]+):\s*(.+)$/;
const EQUALS_PAIR = /^([^=]+)=\s*(.+)$/;
const MAX_PAIR_DISTANCE = 2;

function isRowNumberArtifact(value: CellValue, maxValue: number): boolean {
  const parsed = parseInteger(value);
  return parsed !== null && parsed >= 0 && parsed <= maxValue;
}

/** Non-empty cells of a row, minus a leading small integer that is only a row counter. */
export function contentCells(
  row: readonly CellValue[],
  options: ContextOptions = DEFAULT_EXTRACTION_OPTIONS
): PositionedCell[] {
  const cells: PositionedCell[] = [];
  row.forEach((value, column) => {
    if (isEmptyCell(value)) {
      return;
    }
    if (column === 0 && isRowNumberArtifact(value, options.rowNumberMaxValue)) {
      return;
    }
    cells.push({ column, text: cellText(value) });
  });
  return cells;
}

function isValidKey(key: string): boolean {
  return !looksNumeric(key) && key.length > 1;
}

function matchInlinePair(text: string): [string, string] | null {
  const match = text.match(COLON_PAIR) ?? text.match(EQUALS_PAIR);
  if (!match) {
    return null;
  }
  return [match[1].trim(), match[2].trim()];
}

/**
 * Scrapes key/value pairs from the rows above `endRow` (exclusive). A row can
 * hold `Key: Value` or `Key = Value` in one cell, a key and a value in two
 * nearby cells, or several key/value pairs side by side.
 */
export function extractMetadata(
  grid: Grid,
  endRow: number,
  options: ContextOptions = DEFAULT_EXTRACTION_OPTIONS
): Map<string, string> {
  const metadata = new Map<string, string>();

  for (let rowIndex = 0; rowIndex < Math.min(endRow, grid.length); rowIndex++) {
    const cells = contentCells(grid[rowIndex], options);

    if (cells.length === 1) {
      const pair = matchInlinePair(cells[0].text);
      if (pair) {
        metadata.set(pair[0], pair[1]);
      }
      continue;
    }

    if (cells.length === 2) {
      const [key, value] = cells;
      if (Math.abs(value.column - key.column) <= MAX_PAIR_DISTANCE && isValidKey(key.text)) {
        metadata.set(key.text, value.text);
      }
      continue;
    }

    if (cells.length >= 4 && cells.length % 2 === 0) {
      for (let i = 0; i + 1 < cells.length; i += 2) {
        if (isValidKey(cells[i].text)) {
          metadata.set(cells[i].text, cells[i + 1].text);
        }
      }
    }
  }

  return metadata;
}

export function extractFooter(
  grid: Grid,
  startRow: number,
  options: ContextOptions = DEFAULT_EXTRACTION_OPTIONS
): string[] {
  const footer: string[] = [];
  for (let rowIndex = Math.max(0, startRow); rowIndex < grid.length; rowIndex++) {
    const cells = contentCells(grid[rowIndex], options);
    if (cells.length > 0) {
      footer.push(cells.map((cell) => cell.text).join(" "));
    }
  }
  return footer;
}
