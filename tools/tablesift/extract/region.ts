import { gridWidth } from "../lib/table.js";
import type { DenseRegion, Grid } from "../pipeline/types.js";
import { colDensity, columnSlice, rowDensity } from "./density.js";

export const DEFAULT_ROW_THRESHOLD = 0.4;
export const DEFAULT_COLUMN_THRESHOLD = 0.3;
export const DEFAULT_GAP_TOLERANCE = 2;

/**
 * Finds the band of rows that holds the table body: it opens at the first row
 * whose density meets `threshold` and closes at the last dense row seen before
 * more than `gapTolerance` sparse rows in a row. Returns null when no row is
 * dense enough.
 */
export function findDenseRegion(
  grid: Grid,
  threshold = DEFAULT_ROW_THRESHOLD,
  gapTolerance = DEFAULT_GAP_TOLERANCE
): DenseRegion | null {
  const densities = grid.map((row) => rowDensity(row));
  const start = densities.findIndex((density) => density >= threshold);
  if (start < 0) {
    return null;
  }

  let end = start;
  let gap = 0;
  for (let i = start; i < densities.length; i++) {
    if (densities[i] >= threshold) {
      end = i;
      gap = 0;
      continue;
    }
    gap += 1;
    if (gap > gapTolerance) {
      break;
    }
  }

  return { start, end };
}

export function findDenseColumns(
  grid: Grid,
  rowStart: number,
  rowEnd: number,
  threshold = DEFAULT_COLUMN_THRESHOLD
): number[] {
  if (grid.length === 0 || rowStart > rowEnd) {
    return [];
  }

  const dense: number[] = [];
  const width = gridWidth(grid);
  for (let col = 0; col < width; col++) {
    if (colDensity(columnSlice(grid, col, rowStart, rowEnd)) >= threshold) {
      dense.push(col);
    }
  }
  return dense;
}
