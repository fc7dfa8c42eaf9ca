import { isEmptyCell } from "../lib/cells.js";
import type { CellValue, Grid } from "../pipeline/types.js";

export function rowDensity(row: readonly CellValue[]): number {
  if (row.length === 0) {
    return 0;
  }
  const filled = row.filter((value) => !isEmptyCell(value)).length;
  return filled / row.length;
}

export function colDensity(col: readonly CellValue[]): number {
  return rowDensity(col);
}

export function columnSlice(grid: Grid, column: number, start = 0, end = grid.length - 1): CellValue[] {
  const out: CellValue[] = [];
  for (let r = Math.max(0, start); r <= Math.min(end, grid.length - 1); r++) {
    out.push(grid[r][column] ?? null);
  }
  return out;
}

export function averageRowDensity(rows: readonly (readonly CellValue[])[]): number {
  if (rows.length === 0) {
    return 0;
  }
  return rows.reduce((sum, row) => sum + rowDensity(row), 0) / rows.length;
}
