import type { CellValue, Grid, Table } from "../pipeline/types.js";
import { cellText, isEmptyCell } from "./cells.js";

export const PLACEHOLDER_PREFIX = "col_";

export function emptyTable(): Table {
  return { columns: [], rows: [], index: [] };
}

export function rangeIndex(length: number, offset = 0): number[] {
  return Array.from({ length }, (_, i) => i + offset);
}

export function createTable(columns: string[], rows: CellValue[][]): Table {
  return {
    columns: [...columns],
    rows: rows.map((row) => columns.map((_, i) => row[i] ?? null)),
    index: rangeIndex(rows.length),
  };
}

export function copyTable(table: Table): Table {
  return {
    columns: [...table.columns],
    rows: table.rows.map((row) => [...row]),
    index: [...table.index],
  };
}

export function gridWidth(grid: Grid): number {
  return grid.reduce((max, row) => Math.max(max, row.length), 0);
}

// Widens every row to the widest one with nulls.
export function padGrid(grid: Grid): Grid {
  const width = gridWidth(grid);
  return grid.map((row) => rangeIndex(width).map((i) => row[i] ?? null));
}

export function placeholderName(position: number): string {
  return `${PLACEHOLDER_PREFIX}${position}`;
}

export function columnValues(table: Table, column: number): CellValue[] {
  return table.rows.map((row) => row[column] ?? null);
}

export function withColumnValues(table: Table, column: number, values: CellValue[]): Table {
  return {
    columns: [...table.columns],
    rows: table.rows.map((row, r) => row.map((cell, c) => (c === column ? values[r] : cell))),
    index: [...table.index],
  };
}

/** Suffixes repeated names with a running counter: `a`, `a_1`, `a_2`. */
export function dedupeNames(names: readonly string[]): string[] {
  const counts = new Map<string, number>();
  const taken = new Set<string>();
  return names.map((base) => {
    let name = base;
    let count = counts.get(base) ?? 0;
    while (taken.has(name)) {
      count += 1;
      name = `${base}_${count}`;
    }
    counts.set(base, count);
    taken.add(name);
    return name;
  });
}

export function buildColumnNames(headerCells: CellValue[]): { names: string[]; placeholders: number } {
  let placeholders = 0;
  const bases = headerCells.map((cell, position) => {
    if (isEmptyCell(cell)) {
      placeholders += 1;
      return placeholderName(position);
    }
    return cellText(cell);
  });
  return { names: dedupeNames(bases), placeholders };
}

// The first grid row names the columns; the rest is data.
export function tableFromGrid(grid: Grid): Table {
  if (grid.length === 0) {
    return emptyTable();
  }
  const width = gridWidth(grid);
  const header = rangeIndex(width).map((i) => grid[0][i] ?? null);
  const { names } = buildColumnNames(header);
  return createTable(names, grid.slice(1));
}

export function positionalTable(grid: Grid): Table {
  const width = gridWidth(grid);
  return createTable(rangeIndex(width).map(placeholderName), grid);
}

export function tableToRecords(table: Table): Array<Record<string, CellValue>> {
  return table.rows.map((row) => {
    const record: Record<string, CellValue> = {};
    table.columns.forEach((column, i) => {
      record[column] = row[i] ?? null;
    });
    return record;
  });
}
