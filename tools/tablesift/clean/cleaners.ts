import { cellKey, isEmptyCell, parseDate, parseNumber } from "../lib/cells.js";
import { columnValues, copyTable, dedupeNames, rangeIndex, withColumnValues } from "../lib/table.js";
import type { CellValue, Cleaner, Table } from "../pipeline/types.js";

export interface NormalizeColumnsOptions {
  preserveCase?: boolean;
  preserveDashes?: boolean;
  preserveDots?: boolean;
}

export interface StripWhitespaceOptions {
  normalizeInner?: boolean;
}

export const NA_TOKENS: ReadonlySet<string> = new Set([
  "n/a",
  "na",
  "N/A",
  "NA",
  "-",
  "null",
  "NULL",
  "None",
  "none",
  "",
]);

const MIN_COERCE_RATIO = 0.5;

function named(name: string, cleaner: Cleaner): Cleaner {
  Object.defineProperty(cleaner, "name", { value: name });
  return cleaner;
}

export function normalizeColumnName(column: string, options: NormalizeColumnsOptions = {}): string {
  let name = column.trim();
  if (!options.preserveCase) {
    name = name.toLowerCase();
  }
  const keep = `${options.preserveDashes ? "\\-" : ""}${options.preserveDots ? "." : ""}`;
  name = name.replace(new RegExp(`[^A-Za-z0-9_${keep}]+`, "g"), "_").replace(/^_+|_+$/g, "");
  return name.length > 0 ? name : "unnamed";
}

export function makeNormalizeColumns(options: NormalizeColumnsOptions = {}): Cleaner {
  const flags = Object.entries(options)
    .filter(([, enabled]) => enabled === true)
    .map(([flag]) => flag);
  return named(`normalizeColumns(${flags.join(", ")})`, (table) => ({
    ...copyTable(table),
    columns: dedupeNames(table.columns.map((column) => normalizeColumnName(column, options))),
  }));
}

export const normalizeColumns: Cleaner = makeNormalizeColumns();

export function makeStripWhitespace(options: StripWhitespaceOptions = {}): Cleaner {
  const strip = (value: string): string =>
    options.normalizeInner ? value.trim().replace(/\s+/g, " ") : value.trim();
  return named(`stripWhitespace(normalizeInner=${options.normalizeInner === true})`, (table) => ({
    ...copyTable(table),
    rows: table.rows.map((row) => row.map((cell) => (typeof cell === "string" ? strip(cell) : cell))),
  }));
}

export const stripWhitespace: Cleaner = makeStripWhitespace();

export const dropEmptyRows: Cleaner = named("dropEmptyRows", (table) => {
  const rows = table.rows
    .filter((row) => row.some((cell) => !isEmptyCell(cell)))
    .map((row) => [...row]);
  return { columns: [...table.columns], rows, index: rangeIndex(rows.length) };
});

export const dropEmptyCols: Cleaner = named("dropEmptyCols", (table) => {
  const keep = table.columns
    .map((_, column) => column)
    .filter((column) => table.rows.some((row) => !isEmptyCell(row[column] ?? null)));
  return {
    columns: keep.map((column) => table.columns[column]),
    rows: table.rows.map((row) => keep.map((column) => row[column] ?? null)),
    index: [...table.index],
  };
});

export const standardizeNa: Cleaner = named("standardizeNa", (table) => ({
  ...copyTable(table),
  rows: table.rows.map((row) =>
    row.map((cell) => (typeof cell === "string" && NA_TOKENS.has(cell.trim()) ? null : cell))
  ),
}));

export const deduplicate: Cleaner = named("deduplicate", (table) => {
  const seen = new Set<string>();
  const rows: CellValue[][] = [];
  for (const row of table.rows) {
    const key = row.map((cell) => cellKey(cell)).join("\u0001");
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    rows.push([...row]);
  }
  return { columns: [...table.columns], rows, index: rangeIndex(rows.length) };
});

function coerceColumn(
  values: CellValue[],
  coerce: (value: CellValue) => CellValue
): CellValue[] | null {
  const filled = values.filter((value) => !isEmptyCell(value));
  if (filled.length === 0) {
    return null;
  }
  const converted = values.map((value) => (isEmptyCell(value) ? null : coerce(value)));
  const succeeded = converted.filter((value) => value !== null).length;
  return succeeded / filled.length >= MIN_COERCE_RATIO ? converted : null;
}

/**
 * Converts string columns to numbers, or failing that to dates, when at least
 * half of the filled cells convert. Cells that do not convert become null.
 */
export const inferTypes: Cleaner = named("inferTypes", (table) => {
  let result = copyTable(table);
  table.columns.forEach((_, column) => {
    const values = columnValues(table, column);
    if (!values.some((value) => typeof value === "string")) {
      return;
    }
    const converted = coerceColumn(values, parseNumber) ?? coerceColumn(values, parseDate);
    if (converted) {
      result = withColumnValues(result, column, converted);
    }
  });
  return result;
});
