import type { CellValue, Grid } from "../pipeline/types.js";
import { parseNumber } from "./cells.js";
import { padGrid } from "./table.js";

export interface CsvGridOptions {
  delimiter?: string;
  /** Turn numeric literals into numbers (default true). */
  inferNumbers?: boolean;
}

/**
 * Reads CSV text into a rectangular grid with no header interpretation:
 * blank cells become null and short rows are padded to the widest row.
 */
export function parseCsvGrid(content: string, options: CsvGridOptions = {}): Grid {
  const inferNumbers = options.inferNumbers ?? true;
  const rows = parseCsvRows(content.replace(/\uFEFF/g, ""), options.delimiter ?? ",");
  return padGrid(rows.map((row) => row.map((raw) => toCell(raw, inferNumbers))));
}

function toCell(raw: string, inferNumbers: boolean): CellValue {
  if (raw.trim() === "") {
    return null;
  }
  if (inferNumbers) {
    const parsed = parseNumber(raw);
    if (parsed !== null) {
      return parsed;
    }
  }
  return raw;
}

export function parseCsvRows(content: string, delimiter = ","): string[][] {
  const rows: string[][] = [];
  let currentRow: string[] = [];
  let currentCell = "";
  let inQuotes = false;

  for (let i = 0; i < content.length; i++) {
    const char = content[i];
    const next = content[i + 1];

    if (char === '"') {
      if (inQuotes && next === '"') {
        currentCell += '"';
        i++;
      } else {
        inQuotes = !inQuotes;
      }
      continue;
    }

    if (!inQuotes && char === delimiter) {
      currentRow.push(currentCell);
      currentCell = "";
      continue;
    }

    if (!inQuotes && (char === "\n" || char === "\r")) {
      if (char === "\r" && next === "\n") {
        i++;
      }
      currentRow.push(currentCell);
      rows.push(currentRow);
      currentRow = [];
      currentCell = "";
      continue;
    }

    currentCell += char;
  }

  if (currentCell.length > 0 || currentRow.length > 0) {
    currentRow.push(currentCell);
    rows.push(currentRow);
  }

  return rows;
}
