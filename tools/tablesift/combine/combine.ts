import { copyTable, emptyTable, rangeIndex } from "../lib/table.js";
import { MissingMetadataError } from "../pipeline/errors.js";
import { emitPipelineEvent } from "../pipeline/events.js";
import type { CellValue, CombineOptions, Table } from "../pipeline/types.js";

export const SOURCE_COLUMN = "_source";

export function metadataColumnName(key: string): string {
  return `_${key}`;
}

function setColumn(table: Table, name: string, value: CellValue): Table {
  const existing = table.columns.indexOf(name);
  if (existing >= 0) {
    return {
      ...table,
      rows: table.rows.map((row) => row.map((cell, i) => (i === existing ? value : cell))),
    };
  }
  return {
    columns: [...table.columns, name],
    rows: table.rows.map((row) => [...row, value]),
    index: table.index,
  };
}

/**
 * Stacks named tables into one. Columns are the union of all inputs in order
 * of first appearance; a table without some column contributes nulls there.
 */
export function combineTables(tables: ReadonlyMap<string, Table>, options: CombineOptions = {}): Table {
  const { addSource = false, ignoreIndex = true, metadata, includeMetadata } = options;
  const metadataKeys = includeMetadata ?? [];

  if (metadataKeys.length > 0 && !metadata) {
    throw new MissingMetadataError(
      `Metadata columns requested (${metadataKeys.join(", ")}) but no metadata was provided`
    );
  }

  if (tables.size === 0) {
    return emptyTable();
  }

  const frames: Table[] = [];
  for (const [name, table] of tables) {
    let frame = copyTable(table);
    if (addSource) {
      frame = setColumn(frame, SOURCE_COLUMN, name);
    }
    const entry = metadata?.get(name);
    for (const key of metadataKeys) {
      frame = setColumn(frame, metadataColumnName(key), entry?.get(key) ?? null);
    }
    frames.push(frame);
  }

  const columns: string[] = [];
  for (const frame of frames) {
    for (const column of frame.columns) {
      if (!columns.includes(column)) {
        columns.push(column);
      }
    }
  }

  const rows: CellValue[][] = [];
  const index: number[] = [];
  for (const frame of frames) {
    const positions = columns.map((column) => frame.columns.indexOf(column));
    frame.rows.forEach((row, r) => {
      rows.push(positions.map((position) => (position >= 0 ? row[position] ?? null : null)));
      index.push(frame.index[r] ?? r);
    });
  }

  emitPipelineEvent({
    level: "info",
    eventType: "combine.lifecycle",
    stage: "combine",
    message: "Tables combined",
    phase: "end",
    tables: [...tables.keys()],
    rows: rows.length,
    columns: columns.length,
  });

  return { columns, rows, index: ignoreIndex ? rangeIndex(rows.length) : index };
}
