import { formatDate } from "../lib/cells.js";
import { tableToRecords } from "../lib/table.js";
import type { IngestFailure, ImportSession } from "./session.js";
import type { CellValue, ExtractedData, Table } from "./types.js";

type JsonCell = string | number | boolean | null;

export interface ExtractionSummary {
  headerRow: number | null;
  dataRange: [number, number];
  metadata: Record<string, string>;
  footer: string[];
  confidence: number;
  warnings: string[];
}

export interface TableSummary {
  key: string;
  rows: number;
  columns: string[];
  extraction?: ExtractionSummary;
}

export interface SiftReport {
  version: string;
  runId: string;
  generatedAt: string;
  tables: TableSummary[];
  failures: IngestFailure[];
  combined: {
    columns: string[];
    rows: Array<Record<string, JsonCell>>;
  } | null;
}

function toJsonCell(value: CellValue): JsonCell {
  if (value instanceof Date) {
    return formatDate(value);
  }
  if (typeof value === "number" && !Number.isFinite(value)) {
    return null;
  }
  return value;
}

export function summarizeExtraction(extracted: ExtractedData): ExtractionSummary {
  return {
    headerRow: extracted.headerRow,
    dataRange: [extracted.dataRange[0], extracted.dataRange[1]],
    metadata: Object.fromEntries(extracted.metadata),
    footer: [...extracted.footer],
    confidence: Number(extracted.confidence.toFixed(3)),
    warnings: [...extracted.warnings],
  };
}

export function serializeTable(table: Table): { columns: string[]; rows: Array<Record<string, JsonCell>> } {
  return {
    columns: [...table.columns],
    rows: tableToRecords(table).map((record) =>
      Object.fromEntries(Object.entries(record).map(([key, value]) => [key, toJsonCell(value)]))
    ),
  };
}

export function buildSiftReport(
  session: ImportSession,
  label: string,
  combined: Table | null,
  meta: { version: string; runId: string; generatedAt: Date; loadFailures?: IngestFailure[] }
): SiftReport {
  const extracted = session.hasExtracted(label) ? session.getAllExtracted(label) : null;
  const tables = [...session.getAll(label)].map(([key, table]): TableSummary => {
    const extraction = extracted?.get(key);
    return {
      key,
      rows: table.rows.length,
      columns: [...table.columns],
      ...(extraction ? { extraction: summarizeExtraction(extraction) } : {}),
    };
  });

  return {
    version: meta.version,
    runId: meta.runId,
    generatedAt: meta.generatedAt.toISOString(),
    tables,
    failures: [...(meta.loadFailures ?? []), ...session.failures(label)],
    combined: combined ? serializeTable(combined) : null,
  };
}
