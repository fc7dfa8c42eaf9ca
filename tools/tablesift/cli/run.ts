import { loadGridFile } from "../lib/validation.js";
import { errorCode, errorMessage } from "../pipeline/errors.js";
import { Logger } from "../pipeline/logger.js";
import { buildSiftReport, type SiftReport } from "../pipeline/report.js";
import { ImportSession, type IngestFailure } from "../pipeline/session.js";
import type { Table } from "../pipeline/types.js";
import type { CliOptions } from "./options.js";

export const VERSION = "1.0.0";
export const INPUT_LABEL = "input";

export function runSift(options: CliOptions, now: Date = new Date()): SiftReport {
  const logger = new Logger({ stage: "ingest" });
  const session = new ImportSession([INPUT_LABEL], {
    retainData: true,
    extractCore: options.extract,
    extraction:
      options.densityThreshold === undefined ? {} : { densityThreshold: options.densityThreshold },
    cleaning: options.preset ? { preset: options.preset } : undefined,
  });

  const loadFailures: IngestFailure[] = [];
  for (const file of options.files) {
    try {
      const grids = loadGridFile(file);
      session.ingest(INPUT_LABEL, file, grids);
    } catch (error) {
      logger.error("Failed to load input file", {
        path: file,
        phase: "fail",
        errorCode: errorCode(error),
        errorMessage: errorMessage(error),
      });
      loadFailures.push({
        label: INPUT_LABEL,
        filename: file,
        key: file,
        stage: "load",
        errorCode: errorCode(error),
        error: errorMessage(error),
      });
    }
  }

  let combined: Table | null = null;
  if (session.getAll(INPUT_LABEL).size > 0) {
    combined = session.combine(INPUT_LABEL, {
      addSource: options.addSource,
      ignoreIndex: options.ignoreIndex,
      includeMetadata: options.includeMetadata,
    });
  }

  return buildSiftReport(session, INPUT_LABEL, combined, {
    version: VERSION,
    runId: options.runId,
    generatedAt: now,
    loadFailures,
  });
}
