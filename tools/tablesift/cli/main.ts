import { writeJsonAtomic } from "../lib/json.js";
import { errorMessage } from "../pipeline/errors.js";
import { initializeEventEmitter } from "../pipeline/events.js";
import { parseCliOptions, type CliOptions } from "./options.js";
import { VERSION, runSift } from "./run.js";

export const USAGE = `Usage: tablesift <files...> [options]

  --extract                 recover the core table, metadata and footer
  --preset <name>           cleaning preset: none | minimal | standard | aggressive
  --add-source              add a _source column naming each input table
  --include-metadata <a,b>  add _<key> columns from extracted metadata
  --density-threshold <n>   row density needed to join the table body (0-1)
  --no-index-reset          keep per-table row indices in the combined table
  --out <path>              write the JSON report to a file instead of stdout
  --log-format <fmt>        pretty | json
  --event-file <path>       append NDJSON events to a file
  --events-log <path>       append pretty event lines to a file
  --verbose                 print every event
  -v, --version             print the version`;

/** Runs the CLI and returns its exit code: 0 ok, 1 nothing loaded, 2 bad arguments. */
export function main(argv: string[], now: Date = new Date()): number {
  let options: CliOptions;
  try {
    options = parseCliOptions(argv, now);
  } catch (error) {
    console.error(errorMessage(error));
    console.error(`\n${USAGE}`);
    return 2;
  }

  if (options.version) {
    console.log(`tablesift ${VERSION}`);
    return 0;
  }
  if (options.files.length === 0) {
    console.log(USAGE);
    return 0;
  }

  // With the report on stdout, progress lines must not land there too.
  initializeEventEmitter({
    runId: options.runId,
    format: options.logFormat,
    verbose: options.verbose,
    terminal: true,
    terminalStream: options.out ? "stdout" : "stderr",
    eventsLogPath: options.eventsLog,
    eventFilePath: options.eventFile,
  });

  const report = runSift(options, now);

  if (options.out) {
    writeJsonAtomic(options.out, report);
    console.error(`OK   ${options.out} (${report.tables.length} tables)`);
  } else {
    console.log(JSON.stringify(report, null, 2));
  }

  if (report.combined === null) {
    console.error("\nNo tables could be loaded.");
    return 1;
  }
  return 0;
}
