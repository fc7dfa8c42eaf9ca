import { parseArgs } from "util";
import { z } from "zod";
import { ConfigError } from "../pipeline/errors.js";
import { formatIssues, presetNameSchema } from "../pipeline/config.js";

const cliOptionsSchema = z.object({
  files: z.array(z.string().min(1)),
  extract: z.boolean(),
  preset: presetNameSchema.optional(),
  addSource: z.boolean(),
  ignoreIndex: z.boolean(),
  includeMetadata: z.array(z.string().min(1)),
  densityThreshold: z.number().min(0).max(1).optional(),
  out: z.string().optional(),
  logFormat: z.enum(["pretty", "json"]),
  verbose: z.boolean(),
  eventFile: z.string().optional(),
  eventsLog: z.string().optional(),
  version: z.boolean(),
  runId: z.string().min(1),
});

export type CliOptions = z.infer<typeof cliOptionsSchema>;

function parseOptionalNumber(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ConfigError(`--${flag} must be a number, got '${value}'`);
  }
  return parsed;
}

function splitList(value: string | undefined): string[] {
  return (value ?? "")
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
}

export function parseCliOptions(argv: string[], now: Date = new Date()): CliOptions {
  const parsed = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      extract: { type: "boolean" },
      preset: { type: "string" },
      "add-source": { type: "boolean" },
      "no-index-reset": { type: "boolean" },
      "include-metadata": { type: "string" },
      "density-threshold": { type: "string" },
      out: { type: "string" },
      "log-format": { type: "string" },
      verbose: { type: "boolean" },
      "event-file": { type: "string" },
      "events-log": { type: "string" },
      "run-id": { type: "string" },
      version: { type: "boolean", short: "v" },
    },
  });
  const values = parsed.values;

  const result = cliOptionsSchema.safeParse({
    files: parsed.positionals,
    extract: values.extract ?? false,
    preset: values.preset,
    addSource: values["add-source"] ?? false,
    ignoreIndex: !(values["no-index-reset"] ?? false),
    includeMetadata: splitList(values["include-metadata"]),
    densityThreshold: parseOptionalNumber(values["density-threshold"], "density-threshold"),
    out: values.out,
    logFormat: values["log-format"] ?? "pretty",
    verbose: values.verbose ?? false,
    eventFile: values["event-file"],
    eventsLog: values["events-log"],
    version: values.version ?? false,
    runId: values["run-id"] ?? `sift-${now.toISOString().replace(/[:.]/g, "-")}`,
  });

  if (!result.success) {
    throw new ConfigError(`Invalid arguments: ${formatIssues(result.error)}`, result.error);
  }
  if (result.data.includeMetadata.length > 0 && !result.data.extract) {
    throw new ConfigError("--include-metadata requires --extract");
  }
  return result.data;
}
