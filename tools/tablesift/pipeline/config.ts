import { z } from "zod";
import { ConfigError } from "./errors.js";
import { PRESET_NAMES } from "./types.js";

const ratio = z.number().min(0).max(1);

export const headerWeightsSchema = z.object({
  headerLike: z.number().min(0).default(0.4),
  unique: z.number().min(0).default(0.2),
  dataFollows: z.number().min(0).default(0.4),
  density: z.number().min(0).default(0.2),
});

export const extractionOptionsSchema = z
  .object({
    densityThreshold: ratio.default(0.4),
    columnThreshold: ratio.default(0.3),
    gapTolerance: z.number().int().min(0).default(2),
    headerSearchDepth: z.number().int().min(0).default(3),
    rowNumberMaxValue: z.number().int().min(0).default(1000),
    rowNumberMinValues: z.number().int().min(1).default(3),
    rowNumberSequenceRatio: ratio.default(0.7),
    dataRowRatio: ratio.default(0.3),
    nextRowDataRatio: ratio.default(0.2),
    headerWeights: headerWeightsSchema.default({}),
  })
  .strict();

export type ExtractionOptions = z.infer<typeof extractionOptionsSchema>;
export type ExtractionOptionsInput = z.input<typeof extractionOptionsSchema>;
export type HeaderWeights = z.infer<typeof headerWeightsSchema>;

export const DEFAULT_EXTRACTION_OPTIONS: ExtractionOptions = extractionOptionsSchema.parse({});

export function resolveExtractionOptions(input: ExtractionOptionsInput = {}): ExtractionOptions {
  const parsed = extractionOptionsSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(`Invalid extraction options: ${formatIssues(parsed.error)}`, parsed.error);
  }
  return parsed.data;
}

export const presetNameSchema = z.enum(PRESET_NAMES);

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"} ${issue.message}`)
    .join("; ");
}
