import { Ajv, type ErrorObject, type SchemaObject, type ValidateFunction } from "ajv";
import { basename, extname } from "path";
import { GridFormatError } from "../pipeline/errors.js";
import type { Grid } from "../pipeline/types.js";
import { parseCsvGrid } from "./csv.js";
import { readJsonFile, readTextFile } from "./json.js";
import { GRID_FILE_SCHEMA_PATH } from "./paths.js";
import { padGrid } from "./table.js";

type JsonCell = string | number | boolean | null;
type JsonGrid = JsonCell[][];
type GridFile = JsonGrid | { sheets: Record<string, JsonGrid> };

let gridFileValidator: ValidateFunction<GridFile> | null = null;

function isSchemaObject(value: unknown): value is SchemaObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function getGridFileValidator(): ValidateFunction<GridFile> {
  if (!gridFileValidator) {
    const schema = readJsonFile(GRID_FILE_SCHEMA_PATH);
    if (!isSchemaObject(schema)) {
      throw new GridFormatError(`Schema at ${GRID_FILE_SCHEMA_PATH} is not an object`);
    }
    const ajv = new Ajv({ allErrors: true, strict: true, allowUnionTypes: true });
    gridFileValidator = ajv.compile<GridFile>(schema);
  }
  return gridFileValidator;
}

function formatErrors(errors: ErrorObject[] | null | undefined): string {
  return (errors ?? [])
    .map((err) => `${err.instancePath || "(root)"} ${err.message ?? "is invalid"}`)
    .join("; ");
}

/**
 * Validates parsed JSON as a grid file and returns its grids keyed by sheet
 * name, each padded to its widest row.
 */
export function gridsFromJson(value: unknown, name: string): Map<string, Grid> {
  const validate = getGridFileValidator();
  if (!validate(value)) {
    throw new GridFormatError(`${name}: ${formatErrors(validate.errors)}`);
  }
  if (Array.isArray(value)) {
    return new Map<string, Grid>([[name, padGrid(value)]]);
  }
  return new Map(
    Object.entries(value.sheets).map(([sheet, grid]): [string, Grid] => [`${name}/${sheet}`, padGrid(grid)])
  );
}

export function loadGridFile(path: string): Map<string, Grid> {
  const name = basename(path);
  const extension = extname(path).toLowerCase();
  if (extension === ".csv" || extension === ".tsv") {
    const grid = parseCsvGrid(readTextFile(path), { delimiter: extension === ".tsv" ? "\t" : "," });
    return new Map<string, Grid>([[name, grid]]);
  }
  if (extension === ".json") {
    return gridsFromJson(readJsonFile(path), name);
  }
  throw new GridFormatError(`${name}: unsupported file type '${extension || "(none)"}'`);
}
