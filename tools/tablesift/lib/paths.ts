import { dirname, join, resolve } from "path";
import { fileURLToPath } from "url";

const THIS_DIR = dirname(fileURLToPath(import.meta.url));

export const TOOL_ROOT = resolve(THIS_DIR, "..");
export const SCHEMA_DIR = join(TOOL_ROOT, "schema");
export const GRID_FILE_SCHEMA_PATH = join(SCHEMA_DIR, "grid-file.schema.json");
