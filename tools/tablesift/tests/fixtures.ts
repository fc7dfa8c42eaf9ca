import type { CellValue, Grid } from "../pipeline/types.js";

const blank = (count: number): CellValue[] => Array.from({ length: count }, () => null);

/**
 * A lab export: row counter in the first column, five metadata rows, a header,
 * seven samples split by an empty row, then two footer lines.
 */
export function soilReportGrid(): Grid {
  return [
    [1, "Report Date: 2024-01-15", ...blank(4)],
    [2, "Generated By: Lab System v2.1", ...blank(4)],
    [3, "Project = Soil Survey", ...blank(4)],
    [null, "Site", "North Field", ...blank(3)],
    [5, ...blank(5)],
    [6, "Sample ID", "Depth", "pH", "Moisture", "Notes"],
    [7, "SAMP-001", 10, 6.5, 21.3, "ok"],
    [8, "SAMP-002", 20, 6.7, 19.8, "ok"],
    [9, "SAMP-003", 30, 6.9, 18.2, null],
    [10, "SAMP-004", 40, 7.1, 17.5, "retest"],
    [11, ...blank(5)],
    [12, "SAMP-005", 50, 7.0, 16.9, "ok"],
    [13, "SAMP-006", 60, 6.8, 16.1, null],
    [14, "SAMP-007", 70, 6.6, 15.4, "ok"],
    [15, ...blank(5)],
    [16, "Total samples: 7", ...blank(4)],
    [17, "Approved by QA", ...blank(4)],
  ];
}

export function cleanGrid(): Grid {
  return [
    ["Name", "Age", "City"],
    ["Alice", 30, "NYC"],
    ["Bob", 25, "LA"],
    ["Cara", 41, "SF"],
  ];
}
