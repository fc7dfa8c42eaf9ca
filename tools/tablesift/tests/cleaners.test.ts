import { describe, expect, test } from "vitest";
import {
  deduplicate,
  dropEmptyCols,
  dropEmptyRows,
  inferTypes,
  makeNormalizeColumns,
  makeStripWhitespace,
  normalizeColumnName,
  normalizeColumns,
  standardizeNa,
  stripWhitespace,
} from "../clean/cleaners.js";
import { createTable } from "../lib/table.js";

describe("column name normalization", () => {
  test("lower-cases and joins words with underscores, suffixing repeats", () => {
    const table = createTable(["Sample ID", "Test Type", "Sample ID"], [["a", "b", "c"]]);
    const cleaned = normalizeColumns(table);

    expect(cleaned.columns).toEqual(["sample_id", "test_type", "sample_id_1"]);
    expect(table.columns).toEqual(["Sample ID", "Test Type", "Sample ID"]);
  });

  test("honours the preserve flags", () => {
    expect(normalizeColumnName("Sample ID", { preserveCase: true })).toBe("Sample_ID");
    expect(normalizeColumnName("Sample-ID (mg)")).toBe("sample_id_mg");
    expect(normalizeColumnName("Sample-ID (mg)", { preserveDashes: true })).toBe("sample-id_mg");
    expect(normalizeColumnName("v1.2 rate")).toBe("v1_2_rate");
    expect(normalizeColumnName("v1.2 rate", { preserveDots: true })).toBe("v1.2_rate");
  });

  test("names a column with nothing usable 'unnamed'", () => {
    expect(normalizeColumnName("  ***  ")).toBe("unnamed");
  });

  test("keeps suffixed names distinct from existing ones", () => {
    const cleaned = normalizeColumns(createTable(["a", "a", "a_1"], []));
    expect(cleaned.columns).toEqual(["a", "a_1", "a_1_1"]);
  });

  test("factory names describe the enabled flags", () => {
    expect(normalizeColumns.name).toBe("normalizeColumns()");
    expect(makeNormalizeColumns({ preserveCase: true, preserveDots: true }).name).toBe(
      "normalizeColumns(preserveCase, preserveDots)"
    );
  });
});

describe("whitespace stripping", () => {
  const table = createTable(["a", "b", "c"], [["  hello   world  ", 5, null]]);

  test("trims string cells and leaves other cells alone", () => {
    expect(stripWhitespace(table).rows).toEqual([["hello   world", 5, null]]);
  });

  test("optionally collapses inner whitespace", () => {
    const cleaner = makeStripWhitespace({ normalizeInner: true });
    expect(cleaner.name).toBe("stripWhitespace(normalizeInner=true)");
    expect(cleaner(table).rows).toEqual([["hello world", 5, null]]);
  });
});

describe("empty rows and columns", () => {
  test("drops rows with no content and renumbers the index", () => {
    const cleaned = dropEmptyRows(createTable(["a", "b"], [["a", 1], [null, "  "], ["b", null]]));
    expect(cleaned.rows).toEqual([
      ["a", 1],
      ["b", null],
    ]);
    expect(cleaned.index).toEqual([0, 1]);
  });

  test("drops columns with no content", () => {
    const cleaned = dropEmptyCols(
      createTable(
        ["a", "b", "c"],
        [
          [1, null, "x"],
          [2, "", "y"],
        ]
      )
    );
    expect(cleaned.columns).toEqual(["a", "c"]);
    expect(cleaned.rows).toEqual([
      [1, "x"],
      [2, "y"],
    ]);
  });
});

describe("missing-value tokens", () => {
  test("replaces the recognised tokens with null and nothing else", () => {
    const table = createTable(
      ["a", "b", "c", "d", "e", "f", "g", "h"],
      [["n/a", " NA ", "-", "None", "", "Null", "value", 0]]
    );
    expect(standardizeNa(table).rows).toEqual([[null, null, null, null, null, "Null", "value", 0]]);
  });
});

describe("deduplication", () => {
  test("keeps the first of each identical row", () => {
    const cleaned = deduplicate(
      createTable(
        ["a", "b"],
        [
          ["a", 1],
          ["b", 2],
          ["a", 1],
          [null, 3],
          [null, 3],
        ]
      )
    );
    expect(cleaned.rows).toEqual([
      ["a", 1],
      ["b", 2],
      [null, 3],
    ]);
    expect(cleaned.index).toEqual([0, 1, 2]);
  });

  test("treats a numeric string and a number as different", () => {
    expect(deduplicate(createTable(["a"], [["1"], [1]])).rows).toEqual([["1"], [1]]);
  });
});

describe("type inference", () => {
  test("converts a mostly numeric text column and nulls the rest", () => {
    const cleaned = inferTypes(createTable(["x"], [["1"], ["2"], ["3"], ["x"]]));
    expect(cleaned.rows).toEqual([[1], [2], [3], [null]]);
  });

  test("leaves a mostly non-numeric column unchanged", () => {
    const rows = [["1"], ["x"], ["y"], ["z"]];
    expect(inferTypes(createTable(["y"], rows)).rows).toEqual(rows);
  });

  test("falls back to dates when numbers do not fit", () => {
    const cleaned = inferTypes(createTable(["d"], [["2024-01-15"], ["2024-02-01"], ["n/a"]]));
    const values = cleaned.rows.map(([value]) => (value instanceof Date ? value.getTime() : value));
    expect(values).toEqual([Date.UTC(2024, 0, 15), Date.UTC(2024, 1, 1), null]);
  });

  test("skips columns that hold no strings", () => {
    const rows = [[1], [2], [null]];
    expect(inferTypes(createTable(["n"], rows)).rows).toEqual(rows);
  });
});
