import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, describe, expect, test } from "vitest";
import { extractCoreData } from "../extract/core.js";
import { parseCsvGrid } from "../lib/csv.js";
import { gridsFromJson, loadGridFile } from "../lib/validation.js";
import { GridFormatError } from "../pipeline/errors.js";

describe("CSV grids", () => {
  test("keeps quoted delimiters and escaped quotes, blanks become null", () => {
    expect(parseCsvGrid('a,b,c\n1,"x, y",\n2.5,,"say ""hi"""\n')).toEqual([
      ["a", "b", "c"],
      [1, "x, y", null],
      [2.5, null, 'say "hi"'],
    ]);
  });

  test("pads short rows to the widest row", () => {
    expect(parseCsvGrid("a,b\n1\n")).toEqual([
      ["a", "b"],
      [1, null],
    ]);
  });

  test("can leave numbers as text and read other delimiters", () => {
    expect(parseCsvGrid("id\tname\r\n7\tx", { delimiter: "\t", inferNumbers: false })).toEqual([
      ["id", "name"],
      ["7", "x"],
    ]);
  });

  test("drops a byte-order mark", () => {
    expect(parseCsvGrid("\uFEFFa,b")).toEqual([["a", "b"]]);
  });
});

describe("JSON grids", () => {
  test("a bare grid is keyed by the file name", () => {
    const grids = gridsFromJson(
      [
        [1, "a"],
        [null, true],
      ],
      "g.json"
    );
    expect([...grids]).toEqual([
      [
        "g.json",
        [
          [1, "a"],
          [null, true],
        ],
      ],
    ]);
  });

  test("sheets are keyed by file and sheet name", () => {
    const grids = gridsFromJson({ sheets: { s1: [[1]], s2: [["x"]] } }, "book.json");
    expect([...grids.keys()]).toEqual(["book.json/s1", "book.json/s2"]);
  });

  test("pads ragged rows so a short trailer stays out of the table body", () => {
    const grids = gridsFromJson(
      [["Name", "Age", "City"], ["Alice", 30, "NYC"], ["Bob", 25, "LA"], ["Cara", 41, "SF"], ["Total: 3"]],
      "people.json"
    );
    const grid = grids.get("people.json") ?? [];
    expect(grid.map((row) => row.length)).toEqual([3, 3, 3, 3, 3]);
    expect(grid[4]).toEqual(["Total: 3", null, null]);

    const result = extractCoreData(grid);
    expect(result.core.rows).toHaveLength(3);
    expect(result.footer).toEqual(["Total: 3"]);
  });

  test("pads each sheet to its own widest row", () => {
    const grids = gridsFromJson({ sheets: { s1: [["a", "b"], [1]], s2: [["x"]] } }, "book.json");
    expect(grids.get("book.json/s1")).toEqual([
      ["a", "b"],
      [1, null],
    ]);
    expect(grids.get("book.json/s2")).toEqual([["x"]]);
  });

  test("rejects values that are not grids", () => {
    expect(() => gridsFromJson({ rows: [] }, "bad.json")).toThrow(GridFormatError);
    expect(() => gridsFromJson([[{ nested: 1 }]], "bad.json")).toThrow(GridFormatError);
    expect(() => gridsFromJson({ sheets: {} }, "bad.json")).toThrow(GridFormatError);
  });
});

describe("grid files", () => {
  let dir: string | null = null;

  afterEach(() => {
    if (dir) {
      rmSync(dir, { recursive: true, force: true });
      dir = null;
    }
  });

  test("loads CSV and TSV files by extension", () => {
    dir = mkdtempSync(join(tmpdir(), "tablesift-input-"));
    writeFileSync(join(dir, "a.csv"), "x,y\n1,2\n");
    writeFileSync(join(dir, "b.tsv"), "x\ty\n3\t4\n");

    expect([...loadGridFile(join(dir, "a.csv"))]).toEqual([
      [
        "a.csv",
        [
          ["x", "y"],
          [1, 2],
        ],
      ],
    ]);
    expect(loadGridFile(join(dir, "b.tsv")).get("b.tsv")).toEqual([
      ["x", "y"],
      [3, 4],
    ]);
  });

  test("rejects unknown extensions", () => {
    expect(() => loadGridFile("report.xlsx")).toThrow("report.xlsx: unsupported file type '.xlsx'");
  });
});
