import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, describe, expect, test, vi } from "vitest";
import { main } from "../cli/main.js";
import { parseCliOptions } from "../cli/options.js";
import { runSift } from "../cli/run.js";
import { ConfigError } from "../pipeline/errors.js";
import { resetEventEmitter } from "../pipeline/events.js";

const NOW = new Date("2026-01-02T03:04:05.000Z");

describe("CLI options", () => {
  test("fills defaults and derives a run id from the clock", () => {
    const options = parseCliOptions(["a.csv", "b.json"], NOW);

    expect(options.files).toEqual(["a.csv", "b.json"]);
    expect(options.extract).toBe(false);
    expect(options.preset).toBeUndefined();
    expect(options.ignoreIndex).toBe(true);
    expect(options.includeMetadata).toEqual([]);
    expect(options.logFormat).toBe("pretty");
    expect(options.runId).toBe("sift-2026-01-02T03-04-05-000Z");
  });

  test("reads flags", () => {
    const options = parseCliOptions(
      [
        "a.csv",
        "--extract",
        "--preset",
        "aggressive",
        "--include-metadata",
        " Site , Project ,",
        "--density-threshold",
        "0.5",
        "--no-index-reset",
        "--run-id",
        "run-7",
      ],
      NOW
    );

    expect(options.preset).toBe("aggressive");
    expect(options.includeMetadata).toEqual(["Site", "Project"]);
    expect(options.densityThreshold).toBe(0.5);
    expect(options.ignoreIndex).toBe(false);
    expect(options.runId).toBe("run-7");
  });

  test("rejects invalid values", () => {
    expect(() => parseCliOptions(["--preset", "bogus"], NOW)).toThrow(ConfigError);
    expect(() => parseCliOptions(["--log-format", "xml"], NOW)).toThrow(ConfigError);
    expect(() => parseCliOptions(["--density-threshold", "1.5"], NOW)).toThrow(ConfigError);
    expect(() => parseCliOptions(["--density-threshold", "abc"], NOW)).toThrow(
      "--density-threshold must be a number, got 'abc'"
    );
  });

  test("metadata columns need extraction", () => {
    expect(() => parseCliOptions(["a.csv", "--include-metadata", "Site"], NOW)).toThrow(
      "--include-metadata requires --extract"
    );
  });
});

describe("runSift", () => {
  let dir: string | null = null;

  afterEach(() => {
    if (dir) {
      rmSync(dir, { recursive: true, force: true });
      dir = null;
    }
  });

  test("extracts, cleans and combines every file and records load failures", () => {
    dir = mkdtempSync(join(tmpdir(), "tablesift-cli-"));
    const labA = join(dir, "lab-a.json");
    const labB = join(dir, "lab-b.json");
    const broken = join(dir, "broken.txt");
    writeFileSync(
      labA,
      JSON.stringify([
        ["Site: North", null, null],
        [null, null, null],
        ["Sample ID", "Depth", "pH"],
        ["SAMP-001", 10, 6.5],
        ["SAMP-002", 20, 6.7],
        ["SAMP-003", 30, 6.9],
      ])
    );
    writeFileSync(
      labB,
      JSON.stringify({
        sheets: {
          run1: [
            ["Sample ID", "Depth", "pH"],
            ["SAMP-101", 15, 7.1],
            ["SAMP-102", 25, 7.2],
            ["SAMP-103", 35, 7.4],
          ],
        },
      })
    );

    const options = parseCliOptions(
      [labA, labB, broken, "--extract", "--preset", "standard", "--add-source", "--include-metadata", "Site", "--run-id", "run-1"],
      NOW
    );
    const report = runSift(options, NOW);

    expect(report.runId).toBe("run-1");
    expect(report.generatedAt).toBe("2026-01-02T03:04:05.000Z");
    expect(report.tables).toEqual([
      {
        key: "lab-a.json",
        rows: 3,
        columns: ["sample_id", "depth", "ph"],
        extraction: {
          headerRow: 2,
          dataRange: [3, 5],
          metadata: { Site: "North" },
          footer: [],
          confidence: 1,
          warnings: [],
        },
      },
      {
        key: "lab-b.json/run1",
        rows: 3,
        columns: ["sample_id", "depth", "ph"],
        extraction: {
          headerRow: 0,
          dataRange: [1, 3],
          metadata: {},
          footer: [],
          confidence: 1,
          warnings: [],
        },
      },
    ]);
    expect(report.failures).toEqual([
      {
        label: "input",
        filename: broken,
        key: broken,
        stage: "load",
        errorCode: "GRID_FORMAT",
        error: "broken.txt: unsupported file type '.txt'",
      },
    ]);
    expect(report.combined?.columns).toEqual(["sample_id", "depth", "ph", "_source", "_Site"]);
    expect(report.combined?.rows).toHaveLength(6);
    expect(report.combined?.rows[0]).toEqual({
      sample_id: "SAMP-001",
      depth: 10,
      ph: 6.5,
      _source: "lab-a.json",
      _Site: "North",
    });
    expect(report.combined?.rows[3]).toEqual({
      sample_id: "SAMP-101",
      depth: 15,
      ph: 7.1,
      _source: "lab-b.json/run1",
      _Site: null,
    });
  });

  test("reports no combined table when nothing loads", () => {
    const report = runSift(parseCliOptions(["missing.xlsx"], NOW), NOW);
    expect(report.tables).toEqual([]);
    expect(report.combined).toBeNull();
    expect(report.failures.map((failure) => failure.errorCode)).toEqual(["GRID_FORMAT"]);
  });
});

describe("main", () => {
  let dir: string | null = null;
  let stdout: string[] = [];
  let stderr: string[] = [];

  function captureConsole(): void {
    stdout = [];
    stderr = [];
    vi.spyOn(console, "log").mockImplementation((...data: unknown[]) => {
      stdout.push(data.join(" "));
    });
    vi.spyOn(console, "error").mockImplementation((...data: unknown[]) => {
      stderr.push(data.join(" "));
    });
    vi.spyOn(console, "warn").mockImplementation((...data: unknown[]) => {
      stderr.push(data.join(" "));
    });
  }

  afterEach(() => {
    resetEventEmitter();
    vi.restoreAllMocks();
    if (dir) {
      rmSync(dir, { recursive: true, force: true });
      dir = null;
    }
  });

  test("keeps stdout to the JSON report and sends progress to stderr and the events log", () => {
    dir = mkdtempSync(join(tmpdir(), "tablesift-main-"));
    const input = join(dir, "lab.csv");
    const eventsLog = join(dir, "logs", "events.log");
    writeFileSync(input, "Site: North\n\nSample ID,Depth,pH\nSAMP-001,10,6.5\nSAMP-002,20,6.7\nSAMP-003,30,6.9\n");
    captureConsole();

    const code = main([input, "--extract", "--events-log", eventsLog, "--run-id", "run-2"], NOW);

    expect(code).toBe(0);
    expect(stdout).toHaveLength(1);
    const report: unknown = JSON.parse(stdout[0]);
    expect(report).toMatchObject({
      runId: "run-2",
      tables: [{ key: "lab.csv", rows: 3, columns: ["Sample ID", "Depth", "pH"] }],
      failures: [],
    });
    expect(
      stderr.some((line) => line.includes("extract:lab.csv end Core extraction finished rows=3 columns=3"))
    ).toBe(true);

    const logLines = readFileSync(eventsLog, "utf8").trim().split("\n");
    expect(
      logLines.some((line) => line.includes("[extract/lab.csv] [extract.lifecycle] Core extraction finished"))
    ).toBe(true);
    expect(logLines.some((line) => line.includes(' [ingest] [session.update] Tables loaded label="input"'))).toBe(
      true
    );
  });

  test("exits 2 on bad arguments and 1 when nothing loads", () => {
    captureConsole();

    expect(main(["--preset", "bogus"], NOW)).toBe(2);
    expect(stdout).toEqual([]);

    expect(main(["missing.xlsx"], NOW)).toBe(1);
    expect(stdout).toHaveLength(1);
    expect(JSON.parse(stdout[0])).toMatchObject({ tables: [], combined: null });
  });
});
