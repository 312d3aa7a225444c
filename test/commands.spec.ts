import fs from "node:fs";
import path from "node:path";
import * as XLSX from "xlsx";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { AppConfig, DEFAULT_CONFIG } from "../src/config";
import { CommandContext, estimateVerdict, listXmlFiles, runConvert, runEstimate } from "../src/core/commands";
import { CsvSink, TableSink, XlsxSink } from "../src/sink";
import { CANONICAL_COLUMNS } from "../src/types";
import { captureLogger, fixturePath, makeMetrics, makeSkipLogger, makeTempDir, removeDir } from "./helpers";

describe("batch commands", () => {
  let dir: string;
  let inputDir: string;
  let outputDir: string;

  beforeEach(() => {
    dir = makeTempDir();
    inputDir = path.join(dir, "xml");
    outputDir = path.join(dir, "out", "xlsx");
    fs.mkdirSync(inputDir);
  });

  afterEach(() => {
    removeDir(dir);
  });

  function copyFixture(name: string, as = name): void {
    fs.copyFileSync(fixturePath(name), path.join(inputDir, as));
  }

  function makeContext(overrides: Partial<AppConfig> = {}, sink?: TableSink) {
    const config: AppConfig = { ...DEFAULT_CONFIG, inputDir, outputDir, ...overrides };
    const captured = captureLogger("convert");
    const skipLog = makeSkipLogger(dir, captured.logger);
    const context: CommandContext = {
      config,
      logger: captured.logger,
      metrics: makeMetrics(),
      sink: sink ?? new XlsxSink(outputDir, config.sheetName),
      skipLog,
    };
    return { context, entries: captured.entries, skipLog };
  }

  function readSheet(file: string): string[][] {
    const workbook = XLSX.readFile(file);
    const sheet = workbook.Sheets[workbook.SheetNames[0]];
    return XLSX.utils.sheet_to_json<string[]>(sheet, { header: 1, defval: "" });
  }

  describe("listXmlFiles", () => {
    it("lists .xml files of any case, sorted, ignoring directories and other files", () => {
      fs.writeFileSync(path.join(inputDir, "b.xml"), "<a/>");
      fs.writeFileSync(path.join(inputDir, "A.XML"), "<a/>");
      fs.writeFileSync(path.join(inputDir, "notes.txt"), "");
      fs.mkdirSync(path.join(inputDir, "nested.xml"));

      expect(listXmlFiles(inputDir).map((file) => path.basename(file))).toEqual(["A.XML", "b.xml"]);
      expect(listXmlFiles(inputDir, 1).map((file) => path.basename(file))).toEqual(["A.XML"]);
    });

    it("fails when the input directory is missing", () => {
      expect(() => listXmlFiles(path.join(dir, "missing"))).toThrow(/Input directory not found/);
    });
  });

  describe("runConvert", () => {
    it("writes one workbook per converted file and keeps going past failures", async () => {
      copyFixture("new-schema.xml");
      copyFixture("old-schema.xml");
      copyFixture("empty.xml");
      copyFixture("malformed.xml", "broken.xml");
      fs.writeFileSync(path.join(inputDir, "readme.txt"), "not a catalog");
      const { context, skipLog } = makeContext();

      const summary = await runConvert(context);

      expect(summary).toEqual({ processed: 4, converted: 2, empty: 1, skipped: 1, rows: 5 });
      expect(fs.readdirSync(outputDir).sort()).toEqual(["new-schema.xlsx", "old-schema.xlsx"]);

      const lines = fs.readFileSync(skipLog.logFilePath, "utf-8").split("\n").filter(Boolean);
      expect(lines).toHaveLength(1);
      expect(lines[0]).toMatch(/^\[2026-01-05 09:03:07\] broken\.xml - XML parse error: /);
    });

    it("writes the canonical header and one row per <upc>", async () => {
      copyFixture("new-schema.xml");
      copyFixture("old-schema.xml");
      const { context } = makeContext();

      await runConvert(context);

      const newer = readSheet(path.join(outputDir, "new-schema.xlsx"));
      expect(newer).toHaveLength(3);
      expect(newer[0]).toEqual([...CANONICAL_COLUMNS]);
      expect(newer[1]).toEqual([
        "M1", "Acme Optics", "P1", "Daily Clear", "A", "T", "WEEKLY", "SPH", "30", "EA",
        "U1", "-1.00", "8.6", "14.2", "", "", "", "", "", "",
      ]);
      expect(newer[2][10]).toBe("U2");

      const older = readSheet(path.join(outputDir, "old-schema.xlsx"));
      expect(older).toHaveLength(4);
      expect(older[0]).toEqual([...CANONICAL_COLUMNS]);
      expect(older.slice(1).map((row) => [row[5], row[6], row[7]])).toEqual([
        ["", "", ""],
        ["", "", ""],
        ["", "", ""],
      ]);
      expect(older.slice(1).map((row) => row[10])).toEqual(["0071", "0072", "0080"]);
    });

    it("creates the output and skip log directories before processing", async () => {
      const { context, skipLog } = makeContext();

      const summary = await runConvert(context);

      expect(summary).toEqual({ processed: 0, converted: 0, empty: 0, skipped: 0, rows: 0 });
      expect(fs.existsSync(outputDir)).toBe(true);
      expect(fs.existsSync(path.dirname(skipLog.logFilePath))).toBe(true);
      expect(skipLog.exists()).toBe(false);
    });

    it("logs progress for every file and a final summary", async () => {
      copyFixture("new-schema.xml");
      copyFixture("malformed.xml", "broken.xml");
      const { context, entries } = makeContext();

      await runConvert(context);

      expect(entries.map((entry) => entry.msg)).toEqual([
        "convert_start",
        "file_processing",
        "estimate_unavailable",
        "skip_logged",
        "file_skipped",
        "file_processing",
        "file_saved",
        "convert_complete",
      ]);
      expect(entries.find((entry) => entry.msg === "file_saved")).toMatchObject({
        file: "new-schema.xml",
        output: "new-schema.xlsx",
        rows: 2,
        columns: 20,
      });
      expect(entries.find((entry) => entry.msg === "file_skipped")).toMatchObject({ file: "broken.xml", kind: "parse" });
    });

    it("records a failed output write and continues", async () => {
      copyFixture("new-schema.xml");
      copyFixture("old-schema.xml");
      const failing: TableSink = {
        extension: "xlsx",
        write: async (baseName) => {
          if (baseName === "new-schema") {
            throw new Error("disk full");
          }
          return path.join(outputDir, `${baseName}.xlsx`);
        },
      };
      const { context, skipLog } = makeContext({}, failing);

      const summary = await runConvert(context);

      expect(summary).toEqual({ processed: 2, converted: 1, empty: 0, skipped: 1, rows: 3 });
      expect(fs.readFileSync(skipLog.logFilePath, "utf-8")).toBe(
        "[2026-01-05 09:03:07] new-schema.xml - output write failed: Error - disk full\n",
      );
    });

    it("honours the file limit", async () => {
      copyFixture("new-schema.xml");
      copyFixture("old-schema.xml");
      const { context } = makeContext();

      const summary = await runConvert(context, 1);

      expect(summary.processed).toBe(1);
      expect(fs.readdirSync(outputDir)).toEqual(["new-schema.xlsx"]);
    });

    it("writes CSV through the csv sink", async () => {
      copyFixture("new-schema.xml");
      const { context } = makeContext({ outputFormat: "csv" }, new CsvSink(outputDir, "Sheet1"));

      await runConvert(context);

      const lines = fs.readFileSync(path.join(outputDir, "new-schema.csv"), "utf-8").split("\n");
      expect(lines[0]).toBe(CANONICAL_COLUMNS.join(","));
      expect(lines[1]).toBe("M1,Acme Optics,P1,Daily Clear,A,T,WEEKLY,SPH,30,EA,U1,-1.00,8.6,14.2,,,,,,");
      expect(lines).toHaveLength(4);
    });
  });

  describe("runEstimate", () => {
    it("reports a verdict per file without writing anything", async () => {
      copyFixture("new-schema.xml");
      copyFixture("old-schema.xml");
      copyFixture("malformed.xml", "broken.xml");
      const { context, entries, skipLog } = makeContext({ maxLeafRecords: 2 });

      const summary = await runEstimate(context);

      expect(summary).toEqual({ processed: 3, tooLarge: 1, unknown: 1 });
      expect(
        entries
          .filter((entry) => entry.msg === "file_estimate")
          .map((entry) => [entry.file, entry.estimatedUpcCount, entry.verdict]),
      ).toEqual([
        ["broken.xml", null, "unknown"],
        ["new-schema.xml", 2, "ok"],
        ["old-schema.xml", 3, "too_large"],
      ]);
      expect(fs.existsSync(outputDir)).toBe(false);
      expect(skipLog.exists()).toBe(false);
    });
  });

  it("maps estimates to verdicts", () => {
    expect(estimateVerdict(null, 10)).toBe("unknown");
    expect(estimateVerdict(10, 10)).toBe("ok");
    expect(estimateVerdict(11, 10)).toBe("too_large");
  });
});
