import fs from "node:fs";
import path from "node:path";
import { AppConfig, ConfigOverrides, OutputFormat } from "./types";

const DEFAULT_CONFIG: AppConfig = {
  inputDir: "data/xml",
  outputDir: "data/xlsx",
  projectRoot: ".",
  skipLogFile: "skipped_large_files.txt",
  outputFormat: "xlsx",
  sheetName: "Sheet1",
  maxLeafRecords: 1_000_000,
  estimateEarlyExit: 1_200_000,
  maxSheetRows: 1_048_576,
};

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Config file not found: ${absolutePath}`);
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new Error(`Config file must contain a JSON object: ${absolutePath}`);
  }

  return pickOverrides(parsed);
}

function pickOverrides(source: object): ConfigOverrides {
  const overrides: ConfigOverrides = {};
  const entries = new Map(Object.entries(source));

  for (const key of ["inputDir", "outputDir", "projectRoot", "skipLogFile", "sheetName"] as const) {
    const value = entries.get(key);
    if (typeof value === "string" && value.length > 0) {
      overrides[key] = value;
    }
  }

  for (const key of ["maxLeafRecords", "estimateEarlyExit", "maxSheetRows"] as const) {
    const value = entries.get(key);
    if (typeof value === "number" && Number.isInteger(value) && value >= 0) {
      overrides[key] = value;
    }
  }

  const format = entries.get("outputFormat");
  const outputFormat = typeof format === "string" ? parseOutputFormat(format) : undefined;
  if (outputFormat) {
    overrides.outputFormat = outputFormat;
  }

  return overrides;
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

export function parseOutputFormat(value: string | undefined): OutputFormat | undefined {
  const normalized = value?.trim().toLowerCase();
  if (normalized === "xlsx" || normalized === "csv") {
    return normalized;
  }
  return undefined;
}

function toOutputFormat(value: string | undefined, fallback: OutputFormat): OutputFormat {
  return parseOutputFormat(value) ?? fallback;
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const merged: AppConfig = {
    ...DEFAULT_CONFIG,
    ...readConfigFile(configPath),
  };

  return {
    ...merged,
    inputDir: env.XML_INPUT_DIR ?? merged.inputDir,
    outputDir: env.XLSX_OUTPUT_DIR ?? merged.outputDir,
    projectRoot: env.PROJECT_ROOT ?? merged.projectRoot,
    skipLogFile: env.SKIP_LOG_FILE ?? merged.skipLogFile,
    outputFormat: toOutputFormat(env.OUTPUT_FORMAT, merged.outputFormat),
    sheetName: env.SHEET_NAME ?? merged.sheetName,
    maxLeafRecords: toInt(env.MAX_LEAF_RECORDS, merged.maxLeafRecords),
    estimateEarlyExit: toInt(env.ESTIMATE_EARLY_EXIT, merged.estimateEarlyExit),
    maxSheetRows: toInt(env.MAX_SHEET_ROWS, merged.maxSheetRows),
  };
}

export function resolveSkipLogPath(config: AppConfig): string {
  return path.resolve(config.projectRoot, config.skipLogFile);
}

export { DEFAULT_CONFIG };
