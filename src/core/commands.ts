import fs from "node:fs";
import path from "node:path";
import { convertCatalogFile, describeError, estimateUpcCount, SkipLogger } from "../catalog";
import { AppConfig } from "../config";
import { Logger, MetricsRegistry } from "../observability";
import { TableSink } from "../sink";

export interface CommandContext {
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  sink: TableSink;
  skipLog: SkipLogger;
}

export interface ConvertSummary {
  processed: number;
  converted: number;
  empty: number;
  skipped: number;
  rows: number;
}

export interface EstimateSummary {
  processed: number;
  tooLarge: number;
  unknown: number;
}

export type EstimateVerdict = "ok" | "too_large" | "unknown";

const XML_EXTENSION = /\.xml$/i;

/** Regular `.xml` files (any case) directly inside `inputDir`, sorted by name. */
export function listXmlFiles(inputDir: string, maxFiles?: number): string[] {
  const absoluteDir = path.resolve(inputDir);
  if (!fs.existsSync(absoluteDir)) {
    throw new Error(`Input directory not found: ${absoluteDir}`);
  }

  const names = fs
    .readdirSync(absoluteDir, { withFileTypes: true })
    .filter((entry) => entry.isFile() && XML_EXTENSION.test(entry.name))
    .map((entry) => entry.name)
    .sort();
  const selected = maxFiles !== undefined ? names.slice(0, Math.max(maxFiles, 0)) : names;
  return selected.map((name) => path.join(absoluteDir, name));
}

export function estimateVerdict(count: number | null, maxLeafRecords: number): EstimateVerdict {
  if (count === null) {
    return "unknown";
  }
  return count > maxLeafRecords ? "too_large" : "ok";
}

export async function runConvert(ctx: CommandContext, maxFiles?: number): Promise<ConvertSummary> {
  const { config, logger, metrics, sink, skipLog } = ctx;
  fs.mkdirSync(path.resolve(config.outputDir), { recursive: true });
  skipLog.ensureDirectory();

  logger.info("convert_start", {
    inputDir: path.resolve(config.inputDir),
    outputDir: path.resolve(config.outputDir),
    format: config.outputFormat,
    skipLog: skipLog.logFilePath,
    maxFiles,
  });

  const summary: ConvertSummary = { processed: 0, converted: 0, empty: 0, skipped: 0, rows: 0 };

  for (const filePath of listXmlFiles(config.inputDir, maxFiles)) {
    const fileName = path.basename(filePath);
    summary.processed += 1;
    metrics.incrementCounter("files_seen");
    logger.info("file_processing", { file: fileName });

    const result = await convertCatalogFile(filePath, { limits: config, logger, metrics, skipLog });

    if (result.status === "empty") {
      summary.empty += 1;
      metrics.incrementCounter("files_empty");
      logger.info("file_empty", { file: fileName });
      continue;
    }

    if (result.status === "rejected") {
      summary.skipped += 1;
      metrics.incrementCounter("files_skipped");
      logger.warn("file_skipped", { file: fileName, kind: result.kind, reason: result.reason });
      continue;
    }

    const baseName = path.parse(fileName).name;
    const stopWriteTimer = metrics.startTimer("write_ms");
    let output: string;
    try {
      output = await sink.write(baseName, result.table);
    } catch (error) {
      stopWriteTimer();
      const { kind, detail } = describeError(error);
      const reason = `output write failed: ${kind} - ${detail}`;
      skipLog.record(fileName, reason);
      summary.skipped += 1;
      metrics.incrementCounter("files_skipped");
      logger.warn("file_skipped", { file: fileName, kind: "unexpected", reason });
      continue;
    }
    const durationMs = stopWriteTimer();

    const rowCount = result.table.rows.length;
    summary.converted += 1;
    summary.rows += rowCount;
    metrics.incrementCounter("files_converted");
    metrics.incrementCounter("rows_written", rowCount);
    logger.info("file_saved", {
      file: fileName,
      output: path.basename(output),
      rows: rowCount,
      columns: result.table.columns.length,
      durationMs,
    });
  }

  logger.info("convert_complete", {
    ...summary,
    skipLog: skipLog.exists() ? skipLog.logFilePath : undefined,
  });
  return summary;
}

/** Runs only the streaming estimate over the input directory; writes nothing. */
export async function runEstimate(ctx: CommandContext, maxFiles?: number): Promise<EstimateSummary> {
  const { config, logger, metrics } = ctx;
  const summary: EstimateSummary = { processed: 0, tooLarge: 0, unknown: 0 };

  for (const filePath of listXmlFiles(config.inputDir, maxFiles)) {
    const stopTimer = metrics.startTimer("estimate_ms");
    const count = await estimateUpcCount(filePath, config.estimateEarlyExit);
    const durationMs = stopTimer();
    const verdict = estimateVerdict(count, config.maxLeafRecords);

    summary.processed += 1;
    metrics.incrementCounter("files_seen");
    if (verdict === "too_large") {
      summary.tooLarge += 1;
    } else if (verdict === "unknown") {
      summary.unknown += 1;
    }
    logger.info("file_estimate", { file: path.basename(filePath), estimatedUpcCount: count, verdict, durationMs });
  }

  logger.info("estimate_complete", { ...summary });
  return summary;
}
