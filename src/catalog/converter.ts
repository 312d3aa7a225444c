import fs from "node:fs";
import path from "node:path";
import { ConversionLimits } from "../config";
import { Logger, MetricsRegistry } from "../observability";
import { CatalogDocumentResult, FlatRow, RejectionKind } from "../types";
import { describeError, isOutOfMemoryError, XmlParseError } from "./errors";
import { estimateUpcCount } from "./estimator";
import { buildOutputTable, flattenCatalog } from "./flattener";
import { SkipLogger } from "./skipLog";
import { parseXmlDocument, XmlElement } from "./xmlTree";

export interface ConverterDeps {
  limits: ConversionLimits;
  logger: Logger;
  metrics: MetricsRegistry;
  skipLog: SkipLogger;
  estimate?: (filePath: string, earlyExit: number) => Promise<number | null>;
  readFile?: (filePath: string) => Promise<string>;
}

type Rejection = { kind: RejectionKind; reason: string };

function formatCount(value: number): string {
  return value.toLocaleString("en-US");
}

/** `1M` style for whole millions, thousands separators otherwise. */
export function formatLimit(value: number): string {
  return value > 0 && value % 1_000_000 === 0 ? `${value / 1_000_000}M` : formatCount(value);
}

function readDocument(filePath: string): Promise<string> {
  return fs.promises.readFile(filePath, "utf-8");
}

/**
 * Converts one catalog document into an output table, or explains why it was
 * refused. Every refusal except an empty document is appended to the skip log.
 * Only a failing skip log write escapes as an exception.
 */
export async function convertCatalogFile(filePath: string, deps: ConverterDeps): Promise<CatalogDocumentResult> {
  const { limits, logger, metrics } = deps;
  const estimate = deps.estimate ?? estimateUpcCount;
  const readFile = deps.readFile ?? readDocument;
  const fileName = path.basename(filePath);

  const stopEstimateTimer = metrics.startTimer("estimate_ms");
  const estimatedUpcCount = await estimate(filePath, limits.estimateEarlyExit);
  stopEstimateTimer();
  const base = { fileName, filePath, estimatedUpcCount };

  const reject = (rejection: Rejection): CatalogDocumentResult => {
    deps.skipLog.record(fileName, rejection.reason);
    return { ...base, status: "rejected", ...rejection };
  };

  if (estimatedUpcCount !== null && estimatedUpcCount > limits.maxLeafRecords) {
    return reject({
      kind: "preflight",
      reason: `too many leaf records (~${formatCount(estimatedUpcCount)} > ${formatLimit(limits.maxLeafRecords)} limit)`,
    });
  }
  if (estimatedUpcCount === null) {
    logger.debug("estimate_unavailable", { file: fileName });
  }

  const stopParseTimer = metrics.startTimer("parse_ms");
  let root: XmlElement;
  try {
    root = parseXmlDocument(await readFile(filePath));
  } catch (error) {
    stopParseTimer();
    return reject(classifyParseFailure(error));
  }

  let rows: FlatRow[];
  try {
    rows = flattenCatalog(root);
  } catch (error) {
    stopParseTimer();
    return reject(classifyTraversalFailure(error));
  }
  stopParseTimer();

  if (rows.length === 0) {
    logger.info("no_upc_elements", { file: fileName });
    return { ...base, status: "empty" };
  }

  if (rows.length > limits.maxSheetRows) {
    return reject({
      kind: "row_limit",
      reason: `too many rows (${formatCount(rows.length)} > ${formatCount(limits.maxSheetRows)} sheet row limit)`,
    });
  }

  return { ...base, status: "converted", table: buildOutputTable(rows) };
}

function classifyParseFailure(error: unknown): Rejection {
  if (error instanceof XmlParseError) {
    return { kind: "parse", reason: `XML parse error: ${error.message}` };
  }
  return classifyTraversalFailure(error);
}

function classifyTraversalFailure(error: unknown): Rejection {
  if (isOutOfMemoryError(error)) {
    return { kind: "resource", reason: "MemoryError - file too large" };
  }
  const { kind, detail } = describeError(error);
  return { kind: "unexpected", reason: `unexpected error: ${kind} - ${detail}` };
}
