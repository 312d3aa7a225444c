import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { SkipLogger } from "../src/catalog";
import { Logger, LogLevel, MetricsRegistry } from "../src/observability";

export const FIXTURES_DIR = path.join(__dirname, "fixtures");

export function fixturePath(name: string): string {
  return path.join(FIXTURES_DIR, name);
}

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "catalog-export-"));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export interface CapturedLogs {
  logger: Logger;
  entries: Array<Record<string, unknown>>;
}

export function captureLogger(component = "test"): CapturedLogs {
  const entries: Array<Record<string, unknown>> = [];
  const logger = new Logger({ component, runId: "run_test" }, (_level: LogLevel, line: string) => {
    entries.push(JSON.parse(line));
  });
  return { logger, entries };
}

export function makeSkipLogger(dir: string, logger: Logger, now = new Date(2026, 0, 5, 9, 3, 7)): SkipLogger {
  return new SkipLogger({ logFilePath: path.join(dir, "logs", "skipped.txt"), logger, now: () => now });
}

export function makeMetrics(): MetricsRegistry {
  return new MetricsRegistry();
}

export function upcCatalog(upcCount: number): string {
  const upcs = Array.from({ length: upcCount }, (_, index) => `<upc id="U${index + 1}"/>`).join("");
  return `<catalog><manufacturer><mCode>M1</mCode><product mode="A"><pCode>P1</pCode>${upcs}</product></manufacturer></catalog>`;
}
