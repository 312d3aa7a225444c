import fs from "node:fs";
import path from "node:path";
import { Logger } from "../observability";

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** Local time, second precision: `2026-01-05 09:03:07`. */
export function formatLocalTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}

export function formatSkipLine(date: Date, fileName: string, reason: string): string {
  return `[${formatLocalTimestamp(date)}] ${fileName} - ${reason}\n`;
}

interface SkipLoggerOptions {
  logFilePath: string;
  logger: Logger;
  now?: () => Date;
}

/**
 * Append-only record of every file the converter refused. Each entry is
 * fsynced before `record` returns; write failures propagate to the caller.
 */
export class SkipLogger {
  readonly logFilePath: string;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: SkipLoggerOptions) {
    this.logFilePath = path.resolve(options.logFilePath);
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
  }

  ensureDirectory(): void {
    fs.mkdirSync(path.dirname(this.logFilePath), { recursive: true });
  }

  record(fileName: string, reason: string): void {
    const line = formatSkipLine(this.now(), fileName, reason);
    this.ensureDirectory();

    const fd = fs.openSync(this.logFilePath, "a");
    try {
      fs.writeSync(fd, line, null, "utf-8");
      fs.fsyncSync(fd);
    } finally {
      fs.closeSync(fd);
    }

    this.logger.warn("skip_logged", { file: fileName, reason });
  }

  exists(): boolean {
    return fs.existsSync(this.logFilePath);
  }
}
