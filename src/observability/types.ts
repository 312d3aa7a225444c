export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  file?: string;
  reason?: string;
  rows?: number;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "files_seen"
  | "files_converted"
  | "files_empty"
  | "files_skipped"
  | "rows_written";

export type MetricTimerName = "estimate_ms" | "parse_ms" | "write_ms";
