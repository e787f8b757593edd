export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface LogFields {
  sourceId?: string;
  sourcePath?: string;
  tableIndex?: number;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "files_converted"
  | "files_failed"
  | "files_skipped"
  | "tables_converted"
  | "documents_emitted"
  | "language_check_failed";

export type MetricTimerName = "convert_ms";
