export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogEntry = {
  id: string;
  ts: string;
  level: LogLevel;
  scope: string;
  message: string;
  details?: Record<string, unknown>;
};

export type LogInput = Omit<LogEntry, "id" | "ts"> & { ts?: string };

/**
 * Diagnostic log handle handed to fixtures at construction.
 */
export type LogSink = {
  append(input: LogInput): LogEntry;
};
