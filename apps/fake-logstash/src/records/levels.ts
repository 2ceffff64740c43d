import { UnknownLevelError } from "../errors/fixtureErrors.js";
import type { LogRecord } from "./recordTypes.js";

export type LevelThreshold = string | number;

const SEVERITY_BY_NAME = new Map<string, number>([
  ["CRITICAL", 50],
  ["FATAL", 50],
  ["ERROR", 40],
  ["WARNING", 30],
  ["WARN", 30],
  ["INFO", 20],
  ["DEBUG", 10],
  ["NOTSET", 0],
]);

const NAME_BY_SEVERITY = new Map<number, string>([
  [50, "CRITICAL"],
  [40, "ERROR"],
  [30, "WARNING"],
  [20, "INFO"],
  [10, "DEBUG"],
  [0, "NOTSET"],
]);

/**
 * Resolve a threshold given by name (case-insensitive) or number.
 */
export function toSeverity(level: LevelThreshold): number {
  if (typeof level === "number") {
    if (!Number.isFinite(level)) throw new UnknownLevelError(String(level));
    return level;
  }
  const severity = SEVERITY_BY_NAME.get(level.trim().toUpperCase());
  if (severity === undefined) throw new UnknownLevelError(level);
  return severity;
}

/**
 * Severity of a stored record, or null when its `level` is missing or unrecognized.
 * Such records never meet a threshold.
 */
export function recordSeverity(record: LogRecord): number | null {
  const level = record.level;
  if (typeof level === "number") return Number.isFinite(level) ? level : null;
  if (typeof level !== "string") return null;
  return SEVERITY_BY_NAME.get(level.trim().toUpperCase()) ?? null;
}

export function levelName(severity: number): string {
  return NAME_BY_SEVERITY.get(severity) ?? `Level ${severity}`;
}

export function isKnownLevel(level: string): boolean {
  return SEVERITY_BY_NAME.has(level.trim().toUpperCase());
}
