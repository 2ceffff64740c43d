import crypto from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import { ensureDir } from "../storage/dirs.js";
import type { LogEntry, LogInput, LogLevel, LogSink } from "./logTypes.js";

export type LogFilter = {
  level?: LogLevel;
  search?: string;
};

/**
 * Diagnostic log buffer: in-memory replay plus optional NDJSON persistence.
 */
export class LogBuffer implements LogSink {
  private readonly entries: LogEntry[] = [];
  private readonly maxEntries: number;
  private readonly logFilePath: string | null;
  private listeners = new Set<(entry: LogEntry) => void>();
  private pendingWrite: Promise<void> = Promise.resolve();
  private writeError: unknown = null;

  constructor(opts: { dataDir?: string; maxEntries?: number } = {}) {
    this.maxEntries = opts.maxEntries ?? 3000;
    this.logFilePath = opts.dataDir ? path.join(opts.dataDir, "diagnostics.ndjson") : null;
  }

  /**
   * Record one entry. The file write is queued; see flush().
   */
  append(input: LogInput): LogEntry {
    const entry: LogEntry = {
      id: crypto.randomUUID(),
      ts: input.ts ?? new Date().toISOString(),
      level: input.level,
      scope: input.scope,
      message: input.message,
      details: input.details,
    };

    this.entries.push(entry);
    if (this.entries.length > this.maxEntries) this.entries.shift();

    const filePath = this.logFilePath;
    if (filePath) {
      this.pendingWrite = this.pendingWrite
        .then(async () => {
          await ensureDir(path.dirname(filePath));
          await fs.appendFile(filePath, `${JSON.stringify(entry)}\n`, "utf-8");
        })
        .catch((e: unknown) => {
          this.writeError ??= e;
        });
    }

    for (const fn of this.listeners) fn(entry);
    return entry;
  }

  /**
   * Wait for queued file writes; rethrows the first write failure.
   */
  async flush(): Promise<void> {
    await this.pendingWrite;
    if (this.writeError !== null) {
      const err = this.writeError;
      this.writeError = null;
      throw err;
    }
  }

  /**
   * Subscribe to new entries; returns the unsubscribe function.
   */
  onAppend(listener: (entry: LogEntry) => void): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  /**
   * Filter (exact level + text search) and page the in-memory entries, newest first.
   */
  query(opts: { filter?: LogFilter; page: number; pageSize: number }): {
    items: LogEntry[];
    total: number;
  } {
    const { filter, page, pageSize } = opts;
    let list = this.entries.slice();
    if (filter?.level) list = list.filter((e) => e.level === filter.level);
    if (filter?.search) {
      const q = filter.search.toLowerCase();
      list = list.filter((e) => `${e.scope} ${e.message}`.toLowerCase().includes(q));
    }
    list.reverse();
    const total = list.length;
    const start = (page - 1) * pageSize;
    const items = list.slice(start, start + pageSize);
    return { items, total };
  }

  tail(limit: number): LogEntry[] {
    return this.entries.slice(-limit);
  }

  getById(id: string): LogEntry | null {
    return this.entries.find((e) => e.id === id) ?? null;
  }

  getExportPath(): string | null {
    return this.logFilePath;
  }
}
