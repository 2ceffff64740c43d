import { LogAssertionError, RecordWaitTimeoutError } from "../errors/fixtureErrors.js";
import { levelName, recordSeverity, toSeverity, type LevelThreshold } from "./levels.js";
import type { LogRecord, RecordPage, RecordQuery } from "./recordTypes.js";

/**
 * Append-only log of received records plus the query/assert helpers tests use.
 *
 * `records` is a plain array: tests may read, clear or edit it between assertions.
 * Only the reactor appends.
 */
export class RecordStore {
  readonly records: LogRecord[] = [];
  private listeners = new Set<(record: LogRecord) => void>();

  append(record: LogRecord): void {
    this.records.push(record);
    for (const fn of this.listeners) fn(record);
  }

  /**
   * Drop every stored record; returns how many were dropped.
   */
  clear(): number {
    const count = this.records.length;
    this.records.length = 0;
    return count;
  }

  onAppend(listener: (record: LogRecord) => void): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  /**
   * Records at or above the threshold, in arrival order. Each iteration re-reads the store.
   */
  filter(threshold: LevelThreshold): Iterable<LogRecord> {
    const severity = toSeverity(threshold);
    const records = this.records;
    return {
      *[Symbol.iterator]() {
        for (const record of records) {
          const s = recordSeverity(record);
          if (s !== null && s >= severity) yield record;
        }
      },
    };
  }

  /**
   * Fails unless some record is at or above the threshold.
   */
  assertHasAtLeast(threshold: LevelThreshold): void {
    const severity = toSeverity(threshold);
    if (this.firstAtLeast(severity) === null) {
      throw new LogAssertionError(
        `No logs of level ${levelName(severity)} or above were received.`,
        severity
      );
    }
  }

  /**
   * Fails on the first record at or above the threshold.
   */
  assertNoneAtLeast(threshold: LevelThreshold): void {
    const severity = toSeverity(threshold);
    const record = this.firstAtLeast(severity);
    if (record !== null) {
      throw new LogAssertionError(
        `A log level ${String(record.level)} was received. Message: ${String(record.message)}`,
        severity,
        record
      );
    }
  }

  /**
   * Resolve once at least `count` records are stored.
   */
  waitForRecords(count: number, opts: { timeoutMs?: number } = {}): Promise<LogRecord[]> {
    const timeoutMs = opts.timeoutMs ?? 2000;
    if (this.records.length >= count) return Promise.resolve(this.records.slice());

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        off();
        reject(new RecordWaitTimeoutError(count, this.records.length, timeoutMs));
      }, timeoutMs);
      const off = this.onAppend(() => {
        if (this.records.length < count) return;
        clearTimeout(timer);
        off();
        resolve(this.records.slice());
      });
    });
  }

  /**
   * Threshold + text search + paging, newest first.
   */
  query(opts: RecordQuery): RecordPage {
    const { threshold, search, page, pageSize } = opts;
    let list = threshold === undefined ? this.records.slice() : [...this.filter(threshold)];
    if (search) {
      const q = search.toLowerCase();
      list = list.filter((r) => JSON.stringify(r).toLowerCase().includes(q));
    }
    list.reverse();
    const total = list.length;
    const start = (page - 1) * pageSize;
    return { items: list.slice(start, start + pageSize), total };
  }

  private firstAtLeast(severity: number): LogRecord | null {
    for (const record of this.filter(severity)) return record;
    return null;
  }
}
