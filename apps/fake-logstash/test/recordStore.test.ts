import { describe, expect, it } from "vitest";
import { LogAssertionError, RecordWaitTimeoutError, UnknownLevelError } from "../src/errors/fixtureErrors.js";
import { levelName, recordSeverity, toSeverity } from "../src/records/levels.js";
import { RecordStore } from "../src/records/recordStore.js";

function storeWith(...records: Array<Record<string, unknown>>): RecordStore {
  const store = new RecordStore();
  for (const r of records) store.append(r);
  return store;
}

describe("levels", () => {
  it("maps names case-insensitively and passes numbers through", () => {
    expect(toSeverity("error")).toBe(40);
    expect(toSeverity("Warning")).toBe(30);
    expect(toSeverity("WARN")).toBe(30);
    expect(toSeverity("FATAL")).toBe(50);
    expect(toSeverity(25)).toBe(25);
  });

  it("rejects unknown threshold names", () => {
    expect(() => toSeverity("LOUD")).toThrow(UnknownLevelError);
    expect(() => toSeverity("LOUD")).toThrow("Unknown log level: LOUD");
  });

  it("names severities", () => {
    expect(levelName(40)).toBe("ERROR");
    expect(levelName(50)).toBe("CRITICAL");
    expect(levelName(35)).toBe("Level 35");
  });

  it("gives no severity to records without a recognised level", () => {
    expect(recordSeverity({ message: "no level" })).toBeNull();
    expect(recordSeverity({ level: "CHATTY" })).toBeNull();
    expect(recordSeverity({ level: true })).toBeNull();
    expect(recordSeverity({ level: 45 })).toBe(45);
  });
});

describe("RecordStore", () => {
  it("filters at or above the threshold, in store order", () => {
    const store = storeWith(
      { level: "DEBUG", message: "a" },
      { level: "ERROR", message: "b" },
      { level: "WARNING", message: "c" },
      { level: "CRITICAL", message: "d" },
      { message: "no level" },
      { level: "CHATTY", message: "unknown" }
    );
    expect([...store.filter("WARNING")].map((r) => r.message)).toEqual(["b", "c", "d"]);
    expect([...store.filter(0)].map((r) => r.message)).toEqual(["a", "b", "c", "d"]);
  });

  it("returns a restartable view that sees later appends", () => {
    const store = storeWith({ level: "ERROR", message: "first" });
    const errors = store.filter("ERROR");
    expect([...errors]).toHaveLength(1);
    expect([...errors]).toHaveLength(1);
    store.append({ level: "ERROR", message: "second" });
    expect([...errors].map((r) => r.message)).toEqual(["first", "second"]);
  });

  it("asserts that some record meets the threshold", () => {
    const store = storeWith({ level: "INFO", message: "fine" });
    expect(() => store.assertHasAtLeast("INFO")).not.toThrow();
    expect(() => store.assertHasAtLeast("ERROR")).toThrow(LogAssertionError);
    expect(() => store.assertHasAtLeast("ERROR")).toThrow("No logs of level ERROR or above were received.");
  });

  it("asserts that no record meets the threshold and names the first offender", () => {
    const store = storeWith(
      { level: "INFO", message: "fine" },
      { level: "CRITICAL", message: "disk full" },
      { level: "ERROR", message: "later" }
    );
    expect(() => store.assertNoneAtLeast(60)).not.toThrow();

    let caught: unknown = null;
    try {
      store.assertNoneAtLeast("error");
    } catch (e: unknown) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(LogAssertionError);
    if (!(caught instanceof LogAssertionError)) return;
    expect(caught.message).toBe("A log level CRITICAL was received. Message: disk full");
    expect(caught.threshold).toBe(40);
    expect(caught.record).toEqual({ level: "CRITICAL", message: "disk full" });
  });

  it("lets tests clear the records directly", () => {
    const store = storeWith({ level: "ERROR", message: "x" });
    store.records.length = 0;
    expect(() => store.assertNoneAtLeast("DEBUG")).not.toThrow();
    store.append({ level: "DEBUG", message: "y" });
    expect(store.clear()).toBe(1);
    expect(store.records).toEqual([]);
  });

  it("waits for records to arrive", async () => {
    const store = new RecordStore();
    const waiting = store.waitForRecords(2, { timeoutMs: 1000 });
    store.append({ message: "one" });
    setTimeout(() => store.append({ message: "two" }), 5);
    await expect(waiting).resolves.toEqual([{ message: "one" }, { message: "two" }]);
  });

  it("times out waiting for records", async () => {
    const store = storeWith({ message: "only" });
    const waiting = store.waitForRecords(3, { timeoutMs: 20 });
    await expect(waiting).rejects.toBeInstanceOf(RecordWaitTimeoutError);
    await expect(store.waitForRecords(3, { timeoutMs: 20 })).rejects.toThrow(
      "Expected at least 3 records within 20ms, received 1."
    );
  });

  it("pages newest first with threshold and search", () => {
    const store = storeWith(
      { level: "INFO", message: "boot" },
      { level: "ERROR", message: "db down" },
      { level: "ERROR", message: "db up again" },
      { level: "WARNING", message: "slow" }
    );
    expect(store.query({ page: 1, pageSize: 2 })).toEqual({
      items: [
        { level: "WARNING", message: "slow" },
        { level: "ERROR", message: "db up again" },
      ],
      total: 4,
    });
    expect(store.query({ threshold: "ERROR", search: "DB", page: 2, pageSize: 1 })).toEqual({
      items: [{ level: "ERROR", message: "db down" }],
      total: 2,
    });
  });
});
