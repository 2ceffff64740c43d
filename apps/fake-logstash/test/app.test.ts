import request from "supertest";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createInspectionApp } from "../src/http/app.js";
import { LogBuffer } from "../src/logging/logBuffer.js";
import { FakeLogstashService } from "../src/service/fakeLogstashService.js";

describe("inspection api", () => {
  let logstash: FakeLogstashService;
  let diagnostics: LogBuffer;
  let app: ReturnType<typeof createInspectionApp>;

  beforeEach(async () => {
    diagnostics = new LogBuffer();
    logstash = await FakeLogstashService.create({ logger: diagnostics });
    logstash.records.push(
      { level: "INFO", message: "boot" },
      { level: "WARNING", message: "disk low" },
      { level: "ERROR", message: "disk full" }
    );
    app = createInspectionApp({ logstash, diagnostics });
  });

  afterEach(async () => {
    await logstash.stop();
  });

  it("reports health", async () => {
    const before = await request(app).get("/healthz");
    expect(before.status).toBe(200);
    expect(before.body).toEqual({ ok: true, alive: false, port: logstash.port });

    logstash.start();
    const after = await request(app).get("/healthz");
    expect(after.body.alive).toBe(true);
  });

  it("lists records at or above a level, newest first", async () => {
    const res = await request(app).get("/api/records").query({ level: "warning" });
    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      items: [
        { level: "ERROR", message: "disk full" },
        { level: "WARNING", message: "disk low" },
      ],
      total: 2,
      page: 1,
      pageSize: 50,
    });
  });

  it("rejects unknown levels", async () => {
    const res = await request(app).get("/api/records").query({ level: "LOUD" });
    expect(res.status).toBe(400);
    expect(res.body.error).toBe("BAD_REQUEST");
  });

  it("clears records", async () => {
    const res = await request(app).delete("/api/records");
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ ok: true, cleared: 3 });
    expect(logstash.records).toEqual([]);
  });

  it("runs record assertions", async () => {
    const some = await request(app).get("/api/records/assert").query({ level: "ERROR" });
    expect(some.status).toBe(200);
    expect(some.body).toEqual({ ok: true });

    const none = await request(app).get("/api/records/assert").query({ level: "WARNING", expect: "none" });
    expect(none.status).toBe(409);
    expect(none.body).toEqual({
      error: "ASSERTION_FAILED",
      message: "A log level WARNING was received. Message: disk low",
    });

    logstash.clearRecords();
    const missing = await request(app).get("/api/records/assert").query({ level: "ERROR" });
    expect(missing.status).toBe(409);
    expect(missing.body.message).toBe("No logs of level ERROR or above were received.");
  });

  it("serves the diagnostic log", async () => {
    logstash.start();
    const res = await request(app).get("/api/diagnostics").query({ level: "info" });
    expect(res.status).toBe(200);
    expect(res.body.total).toBe(1);
    expect(res.body.items[0].message).toBe("Accepting json_lines connections.");
    expect(res.body.items[0].details).toEqual({ port: logstash.port });
  });

  it("answers 404 for unknown routes", async () => {
    const res = await request(app).get("/api/nope");
    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: "NOT_FOUND", message: "NOT_FOUND" });
  });
});
