import express from "express";
import { z } from "zod";
import { LogAssertionError } from "../errors/fixtureErrors.js";
import type { LogBuffer } from "../logging/logBuffer.js";
import { isKnownLevel } from "../records/levels.js";
import type { FakeLogstashService } from "../service/fakeLogstashService.js";
import { errorMiddleware } from "./errorMiddleware.js";
import { httpError } from "./httpErrors.js";

export type InspectionServices = {
  logstash: FakeLogstashService;
  diagnostics: LogBuffer;
};

const LevelName = z.string().refine(isKnownLevel, "unknown log level");

const PageQuery = {
  search: z.string().optional(),
  page: z.coerce.number().int().min(1).default(1),
  pageSize: z.coerce.number().int().min(1).max(200).default(50),
};

/**
 * HTTP view of what the fake service recorded, for clients outside the test process.
 */
export function createInspectionApp(services: InspectionServices): express.Express {
  const { logstash, diagnostics } = services;
  const app = express();

  app.get("/healthz", (_req, res) => {
    res.json({ ok: true, alive: logstash.isAlive(), port: logstash.port });
  });

  app.get("/api/records", (req, res) => {
    const query = z.object({ level: LevelName.optional(), ...PageQuery }).parse(req.query);
    const { items, total } = logstash.queryRecords({
      threshold: query.level,
      search: query.search,
      page: query.page,
      pageSize: query.pageSize,
    });
    res.json({ items, total, page: query.page, pageSize: query.pageSize });
  });

  app.delete("/api/records", (_req, res) => {
    const cleared = logstash.clearRecords();
    res.json({ ok: true, cleared });
  });

  app.get("/api/records/assert", (req, res) => {
    const query = z
      .object({
        level: LevelName,
        expect: z.enum(["some", "none"]).default("some"),
      })
      .parse(req.query);
    try {
      if (query.expect === "some") logstash.assertHasAtLeast(query.level);
      else logstash.assertNoneAtLeast(query.level);
    } catch (e: unknown) {
      if (e instanceof LogAssertionError) throw httpError(409, "ASSERTION_FAILED", e.message);
      throw e;
    }
    res.json({ ok: true });
  });

  app.get("/api/diagnostics", (req, res) => {
    const query = z
      .object({ level: z.enum(["debug", "info", "warn", "error"]).optional(), ...PageQuery })
      .parse(req.query);
    const { items, total } = diagnostics.query({
      filter: { level: query.level, search: query.search },
      page: query.page,
      pageSize: query.pageSize,
    });
    res.json({ items, total, page: query.page, pageSize: query.pageSize });
  });

  app.use((_req, _res, next) => next(httpError(404, "NOT_FOUND")));
  app.use(errorMiddleware());

  return app;
}
