import type { ErrorRequestHandler } from "express";
import { ZodError } from "zod";
import { FixtureError } from "../errors/fixtureErrors.js";
import { isHttpError } from "./httpErrors.js";

/**
 * Map thrown errors onto JSON responses.
 */
export function errorMiddleware(): ErrorRequestHandler {
  return (err: unknown, _req, res, _next) => {
    void _next;
    if (err instanceof ZodError) {
      res.status(400).json({ error: "BAD_REQUEST", issues: err.issues });
      return;
    }
    if (isHttpError(err)) {
      res.status(err.status).json({ error: err.code, message: err.message });
      return;
    }
    if (err instanceof FixtureError) {
      res.status(400).json({ error: err.code, message: err.message });
      return;
    }
    const message = err instanceof Error ? err.message : String(err);
    res.status(500).json({ error: "INTERNAL", message });
  };
}
