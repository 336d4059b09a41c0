// src/middleware/errors.ts
import type { ErrorRequestHandler, RequestHandler } from "express";
import { ZodError } from "zod";
import { AppError, ValidationError } from "../errors";
import { logger } from "../logger";

function zodFields(err: ZodError) {
  const fields: Record<string, string[]> = {};
  for (const issue of err.issues) {
    const path = issue.path.join(".") || "_";
    (fields[path] ??= []).push(issue.message);
  }
  return fields;
}

export const notFound: RequestHandler = (req, res) => {
  res.status(404).json({ error: "route_not_found", detail: `${req.method} ${req.path}` });
};

export const errorHandler: ErrorRequestHandler = (err, req, res, _next) => {
  if (err instanceof ZodError) {
    return res.status(400).json({ error: "validation_error", fields: zodFields(err) });
  }
  if (err instanceof ValidationError) {
    return res.status(err.status).json({ error: err.code, detail: err.message, fields: err.fields });
  }
  if (err instanceof AppError) {
    const body: Record<string, unknown> = { error: err.code, detail: err.message };
    if ("retryable" in err) body.retryable = err.retryable;
    return res.status(err.status).json(body);
  }
  // malformed JSON body from express.json()
  if (err instanceof SyntaxError && "body" in err) {
    return res.status(400).json({ error: "invalid_json" });
  }
  logger.error({ err, method: req.method, path: req.path }, "unhandled error");
  res.status(500).json({ error: "internal_error" });
};
