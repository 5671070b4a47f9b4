/**
 * Global error boundary - catches all unhandled errors.
 * Every thrown error is logged with its request id and answered with JSON.
 */
import type { ErrorHandler } from "hono";
import { HTTPException } from "hono/http-exception";

import { createLogger } from "../logger.js";

const log = createLogger("api");

/**
 * Global error handler for Hono.
 * Logs errors with context and returns the API's error shape.
 */
export const errorHandler: ErrorHandler = (err, c) => {
  const requestId = c.get("requestId") ?? "unknown";

  if (err instanceof HTTPException) {
    log.warn(
      { requestId, status: err.status, error: err.message, path: c.req.path },
      "HTTP exception",
    );
    return c.json(
      { error: { type: "HTTP_ERROR", message: err.message }, requestId },
      err.status,
    );
  }

  log.error(
    {
      operation: "unhandledError",
      requestId,
      error: err.message,
      stack: err.stack,
      path: c.req.path,
      method: c.req.method,
    },
    "❌ Unhandled error",
  );

  // Don't expose internal errors in production
  const message =
    process.env.NODE_ENV === "production"
      ? "Internal server error"
      : err.message;

  return c.json(
    {
      error: { type: "INTERNAL", message },
      requestId,
    },
    500,
  );
};
