// server/src/middlewares/error.ts
import type { ErrorRequestHandler } from "express";
import { ZodError } from "zod";

import { logger } from "../config/logger.js";
import { isDomainError, type DomainErrorKind } from "../domain/index.js";

/** Ownership failures are reported as not-found to keep the public contract. */
export function httpStatusFor(kind: DomainErrorKind): { status: number; code: string } {
  switch (kind) {
    case "NOT_FOUND":
    case "ACCESS_DENIED":
      return { status: 404, code: "NOT_FOUND" };
    case "INVALID_REQUEST":
      return { status: 400, code: "INVALID_REQUEST" };
    case "UNSUPPORTED_STATE":
      return { status: 400, code: "UNSUPPORTED_STATE" };
  }
}

const CLIENT_CODES: Record<number, string> = {
  400: "BAD_REQUEST",
  403: "FORBIDDEN",
  413: "PAYLOAD_TOO_LARGE",
  415: "UNSUPPORTED_MEDIA_TYPE",
};

/** 4xx raised by express/body-parser or tagged via `Object.assign(err, { status, code })`. */
function clientErrorOf(err: unknown): { status: number; code: string } | null {
  if (!err || typeof err !== "object" || !("status" in err)) return null;
  const { status } = err;
  if (typeof status !== "number" || status < 400 || status > 499) return null;
  const code = "code" in err && typeof err.code === "string" ? err.code : CLIENT_CODES[status] ?? "CLIENT_ERROR";
  return { status, code };
}

export const errorHandler: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
  const requestId: unknown = res.locals.requestId;

  if (err instanceof ZodError) {
    const details = err.flatten();
    logger.warn("Validation error", { requestId, details });
    return res
      .status(422)
      .json({ error: { code: "UNPROCESSABLE_ENTITY", message: "Invalid request", details } });
  }

  // already logged by the service
  if (isDomainError(err)) {
    const { status, code } = httpStatusFor(err.kind);
    return res.status(status).json({ error: { code, message: err.message, requestId } });
  }

  const message = err instanceof Error ? err.message : "Unhandled error";

  const client = clientErrorOf(err);
  if (client) {
    logger.warn(message, { requestId, ...client });
    return res
      .status(client.status)
      .json({ error: { code: client.code, message, requestId } });
  }

  // always log stack if present
  logger.error(message, {
    requestId,
    status: 500,
    code: "INTERNAL_ERROR",
    stack: err instanceof Error ? err.stack : undefined,
  });

  res.status(500).json({
    error: { code: "INTERNAL_ERROR", message: "Internal server error", requestId },
  });
};
