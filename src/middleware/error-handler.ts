import type { Context } from "hono";
import { ZodError } from "zod";
import { logger } from "../utils/logger.js";

export class AppError extends Error {
  status: 400 | 404 | 409 | 422 | 500 | 502 | 503;

  constructor(message: string, status: AppError["status"] = 500) {
    super(message);
    this.name = "AppError";
    this.status = status;
  }
}

function describeZodError(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

export function formatErrorResponse(error: unknown, c: Context): Response {
  const requestId = c.res.headers.get("x-request-id") ?? c.req.header("x-request-id");

  if (error instanceof AppError) {
    logger.warn("request_failed", {
      requestId,
      status: error.status,
      path: c.req.path,
      message: error.message,
    });
    return c.json({ code: error.status, message: error.message }, error.status);
  }

  if (error instanceof ZodError) {
    const message = describeZodError(error);
    logger.warn("request_invalid", { requestId, path: c.req.path, message });
    return c.json({ code: 400, message }, 400);
  }

  const message = error instanceof Error ? error.message : "Internal Server Error";

  logger.error("unhandled_error", {
    requestId,
    path: c.req.path,
    message,
  });

  return c.json({ code: 500, message: "Internal Server Error" }, 500);
}
