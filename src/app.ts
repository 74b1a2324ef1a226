import { Hono } from "hono";
import { cors } from "hono/cors";
import { env } from "./config/env.js";
import { formatErrorResponse } from "./middleware/error-handler.js";
import { createRateLimitMiddleware } from "./middleware/rate-limit.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { createV1Router, type V1Services } from "./routes/v1.js";
import { logger } from "./utils/logger.js";

export interface CreateAppOptions extends V1Services {
  rateLimitWindowMs?: number;
  rateLimitMax?: number;
}

function isHealthy(status: ReturnType<V1Services["scheduler"]["status"]>): boolean {
  if (!status.isRunning || !status.lastErrorAt) return true;
  if (!status.lastCheckAt) return false;
  return Date.parse(status.lastCheckAt) >= Date.parse(status.lastErrorAt);
}

export function createApp(options: CreateAppOptions): Hono {
  const app = new Hono();

  app.use("*", requestIdMiddleware);
  app.use("*", async (c, next) => {
    const start = Date.now();
    await next();
    const requestId = c.res.headers.get("x-request-id") ?? c.req.header("x-request-id");
    logger.info("request", {
      requestId,
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - start,
    });
  });
  app.use(
    "*",
    cors({
      origin: env.CORS_ORIGIN,
      allowMethods: ["GET", "POST", "PUT", "DELETE", "OPTIONS"],
      allowHeaders: ["Content-Type", "X-Request-Id"],
    }),
  );

  app.use(
    "/api/*",
    createRateLimitMiddleware({
      windowMs: options.rateLimitWindowMs ?? env.RATE_LIMIT_WINDOW_MS,
      max: options.rateLimitMax ?? env.RATE_LIMIT_MAX,
      scope: "api",
    }),
  );

  app.get("/healthz", (c) => {
    const status = options.scheduler.status();
    const healthy = isHealthy(status);
    const statusCode = healthy ? 200 : 503;
    return c.json(
      {
        code: statusCode,
        message: healthy ? "ok" : "degraded",
        data: {
          running: status.isRunning,
          lastCheckAt: status.lastCheckAt ?? null,
          lastError: status.lastError ?? null,
        },
      },
      statusCode,
    );
  });

  app.route("/api/v1", createV1Router(options));

  app.notFound((c) => {
    return c.json(
      {
        code: 404,
        message: "Not Found",
      },
      404,
    );
  });

  app.onError((error, c) => formatErrorResponse(error, c));

  return app;
}
