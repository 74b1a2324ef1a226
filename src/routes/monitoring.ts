import { Hono } from "hono";
import { z } from "zod";
import { AppError } from "../middleware/error-handler.js";
import type { MonitoringScheduler } from "../services/monitor-scheduler.js";
import type { MonitoringStatisticsTracker } from "../services/monitoring-stats.js";
import { MIN_INTERVAL_SECONDS } from "../types/monitoring.js";

const startSchema = z.object({
  intervalSeconds: z.number().int().positive().optional(),
});

const metricsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(1000).default(100),
});

const intervalSchema = z.object({
  intervalSeconds: z.number().int().positive(),
});

export function createMonitoringRouter(scheduler: MonitoringScheduler, stats: MonitoringStatisticsTracker): Hono {
  const app = new Hono();

  app.get("/status", (c) => {
    return c.json({ code: 200, message: "ok", data: scheduler.status() }, 200);
  });

  app.post("/start", async (c) => {
    const { intervalSeconds } = startSchema.parse(await c.req.json().catch(() => ({})));
    if (intervalSeconds !== undefined && intervalSeconds < MIN_INTERVAL_SECONDS) {
      throw new AppError(`Interval must be at least ${MIN_INTERVAL_SECONDS} seconds`, 400);
    }
    const firstCycleOk = await scheduler.start(intervalSeconds);
    return c.json({ code: 200, message: "ok", data: { firstCycleOk, status: scheduler.status() } }, 200);
  });

  app.post("/stop", async (c) => {
    await scheduler.stop();
    return c.json({ code: 200, message: "ok", data: scheduler.status() }, 200);
  });

  app.put("/interval", async (c) => {
    const { intervalSeconds } = intervalSchema.parse(await c.req.json().catch(() => ({})));
    const accepted = await scheduler.setInterval(intervalSeconds);
    if (!accepted) {
      throw new AppError(`Interval must be at least ${MIN_INTERVAL_SECONDS} seconds`, 400);
    }
    return c.json({ code: 200, message: "ok", data: scheduler.status() }, 200);
  });

  app.post("/trigger", async (c) => {
    const outcome = await scheduler.triggerNow();
    if (!outcome) {
      throw new AppError("Monitoring is not running", 409);
    }
    return c.json({ code: 200, message: "ok", data: outcome }, 200);
  });

  app.post("/reset", async (c) => {
    await stats.reset();
    return c.json({ code: 200, message: "ok", data: scheduler.status() }, 200);
  });

  app.get("/metrics", (c) => {
    const { limit } = metricsQuerySchema.parse({ limit: c.req.query("limit") });
    return c.json({ code: 200, message: "ok", data: stats.metrics(limit) }, 200);
  });

  app.delete("/metrics", async (c) => {
    const deleted = await stats.clearMetrics();
    return c.json({ code: 200, message: "ok", data: { deleted } }, 200);
  });

  return app;
}
