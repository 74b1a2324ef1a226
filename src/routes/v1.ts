import { Hono } from "hono";
import type { ContentApi } from "../services/content-api.js";
import type { MonitoringScheduler } from "../services/monitor-scheduler.js";
import type { MonitoringStatisticsTracker } from "../services/monitoring-stats.js";
import type { RuleStore } from "../services/rule-store.js";
import { createContentRouter } from "./content.js";
import { createMonitoringRouter } from "./monitoring.js";
import { createRulesRouter } from "./rules.js";

export interface V1Services {
  scheduler: MonitoringScheduler;
  stats: MonitoringStatisticsTracker;
  ruleStore: RuleStore;
  contentApi: ContentApi;
}

export function createV1Router(services: V1Services): Hono {
  const app = new Hono();

  app.route("/monitoring", createMonitoringRouter(services.scheduler, services.stats));
  app.route("/rules", createRulesRouter(services.ruleStore));
  app.route("/content", createContentRouter(services.contentApi));

  return app;
}
