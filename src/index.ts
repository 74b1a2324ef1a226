import { serve } from "@hono/node-server";
import { Redis } from "ioredis";
import { createApp } from "./app.js";
import { env } from "./config/env.js";
import { createContentApi } from "./services/content-api.js";
import { StaticCredentialProvider } from "./services/credentials.js";
import { createMonitoringEngine } from "./services/engine.js";
import { FileBackedRuleStore } from "./services/rule-store.js";
import {
  FileBackedStatisticsStore,
  RedisStatisticsStore,
  type StatisticsStore,
} from "./services/statistics-store.js";
import { logger, setLogLevel } from "./utils/logger.js";

setLogLevel(env.LOG_LEVEL);

function createStatisticsStore(): StatisticsStore {
  if (env.USE_REDIS && env.REDIS_URL) {
    const redis = new Redis(env.REDIS_URL, { maxRetriesPerRequest: 1 });
    redis.on("error", (error: unknown) => {
      logger.warn("redis_error", {
        message: error instanceof Error ? error.message : String(error),
      });
    });
    return new RedisStatisticsStore(redis, env.REDIS_PREFIX, env.PAGE_ID || "default");
  }
  return new FileBackedStatisticsStore(env.STATE_PATH);
}

const contentApi = createContentApi({
  useMockData: env.USE_MOCK_DATA,
  graph: {
    baseUrl: env.GRAPH_API_BASE_URL,
    version: env.GRAPH_API_VERSION,
    pageId: env.PAGE_ID,
    accessToken: env.ACCESS_TOKEN,
    timeoutMs: env.REQUEST_TIMEOUT_MS,
    reelsLimit: env.REELS_LIMIT,
    commentsLimit: env.COMMENTS_LIMIT,
    repliesLimit: env.REPLIES_LIMIT,
  },
});

const ruleStore = new FileBackedRuleStore(env.RULES_PATH);

const engine = createMonitoringEngine({
  contentApi,
  ruleStore,
  statisticsStore: createStatisticsStore(),
  credentials: new StaticCredentialProvider({
    accessToken: env.ACCESS_TOKEN,
    pageId: env.PAGE_ID,
    mock: env.USE_MOCK_DATA,
  }),
  intervalSeconds: env.MONITOR_INTERVAL_SECONDS,
  // leave headroom over the client's own request timeout
  callTimeoutMs: env.REQUEST_TIMEOUT_MS + 1000,
  cycleHistoryLimit: env.METRICS_HISTORY_LIMIT,
});

engine.events.on("cycle:failed", (event) => {
  if (event.outcome.kind === "authentication") {
    logger.error("monitor_credential_rejected", { message: event.outcome.message });
  }
});

const app = createApp({
  scheduler: engine.scheduler,
  stats: engine.stats,
  ruleStore,
  contentApi,
});

const server = serve(
  {
    fetch: app.fetch,
    port: env.PORT,
  },
  () => {
    logger.info("server_started", {
      port: env.PORT,
      env: env.NODE_ENV,
      mock: env.USE_MOCK_DATA,
    });
  },
);

server.on("error", (error) => {
  logger.error("server_start_failed", {
    port: env.PORT,
    env: env.NODE_ENV,
    error: error instanceof Error ? error.message : String(error),
  });
});

engine.scheduler.resume({ autostart: env.MONITOR_AUTOSTART }).catch((error: unknown) => {
  logger.error("monitor_resume_failed", {
    error: error instanceof Error ? error.message : String(error),
  });
});

async function shutdown(signal: string): Promise<void> {
  logger.info("shutdown", { signal });
  // stop ticking but leave the persisted intent alone so a restart resumes
  engine.scheduler.halt();
  await engine.scheduler.waitForIdle();
  server.close();
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      logger.error("shutdown_failed", {
        error: error instanceof Error ? error.message : String(error),
      });
      process.exitCode = 1;
    });
  });
}
