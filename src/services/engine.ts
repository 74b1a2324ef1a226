import type { ContentApi } from "./content-api.js";
import type { CredentialProvider } from "./credentials.js";
import { MonitoringCycleExecutor } from "./cycle-executor.js";
import { MonitoringEventBus } from "./event-bus.js";
import { MonitoringScheduler } from "./monitor-scheduler.js";
import { MonitoringStatisticsTracker } from "./monitoring-stats.js";
import type { RuleStore } from "./rule-store.js";
import type { StatisticsStore } from "./statistics-store.js";

export interface MonitoringEngineOptions {
  contentApi: ContentApi;
  ruleStore: RuleStore;
  statisticsStore: StatisticsStore;
  credentials: CredentialProvider;
  intervalSeconds?: number;
  callTimeoutMs?: number;
  cycleHistoryLimit?: number;
  nowFn?: () => number;
}

export interface MonitoringEngine {
  events: MonitoringEventBus;
  stats: MonitoringStatisticsTracker;
  executor: MonitoringCycleExecutor;
  scheduler: MonitoringScheduler;
}

export function createMonitoringEngine(options: MonitoringEngineOptions): MonitoringEngine {
  const events = new MonitoringEventBus();
  const stats = new MonitoringStatisticsTracker({
    store: options.statisticsStore,
    events,
    historyLimit: options.cycleHistoryLimit,
    nowFn: options.nowFn,
  });
  const executor = new MonitoringCycleExecutor({
    contentApi: options.contentApi,
    ruleStore: options.ruleStore,
    credentials: options.credentials,
    stats,
    events,
    callTimeoutMs: options.callTimeoutMs,
    nowFn: options.nowFn,
  });
  const scheduler = new MonitoringScheduler({
    executor,
    stats,
    events,
    intervalSeconds: options.intervalSeconds,
    nowFn: options.nowFn,
  });
  return { events, stats, executor, scheduler };
}
