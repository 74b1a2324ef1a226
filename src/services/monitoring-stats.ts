import { aggregateCycles } from "../domain/cycle-metrics.js";
import {
  DEFAULT_CYCLE_HISTORY_LIMIT,
  type CycleMetrics,
  type CycleSummary,
  type MonitoringStatistics,
  type PersistedMonitoringState,
} from "../types/monitoring.js";
import { logger } from "../utils/logger.js";
import type { MonitoringEventBus } from "./event-bus.js";
import type { StatisticsStore } from "./statistics-store.js";

const log = logger.child("stats");

interface MonitoringStatisticsTrackerOptions {
  store: StatisticsStore;
  events: MonitoringEventBus;
  /** Cycle summaries retained for the metrics view. */
  historyLimit?: number;
  nowFn?: () => number;
}

/**
 * Owner of the one mutable statistics struct. Mutations run one at a time on
 * an internal queue, so a manual trigger racing a timer tick cannot drop an
 * increment, and each is written through to the store before the next starts.
 */
export class MonitoringStatisticsTracker {
  private readonly store: StatisticsStore;
  private readonly events: MonitoringEventBus;
  private readonly nowFn: () => number;
  private readonly historyLimit: number;

  private stats: MonitoringStatistics = {
    isRunning: false,
    totalChecks: 0,
    totalReplies: 0,
    totalPrivateReplies: 0,
  };

  private history: CycleSummary[] = [];

  private queue: Promise<void> = Promise.resolve();

  constructor(options: MonitoringStatisticsTrackerOptions) {
    this.store = options.store;
    this.events = options.events;
    this.nowFn = options.nowFn ?? (() => Date.now());
    this.historyLimit = Math.max(1, options.historyLimit ?? DEFAULT_CYCLE_HISTORY_LIMIT);
  }

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async persist(operation: string, write: () => Promise<void>): Promise<void> {
    try {
      await write();
    } catch (error) {
      // the in-memory figures stay authoritative for this process
      log.error("stats_persist_failed", {
        operation,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private publish(): void {
    this.events.emit({ type: "stats:updated", stats: this.snapshot() });
  }

  private nowIso(): string {
    return new Date(this.nowFn()).toISOString();
  }

  /** Restores counters from the store; returns the persisted schedule intent too. */
  load(): Promise<PersistedMonitoringState> {
    return this.serialize(async () => {
      const persisted = await this.store.loadStatistics();
      this.stats = {
        isRunning: this.stats.isRunning,
        lastCheckAt: persisted.lastCheckAt,
        totalChecks: persisted.totalChecks,
        totalReplies: persisted.totalReplies,
        totalPrivateReplies: persisted.totalPrivateReplies,
        lastError: persisted.lastError,
        lastErrorAt: persisted.lastErrorAt,
        lastCycle: persisted.lastCycle,
      };
      this.history = persisted.recentCycles.slice(-this.historyLimit);
      return persisted;
    });
  }

  snapshot(): MonitoringStatistics {
    return { ...this.stats, ...(this.stats.lastCycle ? { lastCycle: { ...this.stats.lastCycle } } : {}) };
  }

  /** One completed check: bump the counter, stamp the time, clear the last error. */
  recordCheck(): Promise<void> {
    return this.serialize(async () => {
      const at = this.nowIso();
      this.stats = {
        ...this.stats,
        totalChecks: this.stats.totalChecks + 1,
        lastCheckAt: at,
        lastError: undefined,
        lastErrorAt: undefined,
      };
      await this.persist("check", () => this.store.persistCheck(at));
      await this.persist("clear_error", () => this.store.clearError());
      this.publish();
    });
  }

  recordReply(): Promise<void> {
    return this.serialize(async () => {
      this.stats = { ...this.stats, totalReplies: this.stats.totalReplies + 1 };
      await this.persist("reply", () => this.store.persistReplyIncrement());
      this.publish();
    });
  }

  recordPrivateReply(): Promise<void> {
    return this.serialize(async () => {
      this.stats = { ...this.stats, totalPrivateReplies: this.stats.totalPrivateReplies + 1 };
      await this.persist("private_reply", () => this.store.persistPrivateReplyIncrement());
      this.publish();
    });
  }

  /** Overwrites the last error; counters are left alone. */
  recordError(message: string): Promise<void> {
    return this.serialize(async () => {
      const at = this.nowIso();
      this.stats = { ...this.stats, lastError: message, lastErrorAt: at };
      await this.persist("error", () => this.store.persistError(message, at));
      this.publish();
    });
  }

  recordCycle(summary: CycleSummary): Promise<void> {
    return this.serialize(async () => {
      this.stats = { ...this.stats, lastCycle: summary };
      this.history = [...this.history, summary].slice(-this.historyLimit);
      await this.persist("cycle", () => this.store.persistCycle(summary, this.historyLimit));
    });
  }

  /** The newest `limit` cycles plus sums over every retained cycle. */
  metrics(limit = this.historyLimit): CycleMetrics {
    return {
      rows: this.history
        .slice(-Math.max(1, limit))
        .reverse()
        .map((row) => ({ ...row })),
      aggregate: aggregateCycles(this.history),
    };
  }

  /** Drops the cycle history; resolves to the number of rows removed. */
  clearMetrics(): Promise<number> {
    return this.serialize(async () => {
      const removed = this.history.length;
      this.history = [];
      await this.persist("clear_cycles", () => this.store.clearCycles());
      return removed;
    });
  }

  setRunning(running: boolean): Promise<void> {
    return this.serialize(async () => {
      this.stats = { ...this.stats, isRunning: running };
      await this.persist("enabled_flag", () => this.store.persistEnabledFlag(running));
      this.publish();
    });
  }

  saveInterval(seconds: number): Promise<void> {
    return this.serialize(() => this.persist("interval", () => this.store.persistInterval(seconds)));
  }

  /** Operator reset: zeroes counters and error, keeps the running flag. */
  reset(): Promise<void> {
    return this.serialize(async () => {
      this.stats = {
        isRunning: this.stats.isRunning,
        totalChecks: 0,
        totalReplies: 0,
        totalPrivateReplies: 0,
      };
      await this.persist("reset", () => this.store.reset());
      this.publish();
    });
  }
}
