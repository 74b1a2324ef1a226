import {
  DEFAULT_INTERVAL_SECONDS,
  MIN_INTERVAL_SECONDS,
  type CycleOutcome,
  type MonitoringStatus,
  type PersistedMonitoringState,
} from "../types/monitoring.js";
import { logger } from "../utils/logger.js";
import type { CycleTrigger, MonitoringEventBus } from "./event-bus.js";
import type { MonitoringStatisticsTracker } from "./monitoring-stats.js";
import { emptyState } from "./statistics-store.js";

const log = logger.child("scheduler");

export interface CycleRunner {
  runCycle(trigger: CycleTrigger): Promise<CycleOutcome>;
}

export interface MonitoringSchedulerOptions {
  executor: CycleRunner;
  stats: MonitoringStatisticsTracker;
  events: MonitoringEventBus;
  intervalSeconds?: number;
  nowFn?: () => number;
}

export type SchedulerState = "stopped" | "running";

export function isValidInterval(seconds: number): boolean {
  return Number.isFinite(seconds) && seconds >= MIN_INTERVAL_SECONDS;
}

/**
 * Drives the cycle executor on a fixed interval. Ticks are spaced from the
 * previous tick, not from cycle completion, so a slow cycle can overlap the
 * next one.
 */
export class MonitoringScheduler {
  private readonly executor: CycleRunner;
  private readonly stats: MonitoringStatisticsTracker;
  private readonly events: MonitoringEventBus;
  private readonly nowFn: () => number;

  private state: SchedulerState = "stopped";
  private intervalSeconds: number;
  private timer: ReturnType<typeof setInterval> | undefined;
  private nextRunAt: number | undefined;
  // bumped on every start/stop so a late cycle from an old run never re-arms
  private generation = 0;
  private ready: Promise<PersistedMonitoringState> | undefined;
  private readonly inFlight = new Set<Promise<CycleOutcome>>();

  constructor(options: MonitoringSchedulerOptions) {
    this.executor = options.executor;
    this.stats = options.stats;
    this.events = options.events;
    this.nowFn = options.nowFn ?? (() => Date.now());
    const initial = options.intervalSeconds ?? DEFAULT_INTERVAL_SECONDS;
    this.intervalSeconds = isValidInterval(initial) ? initial : DEFAULT_INTERVAL_SECONDS;
  }

  get isRunning(): boolean {
    return this.state === "running";
  }

  get interval(): number {
    return this.intervalSeconds;
  }

  private ensureLoaded(): Promise<PersistedMonitoringState> {
    this.ready ??= this.stats.load().catch((error: unknown) => {
      log.error("stats_load_failed", {
        error: error instanceof Error ? error.message : String(error),
      });
      return emptyState();
    });
    return this.ready;
  }

  /**
   * Restores the operator's last choice after a process restart: the saved
   * interval always, and a running schedule when it was left enabled.
   */
  async resume(options: { autostart?: boolean } = {}): Promise<boolean> {
    const persisted = await this.ensureLoaded();
    if (persisted.intervalSeconds !== undefined && isValidInterval(persisted.intervalSeconds)) {
      this.intervalSeconds = persisted.intervalSeconds;
    }
    if (!persisted.enabled && !options.autostart) {
      log.info("monitor_resume_skipped", { enabled: persisted.enabled });
      return false;
    }
    await this.start();
    return true;
  }

  /**
   * Runs one cycle right away, then arms the timer. Resolves to whether that
   * first cycle succeeded; the schedule stays armed either way.
   */
  async start(intervalSeconds?: number): Promise<boolean> {
    if (this.state === "running") return true;
    if (intervalSeconds !== undefined) {
      if (!isValidInterval(intervalSeconds)) {
        log.warn("monitor_interval_rejected", { intervalSeconds, minimum: MIN_INTERVAL_SECONDS });
        return false;
      }
      this.intervalSeconds = intervalSeconds;
    }

    this.state = "running";
    this.generation += 1;
    const generation = this.generation;

    // a stop() during any await below ends this start; stop owns the enabled flag from then on
    await this.ensureLoaded();
    if (!this.isCurrent(generation)) return this.abandonStart();
    if (intervalSeconds !== undefined) await this.stats.saveInterval(intervalSeconds);
    if (!this.isCurrent(generation)) return this.abandonStart();
    await this.stats.setRunning(true);
    if (!this.isCurrent(generation)) return this.abandonStart();
    log.info("monitor_started", { intervalSeconds: this.intervalSeconds });
    this.events.emit({ type: "scheduler:started", intervalSeconds: this.intervalSeconds });

    const outcome = await this.runCycle("start");

    if (this.isCurrent(generation) && this.timer === undefined) {
      this.arm();
    }
    return outcome.ok;
  }

  private isCurrent(generation: number): boolean {
    return this.generation === generation && this.state === "running";
  }

  private abandonStart(): false {
    log.info("monitor_start_abandoned", { reason: "stopped during start" });
    return false;
  }

  async stop(): Promise<void> {
    if (this.state === "stopped") return;
    this.disarm();
    this.state = "stopped";
    this.generation += 1;
    await this.stats.setRunning(false);
    log.info("monitor_stopped", { inFlight: this.inFlight.size });
    this.events.emit({ type: "scheduler:stopped" });
  }

  /** Process shutdown: like `stop`, but the persisted enabled flag is kept. */
  halt(): void {
    if (this.state === "stopped") return;
    this.disarm();
    this.state = "stopped";
    this.generation += 1;
    log.info("monitor_halted", { inFlight: this.inFlight.size });
  }

  /** Applies to the next tick; a running schedule is re-armed immediately. */
  async setInterval(seconds: number): Promise<boolean> {
    if (!isValidInterval(seconds)) {
      log.warn("monitor_interval_rejected", { intervalSeconds: seconds, minimum: MIN_INTERVAL_SECONDS });
      return false;
    }
    this.intervalSeconds = seconds;
    if (this.state === "running" && this.timer !== undefined) this.arm();
    await this.stats.saveInterval(seconds);
    log.info("monitor_interval_changed", { intervalSeconds: seconds, running: this.isRunning });
    this.events.emit({ type: "scheduler:interval_changed", intervalSeconds: seconds });
    return true;
  }

  /** Out-of-band cycle; `undefined` when the scheduler is stopped. */
  async triggerNow(): Promise<CycleOutcome | undefined> {
    if (this.state !== "running") return undefined;
    return this.runCycle("manual");
  }

  status(): MonitoringStatus {
    return {
      ...this.stats.snapshot(),
      isRunning: this.isRunning,
      intervalSeconds: this.intervalSeconds,
      ...(this.nextRunAt !== undefined ? { nextRunAt: new Date(this.nextRunAt).toISOString() } : {}),
    };
  }

  /** Resolves once every cycle started so far has finished. */
  async waitForIdle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled(Array.from(this.inFlight));
    }
  }

  private arm(): void {
    this.disarm();
    const intervalMs = this.intervalSeconds * 1000;
    const timer = setInterval(() => {
      this.nextRunAt = this.nowFn() + intervalMs;
      void this.runCycle("schedule");
    }, intervalMs);
    if (typeof timer.unref === "function") timer.unref();
    this.timer = timer;
    this.nextRunAt = this.nowFn() + intervalMs;
  }

  private disarm(): void {
    if (this.timer !== undefined) clearInterval(this.timer);
    this.timer = undefined;
    this.nextRunAt = undefined;
  }

  private runCycle(trigger: CycleTrigger): Promise<CycleOutcome> {
    const run = this.executor.runCycle(trigger).catch((error: unknown): CycleOutcome => {
      const message = error instanceof Error ? error.message : String(error);
      log.error("monitor_cycle_crashed", { trigger, error: message });
      return { ok: false, kind: "unclassified", message };
    });
    this.inFlight.add(run);
    void run.finally(() => this.inFlight.delete(run));
    return run;
  }
}
