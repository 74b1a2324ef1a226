import fs from "node:fs/promises";
import path from "node:path";
import type { Redis } from "ioredis";
import type { CycleSummary, PersistedMonitoringState } from "../types/monitoring.js";
import { logger } from "../utils/logger.js";

const log = logger.child("stats_store");

/** Durable home of the monitoring counters and schedule intent. */
export interface StatisticsStore {
  loadStatistics(): Promise<PersistedMonitoringState>;
  persistCheck(at: string): Promise<void>;
  persistReplyIncrement(): Promise<void>;
  persistPrivateReplyIncrement(): Promise<void>;
  persistError(message: string, at: string): Promise<void>;
  clearError(): Promise<void>;
  persistEnabledFlag(enabled: boolean): Promise<void>;
  persistInterval(seconds: number): Promise<void>;
  /** Stores the cycle as the latest one and appends it to the history, keeping the newest `keep`. */
  persistCycle(summary: CycleSummary, keep: number): Promise<void>;
  clearCycles(): Promise<void>;
  /** Zeroes counters and the last error; schedule intent and cycle history stay. */
  reset(): Promise<void>;
}

export function emptyState(): PersistedMonitoringState {
  return {
    enabled: false,
    totalChecks: 0,
    totalReplies: 0,
    totalPrivateReplies: 0,
    recentCycles: [],
  };
}

export class InMemoryStatisticsStore implements StatisticsStore {
  protected state: PersistedMonitoringState;

  constructor(initial: Partial<PersistedMonitoringState> = {}) {
    this.state = { ...emptyState(), ...initial };
  }

  /** Called before every mutation; a rejection leaves the state untouched. */
  protected async prepare(): Promise<void> {}

  /** Called after every mutation; subclasses flush here. */
  protected async commit(): Promise<void> {}

  private async mutate(next: (state: PersistedMonitoringState) => PersistedMonitoringState): Promise<void> {
    await this.prepare();
    this.state = next(this.state);
    await this.commit();
  }

  async loadStatistics(): Promise<PersistedMonitoringState> {
    return { ...this.state };
  }

  async persistCheck(at: string): Promise<void> {
    await this.mutate((state) => ({ ...state, totalChecks: state.totalChecks + 1, lastCheckAt: at }));
  }

  async persistReplyIncrement(): Promise<void> {
    await this.mutate((state) => ({ ...state, totalReplies: state.totalReplies + 1 }));
  }

  async persistPrivateReplyIncrement(): Promise<void> {
    await this.mutate((state) => ({ ...state, totalPrivateReplies: state.totalPrivateReplies + 1 }));
  }

  async persistError(message: string, at: string): Promise<void> {
    await this.mutate((state) => ({ ...state, lastError: message, lastErrorAt: at }));
  }

  async clearError(): Promise<void> {
    await this.prepare();
    if (this.state.lastError === undefined && this.state.lastErrorAt === undefined) return;
    await this.mutate((state) => ({ ...state, lastError: undefined, lastErrorAt: undefined }));
  }

  async persistEnabledFlag(enabled: boolean): Promise<void> {
    await this.mutate((state) => ({ ...state, enabled }));
  }

  async persistInterval(seconds: number): Promise<void> {
    await this.mutate((state) => ({ ...state, intervalSeconds: seconds }));
  }

  async persistCycle(summary: CycleSummary, keep: number): Promise<void> {
    await this.mutate((state) => ({
      ...state,
      lastCycle: summary,
      recentCycles: [...state.recentCycles, summary].slice(-keep),
    }));
  }

  async clearCycles(): Promise<void> {
    await this.mutate((state) => ({ ...state, recentCycles: [] }));
  }

  async reset(): Promise<void> {
    await this.mutate((state) => ({
      ...emptyState(),
      enabled: state.enabled,
      intervalSeconds: state.intervalSeconds,
      recentCycles: state.recentCycles,
    }));
  }
}

interface StateFileShapeV1 {
  version: 1;
  updatedAt: string;
  state: PersistedMonitoringState;
}

function toCount(value: unknown): number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0 ? value : 0;
}

function toOptionalString(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function readCycleSummary(value: unknown): CycleSummary | undefined {
  if (!isRecord(value) || typeof value.startedAt !== "string") return undefined;
  return {
    startedAt: value.startedAt,
    durationMs: toCount(value.durationMs),
    rules: toCount(value.rules),
    enabledRules: toCount(value.enabledRules),
    contentItems: toCount(value.contentItems),
    processedItems: toCount(value.processedItems),
    failedItems: toCount(value.failedItems),
    comments: toCount(value.comments),
    replies: toCount(value.replies),
    privateReplies: toCount(value.privateReplies),
    failedReplies: toCount(value.failedReplies),
    apiCalls: toCount(value.apiCalls),
  };
}

function readCycleList(value: unknown): CycleSummary[] {
  if (!Array.isArray(value)) return [];
  return value.map(readCycleSummary).filter((row): row is CycleSummary => row !== undefined);
}

/** JSON.parse for fields written by another process; undefined when unreadable. */
function parseStoredJson(field: string, raw: string | undefined): unknown {
  if (raw === undefined) return undefined;
  try {
    return JSON.parse(raw);
  } catch (error) {
    log.warn("stats_field_unreadable", {
      field,
      error: error instanceof Error ? error.message : String(error),
    });
    return undefined;
  }
}

export function readPersistedState(value: unknown): PersistedMonitoringState {
  if (!isRecord(value)) return emptyState();
  const interval = value.intervalSeconds;
  return {
    enabled: value.enabled === true,
    ...(typeof interval === "number" && Number.isInteger(interval) ? { intervalSeconds: interval } : {}),
    lastCheckAt: toOptionalString(value.lastCheckAt),
    totalChecks: toCount(value.totalChecks),
    totalReplies: toCount(value.totalReplies),
    totalPrivateReplies: toCount(value.totalPrivateReplies),
    lastError: toOptionalString(value.lastError),
    lastErrorAt: toOptionalString(value.lastErrorAt),
    lastCycle: readCycleSummary(value.lastCycle),
    recentCycles: readCycleList(value.recentCycles),
  };
}

/** JSON file written through a temp file and rename after every mutation. */
export class FileBackedStatisticsStore extends InMemoryStatisticsStore {
  private readonly statePath: string;
  private readonly tmpPath: string;
  private loaded = false;

  constructor(statePath: string) {
    super();
    const absolute = path.isAbsolute(statePath) ? statePath : path.resolve(process.cwd(), statePath);
    this.statePath = absolute;
    this.tmpPath = `${absolute}.tmp`;
  }

  override async loadStatistics(): Promise<PersistedMonitoringState> {
    if (!this.loaded) {
      try {
        const raw = await fs.readFile(this.statePath, "utf8");
        const parsed: unknown = JSON.parse(raw);
        this.state = readPersistedState(isRecord(parsed) ? parsed.state : undefined);
      } catch (error) {
        if (!isRecord(error) || error.code !== "ENOENT") throw error;
      }
      this.loaded = true;
    }
    return super.loadStatistics();
  }

  // an unreadable file is never overwritten with counters that did not come from it
  protected override async prepare(): Promise<void> {
    if (!this.loaded) await this.loadStatistics();
  }

  protected override async commit(): Promise<void> {
    await fs.mkdir(path.dirname(this.statePath), { recursive: true });
    const payload: StateFileShapeV1 = {
      version: 1,
      updatedAt: new Date().toISOString(),
      state: this.state,
    };
    await fs.writeFile(this.tmpPath, `${JSON.stringify(payload, null, 2)}\n`, "utf8");
    await fs.rename(this.tmpPath, this.statePath);
  }
}

/** Decodes the Redis hash and cycle list; unreadable JSON fields are dropped. */
export function readRedisState(hash: Record<string, string>, cycles: readonly string[]): PersistedMonitoringState {
  return readPersistedState({
    enabled: hash.enabled === "true",
    intervalSeconds: hash.intervalSeconds ? Number.parseInt(hash.intervalSeconds, 10) : undefined,
    lastCheckAt: hash.lastCheckAt,
    totalChecks: Number.parseInt(hash.totalChecks ?? "0", 10),
    totalReplies: Number.parseInt(hash.totalReplies ?? "0", 10),
    totalPrivateReplies: Number.parseInt(hash.totalPrivateReplies ?? "0", 10),
    lastError: hash.lastError,
    lastErrorAt: hash.lastErrorAt,
    lastCycle: parseStoredJson("lastCycle", hash.lastCycle),
    recentCycles: cycles.map((row) => parseStoredJson("recentCycles", row)),
  });
}

/**
 * Redis hash per configuration scope. Counters use HINCRBY so two processes
 * sharing a scope never lose increments.
 */
export class RedisStatisticsStore implements StatisticsStore {
  private readonly key: string;
  private readonly cyclesKey: string;

  constructor(
    private readonly redis: Redis,
    prefix: string,
    scope = "default",
  ) {
    this.key = `${prefix}:monitor:${scope}`;
    this.cyclesKey = `${this.key}:cycles`;
  }

  async loadStatistics(): Promise<PersistedMonitoringState> {
    const [hash, cycles] = await Promise.all([
      this.redis.hgetall(this.key),
      this.redis.lrange(this.cyclesKey, 0, -1),
    ]);
    return readRedisState(hash, cycles);
  }

  async persistCheck(at: string): Promise<void> {
    await this.redis.hincrby(this.key, "totalChecks", 1);
    await this.redis.hset(this.key, "lastCheckAt", at);
  }

  async persistReplyIncrement(): Promise<void> {
    await this.redis.hincrby(this.key, "totalReplies", 1);
  }

  async persistPrivateReplyIncrement(): Promise<void> {
    await this.redis.hincrby(this.key, "totalPrivateReplies", 1);
  }

  async persistError(message: string, at: string): Promise<void> {
    await this.redis.hset(this.key, "lastError", message, "lastErrorAt", at);
  }

  async clearError(): Promise<void> {
    await this.redis.hdel(this.key, "lastError", "lastErrorAt");
  }

  async persistEnabledFlag(enabled: boolean): Promise<void> {
    await this.redis.hset(this.key, "enabled", String(enabled));
  }

  async persistInterval(seconds: number): Promise<void> {
    await this.redis.hset(this.key, "intervalSeconds", String(seconds));
  }

  async persistCycle(summary: CycleSummary, keep: number): Promise<void> {
    await this.redis
      .multi()
      .hset(this.key, "lastCycle", JSON.stringify(summary))
      .rpush(this.cyclesKey, JSON.stringify(summary))
      .ltrim(this.cyclesKey, -keep, -1)
      .exec();
  }

  async clearCycles(): Promise<void> {
    await this.redis.del(this.cyclesKey);
  }

  async reset(): Promise<void> {
    await this.redis.hdel(
      this.key,
      "totalChecks",
      "totalReplies",
      "totalPrivateReplies",
      "lastCheckAt",
      "lastError",
      "lastErrorAt",
      "lastCycle",
    );
  }
}
