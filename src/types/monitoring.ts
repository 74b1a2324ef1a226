import type { ContentItemId } from "./content.js";

export type TargetId = ContentItemId;

export interface Rule {
  readonly targetId: TargetId;
  readonly keywords: readonly string[];
  readonly replyText: string;
  readonly privateReplyText?: string;
  readonly enabled: boolean;
}

export type ErrorKind = "authentication" | "rate_limit" | "unclassified";

export interface CycleSummary {
  startedAt: string;
  durationMs: number;
  rules: number;
  enabledRules: number;
  contentItems: number;
  processedItems: number;
  failedItems: number;
  comments: number;
  replies: number;
  privateReplies: number;
  failedReplies: number;
  /** Content API calls made during the cycle, failed ones included. */
  apiCalls: number;
}

/** Sums over the retained cycle history. */
export interface CycleAggregate {
  rows: number;
  contentItems: number;
  processedItems: number;
  comments: number;
  replies: number;
  privateReplies: number;
  failedReplies: number;
  apiCalls: number;
  durationMs: number;
}

export interface CycleMetrics {
  /** Newest first. */
  rows: CycleSummary[];
  aggregate: CycleAggregate;
}

export type CycleOutcome =
  | { ok: true; summary: CycleSummary }
  | { ok: false; kind: ErrorKind; message: string };

export interface MonitoringStatistics {
  isRunning: boolean;
  lastCheckAt?: string;
  totalChecks: number;
  totalReplies: number;
  totalPrivateReplies: number;
  lastError?: string;
  lastErrorAt?: string;
  lastCycle?: CycleSummary;
}

/** What survives a restart: counters plus the operator's schedule intent. */
export interface PersistedMonitoringState {
  enabled: boolean;
  intervalSeconds?: number;
  lastCheckAt?: string;
  totalChecks: number;
  totalReplies: number;
  totalPrivateReplies: number;
  lastError?: string;
  lastErrorAt?: string;
  lastCycle?: CycleSummary;
  /** Oldest first, bounded by the tracker's history limit. */
  recentCycles: CycleSummary[];
}

export interface MonitoringStatus extends MonitoringStatistics {
  intervalSeconds: number;
  nextRunAt?: string;
}

export const MIN_INTERVAL_SECONDS = 60;
export const DEFAULT_INTERVAL_SECONDS = 300;
export const DEFAULT_CYCLE_HISTORY_LIMIT = 200;
