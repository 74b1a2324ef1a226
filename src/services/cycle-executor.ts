import { classifyError, describeError, MissingCredentialError } from "../domain/errors.js";
import { assertRepliesPopulated, hasAccountReplied, isOwnComment } from "../domain/reply-state.js";
import { isValidRule, matches } from "../domain/rule.js";
import type { Comment, ContentItem } from "../types/content.js";
import type { CycleOutcome, CycleSummary, ErrorKind, Rule, TargetId } from "../types/monitoring.js";
import { logger } from "../utils/logger.js";
import { withTimeout } from "../utils/timeout.js";
import type { ContentApi } from "./content-api.js";
import type { CredentialProvider } from "./credentials.js";
import type { CycleTrigger, MonitoringEventBus } from "./event-bus.js";
import type { MonitoringStatisticsTracker } from "./monitoring-stats.js";
import type { RuleStore } from "./rule-store.js";

const log = logger.child("cycle");

const DEFAULT_CALL_TIMEOUT_MS = 15_000;

export interface MonitoringCycleExecutorOptions {
  contentApi: ContentApi;
  ruleStore: RuleStore;
  credentials: CredentialProvider;
  stats: MonitoringStatisticsTracker;
  events: MonitoringEventBus;
  /** Upper bound for each collaborator call. */
  callTimeoutMs?: number;
  nowFn?: () => number;
}

type Tally = Omit<CycleSummary, "startedAt" | "durationMs">;

function emptyTally(): Tally {
  return {
    rules: 0,
    enabledRules: 0,
    contentItems: 0,
    processedItems: 0,
    failedItems: 0,
    comments: 0,
    replies: 0,
    privateReplies: 0,
    failedReplies: 0,
    apiCalls: 0,
  };
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function logCycleFailure(kind: ErrorKind, context: Record<string, unknown>): void {
  if (kind === "rate_limit") {
    log.warn("monitor_cycle_rate_limited", context);
    return;
  }
  log.error(kind === "authentication" ? "monitor_cycle_auth_failed" : "monitor_cycle_failed", context);
}

/**
 * One pass of "check everything, reply where due". `runCycle` never throws:
 * failures end up in the statistics and in the returned outcome.
 */
export class MonitoringCycleExecutor {
  private readonly contentApi: ContentApi;
  private readonly ruleStore: RuleStore;
  private readonly credentials: CredentialProvider;
  private readonly stats: MonitoringStatisticsTracker;
  private readonly events: MonitoringEventBus;
  private readonly callTimeoutMs: number;
  private readonly nowFn: () => number;

  constructor(options: MonitoringCycleExecutorOptions) {
    this.contentApi = options.contentApi;
    this.ruleStore = options.ruleStore;
    this.credentials = options.credentials;
    this.stats = options.stats;
    this.events = options.events;
    this.callTimeoutMs = options.callTimeoutMs ?? DEFAULT_CALL_TIMEOUT_MS;
    this.nowFn = options.nowFn ?? (() => Date.now());
  }

  private call<T>(tally: Tally, label: string, task: () => Promise<T>): Promise<T> {
    tally.apiCalls += 1;
    return withTimeout(label, this.callTimeoutMs, task);
  }

  async runCycle(trigger: CycleTrigger = "manual"): Promise<CycleOutcome> {
    const startedAt = this.nowFn();
    this.events.emit({ type: "cycle:started", trigger });

    try {
      const summary = await this.execute(startedAt);
      await this.stats.recordCheck();
      await this.stats.recordCycle(summary);
      log.info("monitor_cycle_ok", { trigger, ...summary });
      const outcome = { ok: true, summary } as const;
      this.events.emit({ type: "cycle:completed", trigger, outcome });
      return outcome;
    } catch (error) {
      const kind = classifyError(error);
      const message = describeError(kind, error);
      logCycleFailure(kind, {
        trigger,
        kind,
        durationMs: this.nowFn() - startedAt,
        error: messageOf(error),
      });
      await this.stats.recordError(message);
      const outcome = { ok: false, kind, message } as const;
      this.events.emit({ type: "cycle:failed", trigger, outcome });
      return outcome;
    }
  }

  private async execute(startedAt: number): Promise<CycleSummary> {
    if (!(await this.credentials.hasUsableCredential())) {
      throw new MissingCredentialError();
    }

    const tally = emptyTally();
    const rules = await this.ruleStore.loadRules();
    const active = this.selectActiveRules(rules);
    tally.rules = rules.size;
    tally.enabledRules = active.size;

    if (active.size === 0) {
      log.debug("monitor_cycle_no_rules", { rules: rules.size });
    } else {
      const items = await this.call(tally, "list_content_items", () => this.contentApi.listContentItems());
      tally.contentItems = items.length;

      const targets = items.flatMap((item) => {
        const rule = active.get(item.id);
        return rule ? [{ item, rule }] : [];
      });
      tally.processedItems = targets.length;

      const settled = await Promise.allSettled(targets.map(({ item, rule }) => this.processItem(item, rule, tally)));
      settled.forEach((result, index) => {
        if (result.status === "fulfilled") return;
        tally.failedItems += 1;
        const kind = classifyError(result.reason);
        log.warn("monitor_item_failed", {
          contentItemId: targets[index]?.item.id,
          kind,
          error: messageOf(result.reason),
        });
      });
    }

    return {
      startedAt: new Date(startedAt).toISOString(),
      durationMs: this.nowFn() - startedAt,
      ...tally,
    };
  }

  private selectActiveRules(rules: Map<TargetId, Rule>): Map<TargetId, Rule> {
    const active = new Map<TargetId, Rule>();
    for (const [targetId, rule] of rules) {
      if (!rule.enabled) continue;
      if (!isValidRule(rule)) {
        log.warn("monitor_rule_invalid", { targetId, reason: "empty reply text" });
        continue;
      }
      active.set(targetId, rule);
    }
    return active;
  }

  private async processItem(item: ContentItem, rule: Rule, tally: Tally): Promise<void> {
    const comments = await this.call(tally, `list_comments:${item.id}`, () => this.contentApi.listComments(item.id));
    tally.comments += comments.length;
    log.debug("monitor_item_comments", { contentItemId: item.id, comments: comments.length });

    // in API order; each reply finishes before the next comment is looked at
    for (const comment of comments) {
      if (!this.shouldReply(item, comment, rule)) continue;
      await this.reply(item, comment, rule, tally);
    }
  }

  private shouldReply(item: ContentItem, comment: Comment, rule: Rule): boolean {
    const accountId = this.contentApi.accountId;
    try {
      assertRepliesPopulated(comment);
    } catch (error) {
      log.error("monitor_comment_replies_missing", {
        contentItemId: item.id,
        commentId: comment.id,
        error: messageOf(error),
      });
      return false;
    }
    if (isOwnComment(comment, accountId)) return false;
    if (hasAccountReplied(comment, accountId)) return false;
    return matches(rule, comment.text);
  }

  private async reply(item: ContentItem, comment: Comment, rule: Rule, tally: Tally): Promise<void> {
    try {
      await this.call(tally, `post_reply:${comment.id}`, () => this.contentApi.postReply(comment.id, rule.replyText));
    } catch (error) {
      tally.failedReplies += 1;
      log.error("monitor_reply_failed", {
        contentItemId: item.id,
        commentId: comment.id,
        kind: classifyError(error),
        error: messageOf(error),
      });
      this.events.emit({
        type: "reply:failed",
        contentItemId: item.id,
        commentId: comment.id,
        private: false,
        error: messageOf(error),
      });
      return;
    }

    tally.replies += 1;
    await this.stats.recordReply();
    log.info("monitor_reply_sent", { contentItemId: item.id, commentId: comment.id });
    this.events.emit({ type: "reply:sent", contentItemId: item.id, commentId: comment.id, private: false });

    const privateText = rule.privateReplyText;
    if (!privateText) return;

    try {
      await this.call(tally, `post_private_message:${comment.id}`, () =>
        this.contentApi.postPrivateMessage(comment.id, privateText),
      );
    } catch (error) {
      log.warn("monitor_private_reply_failed", {
        contentItemId: item.id,
        commentId: comment.id,
        error: messageOf(error),
      });
      this.events.emit({
        type: "reply:failed",
        contentItemId: item.id,
        commentId: comment.id,
        private: true,
        error: messageOf(error),
      });
      return;
    }

    tally.privateReplies += 1;
    await this.stats.recordPrivateReply();
    this.events.emit({ type: "reply:sent", contentItemId: item.id, commentId: comment.id, private: true });
  }
}
