import { createRule, type RuleInput } from "../src/domain/rule.js";
import type { ContentApi } from "../src/services/content-api.js";
import type { CredentialProvider } from "../src/services/credentials.js";
import { createMonitoringEngine, type MonitoringEngine } from "../src/services/engine.js";
import { InMemoryRuleStore } from "../src/services/rule-store.js";
import { InMemoryStatisticsStore } from "../src/services/statistics-store.js";
import type { AccountInfo, Comment, ContentItem, PostResult } from "../src/types/content.js";
import type { PersistedMonitoringState } from "../src/types/monitoring.js";

export const ACCOUNT_ID = "page1";

export function makeComment(partial: Partial<Comment> & { id: string; text: string }): Comment {
  return {
    createdAt: "2026-01-01T00:00:00.000Z",
    nestedReplies: [],
    ...partial,
  };
}

export function makeItem(id: string): ContentItem {
  return { id, updatedAt: "2026-01-01T00:00:00.000Z" };
}

type Failure = Error | (() => Error);

function toError(failure: Failure): Error {
  return typeof failure === "function" ? failure() : failure;
}

/** In-process content source with scriptable failures and call recording. */
export class FakeContentApi implements ContentApi {
  readonly accountId: string;

  items: ContentItem[] = [];
  comments = new Map<string, Comment[]>();

  listItemsError?: Failure;
  commentErrors = new Map<string, Failure>();
  replyErrors = new Map<string, Failure>();
  privateErrors = new Map<string, Failure>();

  readonly replies: Array<{ commentId: string; text: string }> = [];
  readonly privateMessages: Array<{ commentId: string; text: string }> = [];
  listItemsCalls = 0;
  readonly listCommentsCalls: string[] = [];

  constructor(accountId = ACCOUNT_ID) {
    this.accountId = accountId;
  }

  withItem(id: string, comments: Comment[]): this {
    this.items.push(makeItem(id));
    this.comments.set(id, comments);
    return this;
  }

  async getAccountInfo(): Promise<AccountInfo> {
    return { id: this.accountId, name: "Test Page" };
  }

  async listContentItems(): Promise<ContentItem[]> {
    this.listItemsCalls += 1;
    if (this.listItemsError) throw toError(this.listItemsError);
    return [...this.items];
  }

  async listComments(contentItemId: string): Promise<Comment[]> {
    this.listCommentsCalls.push(contentItemId);
    const failure = this.commentErrors.get(contentItemId);
    if (failure) throw toError(failure);
    return [...(this.comments.get(contentItemId) ?? [])];
  }

  async postReply(commentId: string, text: string): Promise<PostResult> {
    const failure = this.replyErrors.get(commentId);
    if (failure) throw toError(failure);
    this.replies.push({ commentId, text });
    return { id: `${commentId}_reply` };
  }

  async postPrivateMessage(commentId: string, text: string): Promise<PostResult> {
    const failure = this.privateErrors.get(commentId);
    if (failure) throw toError(failure);
    this.privateMessages.push({ commentId, text });
    return { id: `${commentId}_pm` };
  }
}

export class ToggleCredentials implements CredentialProvider {
  constructor(public usable = true) {}

  hasUsableCredential(): boolean {
    return this.usable;
  }
}

export interface TestEngineOptions {
  api?: FakeContentApi;
  rules?: RuleInput[];
  state?: Partial<PersistedMonitoringState>;
  credentials?: ToggleCredentials;
  intervalSeconds?: number;
  callTimeoutMs?: number;
  nowFn?: () => number;
}

export interface TestEngine extends MonitoringEngine {
  api: FakeContentApi;
  ruleStore: InMemoryRuleStore;
  statisticsStore: InMemoryStatisticsStore;
  credentials: ToggleCredentials;
}

export function buildEngine(options: TestEngineOptions = {}): TestEngine {
  const api = options.api ?? new FakeContentApi();
  const ruleStore = new InMemoryRuleStore((options.rules ?? []).map(createRule));
  const statisticsStore = new InMemoryStatisticsStore(options.state);
  const credentials = options.credentials ?? new ToggleCredentials();
  const engine = createMonitoringEngine({
    contentApi: api,
    ruleStore,
    statisticsStore,
    credentials,
    intervalSeconds: options.intervalSeconds,
    callTimeoutMs: options.callTimeoutMs,
    nowFn: options.nowFn,
  });
  return { ...engine, api, ruleStore, statisticsStore, credentials };
}
