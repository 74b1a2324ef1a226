import { ContentApiError } from "../domain/errors.js";
import type { AccountInfo, Comment, ContentItem, PostResult } from "../types/content.js";
import { logger } from "../utils/logger.js";
import type { ContentApi } from "./content-api.js";

const log = logger.child("mock_api");

export const MOCK_ACCOUNT: AccountInfo = { id: "mock-page", name: "Demo Page" };

interface MockComment {
  id: string;
  text: string;
  authorId?: string;
  authorName?: string;
  minutesAgo: number;
}

const SEED: Array<{ item: { id: string; description?: string; hoursAgo: number }; comments: MockComment[] }> = [
  {
    item: { id: "1001", description: "Welcome to the channel!", hoursAgo: 2 },
    comments: [
      { id: "c1001", text: "Great content! Keep it up!", authorId: "u1", authorName: "Sam", minutesAgo: 30 },
      { id: "c1002", text: "Love this!", authorId: "u2", authorName: "Robin", minutesAgo: 60 },
      { id: "c1003", text: "Thanks for sharing", authorId: "u3", authorName: "Alex", minutesAgo: 120 },
    ],
  },
  {
    item: { id: "1002", description: "Behind the scenes.", hoursAgo: 5 },
    comments: [
      { id: "c2001", text: "Amazing behind the scenes!", authorId: "u4", minutesAgo: 180 },
      { id: "c2002", text: "hello world", minutesAgo: 240 },
    ],
  },
  {
    item: { id: "1003", description: "Quick product tutorial.", hoursAgo: 24 },
    comments: [{ id: "c3001", text: "Very helpful tutorial, thank you!", authorId: "u6", minutesAgo: 1440 }],
  },
  { item: { id: "1004", hoursAgo: 72 }, comments: [] },
];

export interface MockContentApiOptions {
  nowFn?: () => number;
  /** Artificial latency per call, in ms. */
  delayMs?: number;
}

function wait(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * In-process content source for demos and local runs. Posted replies are
 * appended to the comment's thread so later cycles see them.
 */
export class MockContentApi implements ContentApi {
  readonly accountId = MOCK_ACCOUNT.id;

  private readonly items: ContentItem[];

  private readonly comments = new Map<string, Comment[]>();

  private readonly delayMs: number;

  private readonly nowFn: () => number;

  private replySeq = 0;

  readonly privateMessages: Array<{ commentId: string; text: string }> = [];

  constructor(options: MockContentApiOptions = {}) {
    this.nowFn = options.nowFn ?? (() => Date.now());
    this.delayMs = options.delayMs ?? 0;
    const now = this.nowFn();
    this.items = SEED.map(({ item }) => ({
      id: item.id,
      description: item.description,
      updatedAt: new Date(now - item.hoursAgo * 3_600_000).toISOString(),
    }));
    for (const { item, comments } of SEED) {
      this.comments.set(
        item.id,
        comments.map((c) => ({
          id: c.id,
          text: c.text,
          authorId: c.authorId,
          authorName: c.authorName,
          createdAt: new Date(now - c.minutesAgo * 60_000).toISOString(),
          nestedReplies: [],
        })),
      );
    }
  }

  private async pause(): Promise<void> {
    if (this.delayMs > 0) await wait(this.delayMs);
  }

  private findComment(commentId: string): Comment {
    for (const list of this.comments.values()) {
      const found = list.find((comment) => comment.id === commentId);
      if (found) return found;
    }
    throw new ContentApiError(`Comment ${commentId} does not exist`, { status: 404 });
  }

  async getAccountInfo(): Promise<AccountInfo> {
    await this.pause();
    return { ...MOCK_ACCOUNT };
  }

  async listContentItems(): Promise<ContentItem[]> {
    await this.pause();
    log.debug("mock_list_items", { count: this.items.length });
    return this.items.map((item) => ({ ...item }));
  }

  async listComments(contentItemId: string): Promise<Comment[]> {
    await this.pause();
    const list = this.comments.get(contentItemId) ?? [];
    return list.map((comment) => ({ ...comment, nestedReplies: [...comment.nestedReplies] }));
  }

  async postReply(commentId: string, text: string): Promise<PostResult> {
    await this.pause();
    const comment = this.findComment(commentId);
    this.replySeq += 1;
    const id = `${commentId}_r${this.replySeq}`;
    comment.nestedReplies.push({
      id,
      text,
      authorId: this.accountId,
      authorName: MOCK_ACCOUNT.name,
      createdAt: new Date(this.nowFn()).toISOString(),
      nestedReplies: [],
    });
    log.info("mock_reply_posted", { commentId, replyId: id });
    return { id };
  }

  async postPrivateMessage(commentId: string, text: string): Promise<PostResult> {
    await this.pause();
    this.findComment(commentId);
    this.privateMessages.push({ commentId, text });
    return { id: `pm_${this.privateMessages.length}` };
  }
}
