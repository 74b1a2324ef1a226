import { ContentApiError } from "../domain/errors.js";
import type { AccountInfo, Comment, ContentItem, PostResult } from "../types/content.js";
import { logger } from "../utils/logger.js";
import type { ContentApi } from "./content-api.js";

const log = logger.child("graph_api");

// (#10900) Activity already replied to
const ALREADY_REPLIED_CODE = 10900;

export interface GraphApiClientOptions {
  baseUrl: string;
  version: string;
  pageId: string;
  accessToken: string;
  timeoutMs: number;
  reelsLimit: number;
  commentsLimit: number;
  repliesLimit: number;
  failureThreshold?: number;
  cooldownMs?: number;
  fetchFn?: typeof fetch;
}

interface RequestOptions {
  method: "GET" | "POST";
  params?: Record<string, string>;
  body?: unknown;
}

interface CircuitState {
  failures: number;
  openedUntil: number;
}

interface GraphAuthor {
  id?: string;
  name?: string;
}

interface GraphComment {
  id?: string;
  message?: string;
  from?: GraphAuthor;
  created_time?: string;
  comments?: {
    data?: GraphComment[];
    summary?: { total_count?: number };
  };
}

interface GraphReel {
  id?: string;
  description?: string;
  updated_time?: string;
}

interface GraphList<T> {
  data?: T[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function readGraphError(body: unknown): { message?: string; code?: number } {
  if (!isRecord(body)) return {};
  const error = body.error;
  if (!isRecord(error)) return {};
  return {
    message: typeof error.message === "string" ? error.message : undefined,
    code: typeof error.code === "number" ? error.code : undefined,
  };
}

function toComment(raw: GraphComment): Comment | undefined {
  if (!raw.id) return undefined;
  const nested = raw.comments?.data ?? [];
  const replyCount = raw.comments?.summary?.total_count;
  return {
    id: raw.id,
    text: raw.message ?? "",
    authorId: raw.from?.id,
    authorName: raw.from?.name,
    createdAt: raw.created_time ?? new Date(0).toISOString(),
    nestedReplies: nested.map(toComment).filter((c): c is Comment => c !== undefined),
    ...(typeof replyCount === "number" ? { replyCount } : {}),
  };
}

/** Graph API implementation of the content collaborator. */
export class GraphApiClient implements ContentApi {
  readonly accountId: string;

  private readonly baseUrl: string;

  private readonly accessToken: string;

  private readonly timeoutMs: number;

  private readonly reelsLimit: number;

  private readonly commentsLimit: number;

  private readonly repliesLimit: number;

  private readonly failureThreshold: number;

  private readonly cooldownMs: number;

  private readonly fetchFn: typeof fetch;

  private circuit: CircuitState = { failures: 0, openedUntil: 0 };

  constructor(options: GraphApiClientOptions) {
    this.accountId = options.pageId;
    this.baseUrl = `${options.baseUrl.replace(/\/+$/, "")}/${options.version}/`;
    this.accessToken = options.accessToken;
    this.timeoutMs = options.timeoutMs;
    this.reelsLimit = options.reelsLimit;
    this.commentsLimit = options.commentsLimit;
    this.repliesLimit = options.repliesLimit;
    this.failureThreshold = options.failureThreshold ?? 5;
    this.cooldownMs = options.cooldownMs ?? 60_000;
    this.fetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));
  }

  private checkCircuit(): void {
    const now = Date.now();
    if (this.circuit.openedUntil > now) {
      throw new ContentApiError(
        `Graph API circuit is open for ${this.circuit.openedUntil - now}ms`,
        { kind: "unclassified" },
      );
    }
    if (this.circuit.openedUntil > 0) {
      this.circuit = { failures: 0, openedUntil: 0 };
    }
  }

  private markFailure(): void {
    const failures = this.circuit.failures + 1;
    this.circuit = {
      failures,
      openedUntil: failures >= this.failureThreshold ? Date.now() + this.cooldownMs : 0,
    };
  }

  private buildUrl(path: string, params: Record<string, string> = {}): string {
    const url = new URL(path, this.baseUrl);
    url.searchParams.set("access_token", this.accessToken);
    for (const [key, value] of Object.entries(params)) {
      if (value !== "") url.searchParams.set(key, value);
    }
    return url.toString();
  }

  private async request<T>(path: string, options: RequestOptions): Promise<T> {
    this.checkCircuit();

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    let response: Response;
    try {
      response = await this.fetchFn(this.buildUrl(path, options.params), {
        method: options.method,
        headers:
          options.body === undefined
            ? { accept: "application/json" }
            : { accept: "application/json", "content-type": "application/json" },
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal: controller.signal,
      });
    } catch (error) {
      this.markFailure();
      const message = controller.signal.aborted
        ? `Graph API ${options.method} ${path} timed out after ${this.timeoutMs}ms`
        : `Graph API request failed: ${error instanceof Error ? error.message : String(error)}`;
      throw new ContentApiError(message, { cause: error });
    } finally {
      clearTimeout(timeout);
    }

    const body: unknown = await response.json().catch(() => undefined);

    if (!response.ok) {
      if (response.status >= 500) this.markFailure();
      const { message, code } = readGraphError(body);
      throw new ContentApiError(message ?? `Graph API returned ${response.status}`, {
        status: response.status,
        code,
      });
    }

    this.circuit = { failures: 0, openedUntil: 0 };
    return body as T;
  }

  private commentFields(): string {
    return (
      "id,message,from,created_time," +
      `comments.limit(${this.repliesLimit}).summary(true){id,message,from,created_time}`
    );
  }

  async getAccountInfo(): Promise<AccountInfo> {
    const body = await this.request<{ id?: string; name?: string }>(this.accountId, {
      method: "GET",
      params: { fields: "id,name" },
    });
    return { id: body.id ?? this.accountId, name: body.name };
  }

  async listContentItems(): Promise<ContentItem[]> {
    const body = await this.request<GraphList<GraphReel>>(`${this.accountId}/video_reels`, {
      method: "GET",
      params: { fields: "id,description,updated_time", limit: String(this.reelsLimit) },
    });
    return (body.data ?? [])
      .filter((reel): reel is GraphReel & { id: string } => typeof reel.id === "string")
      .map((reel) => ({
        id: reel.id,
        description: reel.description,
        updatedAt: reel.updated_time ?? new Date(0).toISOString(),
      }));
  }

  async listComments(contentItemId: string): Promise<Comment[]> {
    const body = await this.request<GraphList<GraphComment>>(`${contentItemId}/comments`, {
      method: "GET",
      params: { fields: this.commentFields(), limit: String(this.commentsLimit) },
    });
    return (body.data ?? []).map(toComment).filter((c): c is Comment => c !== undefined);
  }

  async postReply(commentId: string, text: string): Promise<PostResult> {
    const body = await this.request<{ id?: string }>(`${commentId}/comments`, {
      method: "POST",
      params: { message: text },
    });
    return { id: body.id };
  }

  async postPrivateMessage(commentId: string, text: string): Promise<PostResult> {
    try {
      const body = await this.request<{ message_id?: string }>(`${this.accountId}/messages`, {
        method: "POST",
        body: {
          recipient: { comment_id: commentId },
          message: { text },
        },
      });
      return { id: body.message_id };
    } catch (error) {
      if (error instanceof ContentApiError && error.code === ALREADY_REPLIED_CODE) {
        log.info("private_reply_duplicate", { commentId });
        return {};
      }
      throw error;
    }
  }

  async testConnection(): Promise<boolean> {
    try {
      await this.getAccountInfo();
      return true;
    } catch (error) {
      log.warn("connection_test_failed", {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }
}
