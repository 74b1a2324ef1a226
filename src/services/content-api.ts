import { GraphApiClient, type GraphApiClientOptions } from "./graph-api-client.js";
import { MockContentApi } from "./mock-content-api.js";
import type { AccountInfo, Comment, CommentId, ContentItem, ContentItemId, PostResult } from "../types/content.js";

/**
 * Remote content platform as seen by the monitoring engine. Every method may
 * reject with a `ContentApiError` carrying enough detail for `classifyError`.
 */
export interface ContentApi {
  /** Id of the account that posts replies; used for dedup. */
  readonly accountId: string;
  listContentItems(): Promise<ContentItem[]>;
  /** Comments with `nestedReplies` already populated. */
  listComments(contentItemId: ContentItemId): Promise<Comment[]>;
  postReply(commentId: CommentId, text: string): Promise<PostResult>;
  postPrivateMessage(commentId: CommentId, text: string): Promise<PostResult>;
  getAccountInfo(): Promise<AccountInfo>;
}

export interface ContentApiConfig {
  useMockData: boolean;
  graph: GraphApiClientOptions;
}

/** Picks the content source once, at construction time. */
export function createContentApi(config: ContentApiConfig): ContentApi {
  if (config.useMockData) return new MockContentApi();
  return new GraphApiClient(config.graph);
}
