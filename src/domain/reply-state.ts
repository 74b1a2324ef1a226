import type { Comment } from "../types/content.js";
import { ContentApiError } from "./errors.js";

/**
 * True iff one of the comment's direct replies was written by `accountId`.
 * The platform's reply thread is the only dedup record; nothing is kept locally.
 */
export function hasAccountReplied(comment: Pick<Comment, "nestedReplies">, accountId: string): boolean {
  if (!accountId || comment.nestedReplies.length === 0) return false;
  return comment.nestedReplies.some((reply) => reply.authorId === accountId);
}

export function isOwnComment(comment: Pick<Comment, "authorId">, accountId: string): boolean {
  return Boolean(accountId) && comment.authorId === accountId;
}

/**
 * Content API collaborators must deliver every direct reply with the comment.
 * A reported reply total above what was delivered means the thread is truncated
 * and `hasAccountReplied` cannot be trusted.
 */
export function assertRepliesPopulated(comment: Pick<Comment, "id" | "nestedReplies" | "replyCount">): void {
  if (comment.replyCount === undefined) return;
  if (comment.replyCount > comment.nestedReplies.length) {
    throw new ContentApiError(
      `Replies not populated for comment ${comment.id} (${comment.nestedReplies.length}/${comment.replyCount})`,
      { kind: "unclassified" },
    );
  }
}
