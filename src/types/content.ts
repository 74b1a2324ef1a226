export type ContentItemId = string;
export type CommentId = string;

export interface ContentItem {
  id: ContentItemId;
  description?: string;
  updatedAt: string;
}

export interface Comment {
  id: CommentId;
  text: string;
  /** Absent when the platform withholds the author. */
  authorId?: string;
  authorName?: string;
  createdAt: string;
  /** Direct replies already posted under this comment, in platform order. */
  nestedReplies: Comment[];
  /** Reply total as summarised by the platform, when it reports one. */
  replyCount?: number;
}

export interface AccountInfo {
  id: string;
  name?: string;
}

export interface PostResult {
  id?: string;
}
