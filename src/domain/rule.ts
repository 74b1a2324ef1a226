import type { Rule, TargetId } from "../types/monitoring.js";

const MATCH_ALL_SENTINEL = ".";

export interface RuleInput {
  targetId: TargetId;
  keywords?: readonly string[];
  replyText: string;
  privateReplyText?: string | null;
  enabled?: boolean;
}

export function createRule(input: RuleInput): Rule {
  const privateReplyText = input.privateReplyText?.trim() ? input.privateReplyText : undefined;
  return Object.freeze({
    targetId: input.targetId,
    keywords: Object.freeze([...(input.keywords ?? [])]),
    replyText: input.replyText,
    ...(privateReplyText !== undefined ? { privateReplyText } : {}),
    enabled: input.enabled ?? false,
  });
}

export function isMatchAll(keywords: readonly string[]): boolean {
  return keywords.length === 0 || (keywords.length === 1 && keywords[0] === MATCH_ALL_SENTINEL);
}

/**
 * Case-insensitive substring match of any keyword against the comment text.
 * An empty keyword list, or exactly `["."]`, matches every comment.
 */
export function matches(rule: Pick<Rule, "keywords">, commentText: string): boolean {
  if (isMatchAll(rule.keywords)) return true;
  const haystack = commentText.toLowerCase();
  return rule.keywords.some((keyword) => haystack.includes(keyword.toLowerCase()));
}

export function isValidRule(rule: Pick<Rule, "replyText">): boolean {
  return rule.replyText.trim().length > 0;
}

export function keywordsSummary(rule: Pick<Rule, "keywords">): string {
  if (isMatchAll(rule.keywords)) return "All comments";
  if (rule.keywords.length <= 3) return rule.keywords.join(", ");
  return `${rule.keywords.slice(0, 3).join(", ")}... (+${rule.keywords.length - 3} more)`;
}
