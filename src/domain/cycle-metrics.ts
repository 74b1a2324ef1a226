import type { CycleAggregate, CycleSummary } from "../types/monitoring.js";

export function aggregateCycles(rows: readonly CycleSummary[]): CycleAggregate {
  const aggregate: CycleAggregate = {
    rows: rows.length,
    contentItems: 0,
    processedItems: 0,
    comments: 0,
    replies: 0,
    privateReplies: 0,
    failedReplies: 0,
    apiCalls: 0,
    durationMs: 0,
  };
  for (const row of rows) {
    aggregate.contentItems += row.contentItems;
    aggregate.processedItems += row.processedItems;
    aggregate.comments += row.comments;
    aggregate.replies += row.replies;
    aggregate.privateReplies += row.privateReplies;
    aggregate.failedReplies += row.failedReplies;
    aggregate.apiCalls += row.apiCalls;
    aggregate.durationMs += row.durationMs;
  }
  return aggregate;
}
