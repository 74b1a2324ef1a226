import { describe, expect, test } from "vitest";
import { ContentApiError } from "../src/domain/errors.js";
import { MonitoringCycleExecutor } from "../src/services/cycle-executor.js";
import type { Stamped } from "../src/services/event-bus.js";
import { MockContentApi } from "../src/services/mock-content-api.js";
import type { Comment } from "../src/types/content.js";
import { ACCOUNT_ID, FakeContentApi, ToggleCredentials, buildEngine, makeComment } from "./helpers.js";

const NOW = Date.parse("2026-03-01T00:00:00.000Z");
const fixedClock = () => NOW;

const thanksRule = {
  targetId: "R1",
  keywords: ["thanks"],
  replyText: "You're welcome!",
  enabled: true,
};

describe("MonitoringCycleExecutor", () => {
  test("replies once to a matching, unreplied comment", async () => {
    const api = new FakeContentApi().withItem("R1", [
      makeComment({ id: "C1", text: "Thanks a lot!" }),
    ]);
    const engine = buildEngine({ api, rules: [thanksRule], nowFn: fixedClock });

    const outcome = await engine.executor.runCycle();

    expect(api.replies).toEqual([{ commentId: "C1", text: "You're welcome!" }]);
    expect(engine.stats.snapshot().totalReplies).toBe(1);
    expect(outcome).toEqual({
      ok: true,
      summary: {
        startedAt: "2026-03-01T00:00:00.000Z",
        durationMs: 0,
        rules: 1,
        enabledRules: 1,
        contentItems: 1,
        processedItems: 1,
        failedItems: 0,
        comments: 1,
        replies: 1,
        privateReplies: 0,
        failedReplies: 0,
        apiCalls: 3,
      },
    });
  });

  test("counts every content API call, failed ones included", async () => {
    const api = new FakeContentApi()
      .withItem("R1", [makeComment({ id: "C1", text: "thanks" })])
      .withItem("R2", [makeComment({ id: "C2", text: "thanks!" })]);
    api.commentErrors.set("R1", new Error("socket hang up"));
    const engine = buildEngine({
      api,
      rules: [thanksRule, { ...thanksRule, targetId: "R2", privateReplyText: "Check your inbox" }],
    });

    const outcome = await engine.executor.runCycle();

    // one listing, two comment fetches, one public and one private reply
    expect(outcome.ok && outcome.summary.apiCalls).toBe(5);
    expect(engine.stats.metrics().rows.map((row) => row.apiCalls)).toEqual([5]);
  });

  test("records the check with the current time and persists it", async () => {
    const api = new FakeContentApi().withItem("R1", []);
    const engine = buildEngine({ api, rules: [thanksRule], nowFn: fixedClock });

    await engine.executor.runCycle();

    const persisted = await engine.statisticsStore.loadStatistics();
    expect(engine.stats.snapshot().lastCheckAt).toBe("2026-03-01T00:00:00.000Z");
    expect(persisted.totalChecks).toBe(1);
    expect(persisted.lastCheckAt).toBe("2026-03-01T00:00:00.000Z");
    expect(persisted.lastCycle?.contentItems).toBe(1);
  });

  test("N cycles without matches add exactly N checks and no replies", async () => {
    const api = new FakeContentApi().withItem("R1", [makeComment({ id: "C1", text: "nice video" })]);
    const engine = buildEngine({ api, rules: [thanksRule], state: { totalChecks: 10, totalReplies: 4 } });
    await engine.stats.load();

    for (let i = 0; i < 3; i += 1) {
      await engine.executor.runCycle();
    }

    expect(engine.stats.snapshot()).toMatchObject({ totalChecks: 13, totalReplies: 4 });
    const persisted = await engine.statisticsStore.loadStatistics();
    expect(persisted.totalChecks).toBe(13);
    expect(persisted.totalReplies).toBe(4);
  });

  test("a failing item does not stop the others and the check still completes", async () => {
    const api = new FakeContentApi()
      .withItem("A", [])
      .withItem("B", [makeComment({ id: "CB", text: "thanks!" })]);
    api.commentErrors.set("A", new ContentApiError("boom", { status: 500 }));
    const engine = buildEngine({
      api,
      rules: [
        { ...thanksRule, targetId: "A" },
        { ...thanksRule, targetId: "B" },
      ],
    });

    const outcome = await engine.executor.runCycle();

    expect(api.replies).toEqual([{ commentId: "CB", text: "You're welcome!" }]);
    expect(outcome.ok).toBe(true);
    expect(outcome.ok && outcome.summary.failedItems).toBe(1);
    expect(engine.stats.snapshot()).toMatchObject({ totalChecks: 1, totalReplies: 1 });
    expect(engine.stats.snapshot().lastError).toBeUndefined();
  });

  test("only content items with an enabled rule are fetched", async () => {
    const api = new FakeContentApi()
      .withItem("R1", [])
      .withItem("R2", [])
      .withItem("R3", []);
    const engine = buildEngine({
      api,
      rules: [thanksRule, { ...thanksRule, targetId: "R2", enabled: false }],
    });

    await engine.executor.runCycle();

    expect(api.listCommentsCalls).toEqual(["R1"]);
  });

  test("no enabled rules still records a check without touching the API", async () => {
    const api = new FakeContentApi().withItem("R1", [makeComment({ id: "C1", text: "thanks" })]);
    const engine = buildEngine({ api, rules: [{ ...thanksRule, enabled: false }] });

    const outcome = await engine.executor.runCycle();

    expect(outcome.ok).toBe(true);
    expect(api.listItemsCalls).toBe(0);
    expect(engine.stats.snapshot().totalChecks).toBe(1);
  });

  test("an enabled rule with blank reply text is skipped", async () => {
    const api = new FakeContentApi().withItem("R1", [makeComment({ id: "C1", text: "thanks" })]);
    const engine = buildEngine({ api, rules: [{ ...thanksRule, replyText: "  " }] });

    const outcome = await engine.executor.runCycle();

    expect(outcome.ok && outcome.summary.enabledRules).toBe(0);
    expect(api.listItemsCalls).toBe(0);
    expect(api.replies).toEqual([]);
  });

  test("listing failure records the error instead of a check", async () => {
    const api = new FakeContentApi();
    api.listItemsError = new ContentApiError("(#4) Application request limit reached", { status: 400, code: 4 });
    const engine = buildEngine({ api, rules: [thanksRule], nowFn: fixedClock, state: { totalChecks: 2 } });
    await engine.stats.load();

    const outcome = await engine.executor.runCycle();

    expect(outcome).toEqual({
      ok: false,
      kind: "rate_limit",
      message: "API rate limit exceeded. Monitoring will retry on the next tick.",
    });
    expect(engine.stats.snapshot()).toMatchObject({
      totalChecks: 2,
      lastError: "API rate limit exceeded. Monitoring will retry on the next tick.",
      lastErrorAt: "2026-03-01T00:00:00.000Z",
    });
  });

  test("a successful cycle clears the previous error", async () => {
    const api = new FakeContentApi().withItem("R1", []);
    const engine = buildEngine({
      api,
      rules: [thanksRule],
      state: { lastError: "Monitoring failed: old", lastErrorAt: "2026-02-01T00:00:00.000Z" },
    });
    await engine.stats.load();
    expect(engine.stats.snapshot().lastError).toBe("Monitoring failed: old");

    await engine.executor.runCycle();

    expect(engine.stats.snapshot().lastError).toBeUndefined();
    expect((await engine.statisticsStore.loadStatistics()).lastError).toBeUndefined();
  });

  test("refuses to run without a usable credential", async () => {
    const api = new FakeContentApi().withItem("R1", [makeComment({ id: "C1", text: "thanks" })]);
    const engine = buildEngine({ api, rules: [thanksRule], credentials: new ToggleCredentials(false) });

    const outcome = await engine.executor.runCycle();

    expect(outcome.ok).toBe(false);
    expect(!outcome.ok && outcome.kind).toBe("authentication");
    expect(api.listItemsCalls).toBe(0);
    expect(engine.stats.snapshot().totalChecks).toBe(0);
    expect(engine.stats.snapshot().lastError).toBe(
      "Access token is missing, invalid or expired. Update the credential and restart monitoring.",
    );
  });

  test("an expired token reported by the platform is an authentication failure", async () => {
    const api = new FakeContentApi();
    api.listItemsError = new ContentApiError("Error validating access token", { status: 400, code: 190 });
    const engine = buildEngine({ api, rules: [thanksRule] });

    const outcome = await engine.executor.runCycle();

    expect(!outcome.ok && outcome.kind).toBe("authentication");
  });

  test("a failed reply is logged and the next comment is still handled", async () => {
    const api = new FakeContentApi().withItem("R1", [
      makeComment({ id: "C1", text: "thanks" }),
      makeComment({ id: "C2", text: "thanks too" }),
    ]);
    api.replyErrors.set("C1", new ContentApiError("(#100) Invalid parameter", { status: 400, code: 100 }));
    const engine = buildEngine({ api, rules: [thanksRule] });

    const outcome = await engine.executor.runCycle();

    expect(api.replies.map((r) => r.commentId)).toEqual(["C2"]);
    expect(outcome.ok && outcome.summary.failedReplies).toBe(1);
    expect(engine.stats.snapshot()).toMatchObject({ totalReplies: 1, totalChecks: 1 });
  });

  test("comments within one item are answered in API order", async () => {
    const api = new FakeContentApi().withItem("R1", [
      makeComment({ id: "C3", text: "thanks" }),
      makeComment({ id: "C1", text: "thanks" }),
      makeComment({ id: "C2", text: "thanks" }),
    ]);
    const engine = buildEngine({ api, rules: [thanksRule] });

    await engine.executor.runCycle();

    expect(api.replies.map((r) => r.commentId)).toEqual(["C3", "C1", "C2"]);
  });

  test("skips comments the account already answered and its own comments", async () => {
    const ownReply = makeComment({ id: "R-own", text: "You're welcome!", authorId: ACCOUNT_ID });
    const otherReply = makeComment({ id: "R-other", text: "me too", authorId: "u9" });
    const api = new FakeContentApi().withItem("R1", [
      makeComment({ id: "C1", text: "thanks", nestedReplies: [ownReply] }),
      makeComment({ id: "C2", text: "thanks", nestedReplies: [otherReply] }),
      makeComment({ id: "C3", text: "thanks for watching", authorId: ACCOUNT_ID }),
      makeComment({ id: "C4", text: "thanks", authorId: undefined }),
    ]);
    const engine = buildEngine({ api, rules: [thanksRule] });

    await engine.executor.runCycle();

    expect(api.replies.map((r) => r.commentId)).toEqual(["C2", "C4"]);
  });

  test("a comment whose replies were not delivered is skipped", async () => {
    const api = new FakeContentApi().withItem("R1", [
      makeComment({ id: "C1", text: "thanks", replyCount: 2 }),
      makeComment({ id: "C2", text: "thanks", replyCount: 0 }),
    ]);
    const engine = buildEngine({ api, rules: [thanksRule] });

    const outcome = await engine.executor.runCycle();

    expect(api.replies.map((r) => r.commentId)).toEqual(["C2"]);
    expect(outcome.ok).toBe(true);
  });

  test("sends the private reply after the public one", async () => {
    const api = new FakeContentApi().withItem("R1", [makeComment({ id: "C1", text: "thanks" })]);
    const engine = buildEngine({ api, rules: [{ ...thanksRule, privateReplyText: "Check your inbox" }] });

    const outcome = await engine.executor.runCycle();

    expect(api.privateMessages).toEqual([{ commentId: "C1", text: "Check your inbox" }]);
    expect(outcome.ok && outcome.summary.privateReplies).toBe(1);
    expect(engine.stats.snapshot()).toMatchObject({ totalReplies: 1, totalPrivateReplies: 1 });
  });

  test("a failed private reply keeps the public reply counted", async () => {
    const api = new FakeContentApi().withItem("R1", [makeComment({ id: "C1", text: "thanks" })]);
    api.privateErrors.set("C1", new ContentApiError("(#10903) Cannot message", { status: 400, code: 10903 }));
    const engine = buildEngine({ api, rules: [{ ...thanksRule, privateReplyText: "Check your inbox" }] });

    const outcome = await engine.executor.runCycle();

    expect(outcome.ok).toBe(true);
    expect(api.replies).toHaveLength(1);
    expect(engine.stats.snapshot()).toMatchObject({ totalReplies: 1, totalPrivateReplies: 0 });
  });

  test("a stuck comment fetch times out without holding up other items", async () => {
    class StuckApi extends FakeContentApi {
      override async listComments(contentItemId: string): Promise<Comment[]> {
        if (contentItemId === "A") return new Promise<Comment[]>(() => undefined);
        return super.listComments(contentItemId);
      }
    }
    const api = new StuckApi().withItem("A", []).withItem("B", [makeComment({ id: "CB", text: "thanks" })]);
    const engine = buildEngine({
      api,
      rules: [
        { ...thanksRule, targetId: "A" },
        { ...thanksRule, targetId: "B" },
      ],
      callTimeoutMs: 20,
    });

    const outcome = await engine.executor.runCycle();

    expect(api.replies.map((r) => r.commentId)).toEqual(["CB"]);
    expect(outcome.ok && outcome.summary.failedItems).toBe(1);
  });

  test("concurrent cycles never lose counter updates", async () => {
    const api = new FakeContentApi().withItem("R1", [makeComment({ id: "C1", text: "thanks" })]);
    const engine = buildEngine({ api, rules: [thanksRule] });

    await Promise.all([engine.executor.runCycle(), engine.executor.runCycle(), engine.executor.runCycle()]);

    // the fake never shows the posted reply, so each cycle answers again
    expect(api.replies).toHaveLength(3);
    expect(engine.stats.snapshot()).toMatchObject({ totalChecks: 3, totalReplies: 3 });
    expect(await engine.statisticsStore.loadStatistics()).toMatchObject({ totalChecks: 3, totalReplies: 3 });
  });

  test("publishes cycle and reply events", async () => {
    const api = new FakeContentApi().withItem("R1", [makeComment({ id: "C1", text: "thanks" })]);
    const engine = buildEngine({ api, rules: [thanksRule] });
    const seen: Stamped[] = [];
    engine.events.subscribe((event) => seen.push(event));

    await engine.executor.runCycle("schedule");

    expect(seen.filter((e) => e.type !== "stats:updated").map((e) => e.type)).toEqual([
      "cycle:started",
      "reply:sent",
      "cycle:completed",
    ]);
    expect(seen.filter((e) => e.type === "stats:updated")).toHaveLength(2);
  });

  test("the platform thread is the dedup record across cycles", async () => {
    const api = new MockContentApi();
    const engine = buildEngine({
      rules: [{ targetId: "1001", keywords: ["thanks"], replyText: "Glad you liked it", enabled: true }],
    });
    const executor = new MonitoringCycleExecutor({
      contentApi: api,
      ruleStore: engine.ruleStore,
      credentials: engine.credentials,
      stats: engine.stats,
      events: engine.events,
    });

    const first = await executor.runCycle();
    const second = await executor.runCycle();

    expect(first.ok && first.summary.replies).toBe(1);
    expect(second.ok && second.summary.replies).toBe(0);
    const comments = await api.listComments("1001");
    expect(comments.find((c) => c.id === "c1003")?.nestedReplies.map((r) => r.authorId)).toEqual(["mock-page"]);
  });
});

