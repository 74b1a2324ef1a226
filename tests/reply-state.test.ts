import { describe, expect, test } from "vitest";
import { ContentApiError, classifyError } from "../src/domain/errors.js";
import { assertRepliesPopulated, hasAccountReplied, isOwnComment } from "../src/domain/reply-state.js";
import { makeComment } from "./helpers.js";

describe("hasAccountReplied", () => {
  test("no nested replies means not replied, whoever wrote the comment", () => {
    expect(hasAccountReplied(makeComment({ id: "C1", text: "hi", authorId: "page1" }), "page1")).toBe(false);
    expect(hasAccountReplied(makeComment({ id: "C1", text: "hi" }), "page1")).toBe(false);
  });

  test("a nested reply by the account counts, by anyone else does not", () => {
    const comment = makeComment({
      id: "C1",
      text: "hi",
      nestedReplies: [makeComment({ id: "R1", text: "hello", authorId: "page1" })],
    });
    expect(hasAccountReplied(comment, "page1")).toBe(true);
    expect(hasAccountReplied(comment, "page2")).toBe(false);
  });

  test("replies without an author never match", () => {
    const comment = makeComment({
      id: "C1",
      text: "hi",
      nestedReplies: [makeComment({ id: "R1", text: "hello" })],
    });
    expect(hasAccountReplied(comment, "page1")).toBe(false);
  });

  test("an empty account id is never considered to have replied", () => {
    const comment = makeComment({
      id: "C1",
      text: "hi",
      nestedReplies: [makeComment({ id: "R1", text: "hello", authorId: "" })],
    });
    expect(hasAccountReplied(comment, "")).toBe(false);
  });
});

describe("isOwnComment", () => {
  test("matches only a known author equal to the account", () => {
    expect(isOwnComment({ authorId: "page1" }, "page1")).toBe(true);
    expect(isOwnComment({ authorId: "u1" }, "page1")).toBe(false);
    expect(isOwnComment({}, "page1")).toBe(false);
    expect(isOwnComment({}, "")).toBe(false);
  });
});

describe("assertRepliesPopulated", () => {
  test("passes when the platform reports no count or a count it delivered", () => {
    expect(() => assertRepliesPopulated(makeComment({ id: "C1", text: "hi" }))).not.toThrow();
    expect(() =>
      assertRepliesPopulated(
        makeComment({
          id: "C1",
          text: "hi",
          replyCount: 1,
          nestedReplies: [makeComment({ id: "R1", text: "x" })],
        }),
      ),
    ).not.toThrow();
  });

  test("throws an unclassified content error when replies are missing", () => {
    let caught: unknown;
    try {
      assertRepliesPopulated(makeComment({ id: "C9", text: "hi", replyCount: 2 }));
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ContentApiError);
    expect(caught instanceof Error ? caught.message : "").toBe("Replies not populated for comment C9 (0/2)");
    expect(classifyError(caught)).toBe("unclassified");
  });
});
