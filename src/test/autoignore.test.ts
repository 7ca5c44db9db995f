import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { shouldAutoIgnore, normalizeApostrophes, AUTO_IGNORE_PHRASES } from "../core/autoignore.js";
import type { ConversationMessage } from "../types.js";

const CHECK_IN = "Hi! We wanted to check in since we haven't heard back from you. Closing for now.";

describe("autoignore", () => {
  describe("shouldAutoIgnore", () => {
    it("ignores a conversation ending with an agent check-in", () => {
      const messages: ConversationMessage[] = [
        { speaker: "user", text: "The app will not pair." },
        { speaker: "agent", text: CHECK_IN },
      ];
      assert.equal(shouldAutoIgnore(messages), true);
    });

    it("ignores a merged-ticket notice", () => {
      const messages: ConversationMessage[] = [
        { speaker: "agent", text: "This ticket is closed and merged into ticket #4411." },
      ];
      assert.equal(shouldAutoIgnore(messages), true);
    });

    it("does not ignore when the phrase is in an earlier message", () => {
      const messages: ConversationMessage[] = [
        { speaker: "agent", text: CHECK_IN },
        { speaker: "user", text: "Sorry, I was away. Still broken." },
      ];
      assert.equal(shouldAutoIgnore(messages), false);
    });

    it("does not ignore when the user wrote the phrase", () => {
      const messages: ConversationMessage[] = [{ speaker: "user", text: CHECK_IN }];
      assert.equal(shouldAutoIgnore(messages), false);
    });

    it("does not ignore an empty conversation", () => {
      assert.equal(shouldAutoIgnore([]), false);
    });

    it("matches typographic apostrophes", () => {
      const messages: ConversationMessage[] = [
        { speaker: "agent", text: "We wanted to check in since we haven’t heard back from you" },
      ];
      assert.equal(shouldAutoIgnore(messages), true);
    });

    it("is case-sensitive", () => {
      const messages: ConversationMessage[] = [
        { speaker: "agent", text: "THIS TICKET IS CLOSED AND MERGED" },
      ];
      assert.equal(shouldAutoIgnore(messages), false);
    });

    it("uses the given phrase list", () => {
      const messages: ConversationMessage[] = [{ speaker: "agent", text: "Auto-closed by workflow." }];
      assert.equal(shouldAutoIgnore(messages), false);
      assert.equal(shouldAutoIgnore(messages, [...AUTO_IGNORE_PHRASES, "Auto-closed by workflow"]), true);
    });
  });

  describe("normalizeApostrophes", () => {
    it("replaces every apostrophe variant with an ASCII quote", () => {
      assert.equal(normalizeApostrophes("a’b‘cʼd′e"), "a'b'c'd'e");
    });

    it("leaves plain text alone", () => {
      assert.equal(normalizeApostrophes("don't"), "don't");
    });
  });
});
