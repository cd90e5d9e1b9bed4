import assert from "node:assert/strict";
import { test } from "node:test";
import { LlmBlockedError, LlmClient, readCompletionText } from "../../ai/llm.client";
import { COACH_SYSTEM_PROMPT } from "../../ai/system/coach.system";
import { noopLogger } from "../helpers/fakes";

test("system prompt is attached ahead of the user prompt", () => {
  const client = new LlmClient("test-key", noopLogger, "gpt-test");
  const payload = client.buildRequestBody("Generate questions", 300, 0.7);

  assert.equal(payload.model, "gpt-test");
  assert.equal(payload.temperature, 0.7);
  assert.equal(payload.messages.length, 2);
  assert.equal(payload.messages[0]?.role, "system");
  assert.equal(payload.messages[0]?.content, COACH_SYSTEM_PROMPT);
  assert.equal(payload.messages[1]?.role, "user");
  assert.equal(payload.messages[1]?.content, "Generate questions");
  assert.equal(payload.max_tokens, 300);
  assert.equal(payload.max_completion_tokens, undefined);
});

test("newer models take max_completion_tokens", () => {
  const client = new LlmClient("test-key", noopLogger, "gpt-5-mini");
  const payload = client.buildRequestBody("hi", 50, 0.4);
  assert.equal(payload.max_completion_tokens, 50);
  assert.equal(payload.max_tokens, undefined);
});

test("completion text is trimmed", () => {
  const text = readCompletionText({
    choices: [{ finish_reason: "stop", message: { content: "  Feedback: fine\nScore: 8/10  " } }],
  });
  assert.equal(text, "Feedback: fine\nScore: 8/10");
});

test("content filter and refusals surface as blocked", () => {
  assert.throws(
    () => readCompletionText({ choices: [{ finish_reason: "content_filter", message: { content: null } }] }),
    LlmBlockedError,
  );
  assert.throws(
    () => readCompletionText({ choices: [{ finish_reason: "stop", message: { content: null, refusal: "I can't help" } }] }),
    (error: unknown) => error instanceof LlmBlockedError && error.reason === "I can't help",
  );
});

test("empty or missing content is a plain failure", () => {
  assert.throws(() => readCompletionText({ choices: [] }), /does not contain choices/);
  assert.throws(
    () => readCompletionText({ choices: [{ finish_reason: "stop", message: { content: "   " } }] }),
    (error: unknown) => error instanceof Error && !(error instanceof LlmBlockedError),
  );
});
