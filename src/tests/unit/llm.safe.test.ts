import assert from "node:assert/strict";
import { test } from "node:test";
import { callTextPromptSafe } from "../../ai/llm.safe";
import { blocked, ScriptedLlmClient } from "../helpers/fakes";

test("successful call returns trimmed text and forwards options", async () => {
  const client = new ScriptedLlmClient(() => "  hello  ");
  const result = await callTextPromptSafe({
    llmClient: client,
    prompt: "p",
    maxTokens: 40,
    promptName: "unit_prompt",
    temperature: 0.2,
  });
  assert.deepEqual(result, { ok: true, text: "hello" });
  assert.deepEqual(client.calls[0]?.options, { promptName: "unit_prompt", temperature: 0.2 });
});

test("blocked responses are reported as blocked", async () => {
  const result = await callTextPromptSafe({
    llmClient: new ScriptedLlmClient(() => blocked()),
    prompt: "p",
    maxTokens: 40,
    promptName: "unit_prompt",
  });
  assert.equal(result.ok, false);
  assert.equal(result.ok ? null : result.error_code, "blocked");
});

test("failures are not retried", async () => {
  const client = new ScriptedLlmClient(() => new Error("OpenAI API error: HTTP 503 - unavailable"));
  const result = await callTextPromptSafe({
    llmClient: client,
    prompt: "p",
    maxTokens: 40,
    promptName: "unit_prompt",
  });
  assert.equal(client.calls.length, 1);
  assert.equal(result.ok ? null : result.error_code, "llm_failure");
});

test("slow calls time out", async () => {
  const result = await callTextPromptSafe({
    llmClient: {
      generateText: () => new Promise<string>((resolve) => setTimeout(() => resolve("late"), 200)),
    },
    prompt: "p",
    maxTokens: 40,
    promptName: "unit_prompt",
    timeoutMs: 20,
  });
  assert.equal(result.ok ? null : result.error_code, "timeout");
});
