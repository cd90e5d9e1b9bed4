import assert from "node:assert/strict";
import { test } from "node:test";
import { ConfigurationError, loadEnv } from "../../config/env";

test("missing API key is a configuration error with remediation", () => {
  assert.throws(
    () => loadEnv({ PORT: "3000" }),
    (error: unknown) => {
      assert.ok(error instanceof ConfigurationError);
      assert.equal(error.message, "Missing required environment variable: OPENAI_API_KEY");
      assert.match(error.remediation, /OPENAI_API_KEY=<your key>/);
      return true;
    },
  );
});

test("blank API key counts as missing", () => {
  assert.throws(() => loadEnv({ OPENAI_API_KEY: "   " }), ConfigurationError);
});

test("defaults are applied when only the key is set", () => {
  const env = loadEnv({ OPENAI_API_KEY: " test-secret " });
  assert.equal(env.openaiApiKey, "test-secret");
  assert.equal(env.port, 3000);
  assert.equal(env.logLevel, "info");
  assert.equal(env.openaiChatModel, "gpt-4o-mini");
  assert.equal(env.openaiTranscriptionModel, "whisper-1");
  assert.equal(env.openaiSpeechModel, "tts-1");
  assert.equal(env.openaiSpeechVoice, "alloy");
  assert.equal(env.speechOutputEnabled, true);
  assert.equal(env.llmTimeoutMs, 45000);
  assert.equal(env.maxSessions, 200);
});

test("invalid values name the offending variable", () => {
  assert.throws(() => loadEnv({ OPENAI_API_KEY: "test-secret", PORT: "abc" }), /Invalid PORT value: abc/);
  assert.throws(() => loadEnv({ OPENAI_API_KEY: "test-secret", LOG_LEVEL: "loud" }), /Invalid LOG_LEVEL value: loud/);
  assert.throws(
    () => loadEnv({ OPENAI_API_KEY: "test-secret", SPEECH_OUTPUT_ENABLED: "maybe" }),
    /Invalid boolean value: maybe/,
  );
  assert.throws(() => loadEnv({ OPENAI_API_KEY: "test-secret", MAX_SESSIONS: "0" }), /Invalid MAX_SESSIONS value: 0/);
});

test("speech output can be switched off", () => {
  const env = loadEnv({ OPENAI_API_KEY: "test-secret", SPEECH_OUTPUT_ENABLED: "no", LOG_LEVEL: "DEBUG" });
  assert.equal(env.speechOutputEnabled, false);
  assert.equal(env.logLevel, "debug");
});
