import assert from "node:assert/strict";
import { test } from "node:test";
import { interviewTypeLabel, parseInterviewConfig } from "../../interviews/interview-config";

test("valid config is trimmed and frozen", () => {
  const result = parseInterviewConfig({
    jobRole: "  Backend Engineer ",
    domain: " Payments ",
    interviewType: "Technical",
    questionCount: 3,
  });
  assert.ok(result.ok);
  if (!result.ok) {
    return;
  }
  assert.deepEqual(result.config, {
    jobRole: "Backend Engineer",
    domain: "Payments",
    interviewType: "technical",
    questionCount: 3,
  });
  assert.ok(Object.isFrozen(result.config));
});

test("blank domain is dropped and question count defaults to five", () => {
  const result = parseInterviewConfig({ jobRole: "PM", domain: "  ", interviewType: "Behavioral Interview" });
  assert.deepEqual(result, {
    ok: true,
    config: { jobRole: "PM", interviewType: "behavioral", questionCount: 5 },
  });
});

test("question count must be a whole number from 3 to 10", () => {
  for (const questionCount of [2, 11, 4.5, "5"]) {
    const result = parseInterviewConfig({ jobRole: "SRE", interviewType: "technical", questionCount });
    assert.deepEqual(result, {
      ok: false,
      error: "Question count must be a whole number between 3 and 10.",
    });
  }
  assert.equal(parseInterviewConfig({ jobRole: "SRE", interviewType: "technical", questionCount: 10 }).ok, true);
});

test("missing role or unknown type is rejected", () => {
  assert.deepEqual(parseInterviewConfig({ jobRole: " ", interviewType: "technical" }), {
    ok: false,
    error: "Job role is required.",
  });
  assert.deepEqual(parseInterviewConfig({ jobRole: "SRE", interviewType: "case study" }), {
    ok: false,
    error: "Interview type must be either technical or behavioral.",
  });
  assert.deepEqual(parseInterviewConfig(null), { ok: false, error: "Interview config must be an object." });
});

test("labels match the wording used in prompts", () => {
  assert.equal(interviewTypeLabel("technical"), "Technical Interview");
  assert.equal(interviewTypeLabel("behavioral"), "Behavioral Interview");
});
