import assert from "node:assert/strict";
import { test } from "node:test";
import {
  EVALUATION_BLOCKED_SENTINEL,
  EVALUATION_FAILED_SENTINEL,
  InterviewGatewayService,
  isGatewaySentinel,
  isQuestionGenerationFailure,
  parseQuestionLines,
  QUESTIONS_BLOCKED_SENTINEL,
  QUESTIONS_FAILED_SENTINEL,
  REPORT_BLOCKED_SENTINEL,
  REPORT_FAILED_SENTINEL,
} from "../../interviews/interview-gateway.service";
import { InterviewConfig } from "../../shared/types/interview.types";
import { blocked, noopLogger, ScriptedLlmClient } from "../helpers/fakes";

const technical: InterviewConfig = {
  jobRole: "Backend Engineer",
  domain: "Payments",
  interviewType: "technical",
  questionCount: 3,
};

const behavioral: InterviewConfig = {
  jobRole: "Engineering Manager",
  interviewType: "behavioral",
  questionCount: 4,
};

test("question prompt names role, type, domain and line format", async () => {
  const client = new ScriptedLlmClient(() => "Q1\nQ2\nQ3");
  const gateway = new InterviewGatewayService(client, noopLogger);
  await gateway.generateQuestions(technical, 3);

  assert.equal(
    client.calls[0]?.prompt,
    "As an expert interviewer, generate 3 questions for a Backend Engineer Technical Interview. " +
      "Focus on the Payments domain. " +
      "Include questions on algorithms, data structures, and core concepts relevant to the role. " +
      "Provide only the questions, one per line, without any numbering, bullet points, or introductory/concluding remarks.",
  );
  assert.equal(client.calls[0]?.options?.promptName, "question_generation_v1");
});

test("behavioral prompt asks for STAR questions and omits domain", async () => {
  const client = new ScriptedLlmClient(() => "Q");
  await new InterviewGatewayService(client, noopLogger).generateQuestions(behavioral, 4);
  const prompt = client.calls[0]?.prompt ?? "";
  assert.ok(prompt.includes("Ensure these are STAR-format behavioral questions."));
  assert.ok(!prompt.includes("domain"));
});

test("questions are non-empty lines capped at the requested count", async () => {
  const client = new ScriptedLlmClient(() => "\nWhat is a B-tree?\n\n  How does TCP retransmit?  \n1. Explain CAP.\n- Extra one\n");
  const questions = await new InterviewGatewayService(client, noopLogger).generateQuestions(technical, 3);
  assert.deepEqual(questions, ["What is a B-tree?", "How does TCP retransmit?", "Explain CAP."]);
});

test("fewer lines than requested are returned as they are", () => {
  assert.deepEqual(parseQuestionLines("Only one?", 5), ["Only one?"]);
});

test("failed or blocked generation yields count copies of a sentinel", async () => {
  const failed = await new InterviewGatewayService(
    new ScriptedLlmClient(() => new Error("OpenAI API error: HTTP 401 - bad key")),
    noopLogger,
  ).generateQuestions(technical, 3);
  assert.deepEqual(failed, [QUESTIONS_FAILED_SENTINEL, QUESTIONS_FAILED_SENTINEL, QUESTIONS_FAILED_SENTINEL]);
  assert.equal(isQuestionGenerationFailure(failed), true);

  const blockedQuestions = await new InterviewGatewayService(new ScriptedLlmClient(() => blocked()), noopLogger)
    .generateQuestions(technical, 3);
  assert.equal(blockedQuestions.length, 3);
  assert.equal(blockedQuestions[0], QUESTIONS_BLOCKED_SENTINEL);
  assert.equal(isQuestionGenerationFailure(blockedQuestions), true);
});

test("generation failure check uses the first element only", () => {
  assert.equal(isQuestionGenerationFailure([]), true);
  assert.equal(isQuestionGenerationFailure(["What is Raft?", "Could not generate"]), false);
});

test("evaluation prompt carries headings and criteria", async () => {
  const client = new ScriptedLlmClient(() => "Feedback: good\nScore: 8/10\nImprovement Suggestion: more depth");
  const feedback = await new InterviewGatewayService(client, noopLogger).evaluateAnswer(
    behavioral,
    "Tell me about a conflict.",
    "I mediated between two leads.",
  );
  assert.equal(feedback, "Feedback: good\nScore: 8/10\nImprovement Suggestion: more depth");
  const prompt = client.calls[0]?.prompt ?? "";
  assert.ok(prompt.includes('Question: "Tell me about a conflict."'));
  assert.ok(prompt.includes(`Candidate's Answer: "I mediated between two leads."`));
  assert.ok(prompt.includes("adherence to STAR format (Situation, Task, Action, Result), relevance, and clarity"));
  assert.ok(prompt.includes('formatted exactly as: "Score: [score]/10"'));
  assert.ok(prompt.includes('Use these exact headings: "Feedback:", "Score:", and "Improvement Suggestion:".'));
});

test("evaluation failures map to sentinels", async () => {
  const failed = await new InterviewGatewayService(new ScriptedLlmClient(() => new Error("boom")), noopLogger)
    .evaluateAnswer(technical, "Q", "A");
  assert.equal(failed, EVALUATION_FAILED_SENTINEL);
  const blockedFeedback = await new InterviewGatewayService(new ScriptedLlmClient(() => blocked()), noopLogger)
    .evaluateAnswer(technical, "Q", "A");
  assert.equal(blockedFeedback, EVALUATION_BLOCKED_SENTINEL);
  assert.equal(isGatewaySentinel(failed), true);
  assert.equal(isGatewaySentinel("Feedback: fine"), false);
});

test("report prompt lists every interaction and the truncated average", async () => {
  const client = new ScriptedLlmClient(() => "**Final Score: 7/10**");
  const report = await new InterviewGatewayService(client, noopLogger).synthesizeReport(technical, [
    { question: "Q1", answer: "A1", feedback: "Score: 7/10" },
    { question: "Q2", answer: "A2", feedback: "Score: 8/10" },
    { question: "Q3", answer: "Skipped", feedback: "No feedback." },
  ]);
  assert.equal(report, "**Final Score: 7/10**");

  const prompt = client.calls[0]?.prompt ?? "";
  const lines = prompt.split("\n");
  assert.equal(
    lines[0],
    "Generate a final interview summary report for a Backend Engineer Technical Interview based on the following interactions:",
  );
  assert.ok(prompt.includes("---\nQuestion: Q3\nCandidate's Answer: Skipped\nFeedback Given: No feedback."));
  assert.ok(
    prompt.includes(
      "Based on all interactions (average score: 7.5/10), provide a comprehensive final report with these sections:",
    ),
  );
  assert.equal(lines[lines.length - 1], "4. A final overall rating formatted as: '**Final Score: [score]/10**'");
});

test("report failures map to sentinels", async () => {
  const failed = await new InterviewGatewayService(new ScriptedLlmClient(() => new Error("boom")), noopLogger)
    .synthesizeReport(technical, []);
  assert.equal(failed, REPORT_FAILED_SENTINEL);
  const blockedReport = await new InterviewGatewayService(new ScriptedLlmClient(() => blocked()), noopLogger)
    .synthesizeReport(technical, []);
  assert.equal(blockedReport, REPORT_BLOCKED_SENTINEL);
});
