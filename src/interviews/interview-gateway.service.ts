import { LlmTextClient } from "../ai/llm.client";
import { callTextPromptSafe } from "../ai/llm.safe";
import { buildAnswerEvaluationV1Prompt } from "../ai/prompts/interview/answer-evaluation.v1.prompt";
import { buildFinalReportV1Prompt } from "../ai/prompts/interview/final-report.v1.prompt";
import { buildQuestionGenerationV1Prompt } from "../ai/prompts/interview/question-generation.v1.prompt";
import { Logger } from "../config/logger";
import { AnswerRecord, InterviewConfig } from "../shared/types/interview.types";
import { computeAverageScore } from "./score-extraction";

export const QUESTION_GENERATION_FAILURE_PREFIX = "Could not generate";
export const QUESTIONS_FAILED_SENTINEL =
  "Could not generate questions. Check your API key and internet connection.";
export const QUESTIONS_BLOCKED_SENTINEL = "Could not generate questions due to a block.";
export const EVALUATION_FAILED_SENTINEL = "Could not evaluate answer due to an error.";
export const EVALUATION_BLOCKED_SENTINEL = "Evaluation was blocked. The answer might contain sensitive content.";
export const REPORT_FAILED_SENTINEL = "Could not generate final report.";
export const REPORT_BLOCKED_SENTINEL = "The final report was blocked due to safety settings.";

const SENTINELS = new Set<string>([
  QUESTIONS_FAILED_SENTINEL,
  QUESTIONS_BLOCKED_SENTINEL,
  EVALUATION_FAILED_SENTINEL,
  EVALUATION_BLOCKED_SENTINEL,
  REPORT_FAILED_SENTINEL,
  REPORT_BLOCKED_SENTINEL,
]);

const LIST_MARKER_PATTERN = /^(?:[-*•]\s+|\d{1,2}[.)]\s+|Q\d{1,2}[:.)]\s+)/i;

export interface InterviewGateway {
  generateQuestions(config: InterviewConfig, count: number): Promise<string[]>;
  evaluateAnswer(config: InterviewConfig, question: string, answer: string): Promise<string>;
  synthesizeReport(config: InterviewConfig, records: ReadonlyArray<AnswerRecord>): Promise<string>;
}

interface InterviewGatewayOptions {
  timeoutMs?: number;
}

export function isGatewaySentinel(text: string): boolean {
  return SENTINELS.has(text);
}

export function isQuestionGenerationFailure(questions: ReadonlyArray<string>): boolean {
  const first = questions[0];
  return first === undefined || first.startsWith(QUESTION_GENERATION_FAILURE_PREFIX);
}

export class InterviewGatewayService implements InterviewGateway {
  constructor(
    private readonly llmClient: LlmTextClient,
    private readonly logger: Logger,
    private readonly options: InterviewGatewayOptions = {},
  ) {}

  async generateQuestions(config: InterviewConfig, count: number): Promise<string[]> {
    const prompt = buildQuestionGenerationV1Prompt({ config, count });
    const safe = await callTextPromptSafe({
      llmClient: this.llmClient,
      logger: this.logger,
      prompt,
      maxTokens: 120 * count,
      temperature: 0.7,
      timeoutMs: this.options.timeoutMs,
      promptName: "question_generation_v1",
    });

    if (!safe.ok) {
      const sentinel = safe.error_code === "blocked" ? QUESTIONS_BLOCKED_SENTINEL : QUESTIONS_FAILED_SENTINEL;
      return Array.from({ length: count }, () => sentinel);
    }

    const questions = parseQuestionLines(safe.text, count);
    this.logger.info("questions.generated", {
      requested: count,
      received: questions.length,
      interviewType: config.interviewType,
    });
    return questions;
  }

  async evaluateAnswer(config: InterviewConfig, question: string, answer: string): Promise<string> {
    const safe = await callTextPromptSafe({
      llmClient: this.llmClient,
      logger: this.logger,
      prompt: buildAnswerEvaluationV1Prompt({ config, question, answer }),
      maxTokens: 600,
      timeoutMs: this.options.timeoutMs,
      promptName: "answer_evaluation_v1",
    });
    if (!safe.ok) {
      return safe.error_code === "blocked" ? EVALUATION_BLOCKED_SENTINEL : EVALUATION_FAILED_SENTINEL;
    }
    return safe.text;
  }

  async synthesizeReport(config: InterviewConfig, records: ReadonlyArray<AnswerRecord>): Promise<string> {
    const averageScore = computeAverageScore(records);
    const safe = await callTextPromptSafe({
      llmClient: this.llmClient,
      logger: this.logger,
      prompt: buildFinalReportV1Prompt({ config, records, averageScore }),
      maxTokens: 1500,
      timeoutMs: this.options.timeoutMs,
      promptName: "final_report_v1",
    });
    if (!safe.ok) {
      return safe.error_code === "blocked" ? REPORT_BLOCKED_SENTINEL : REPORT_FAILED_SENTINEL;
    }
    this.logger.info("report.generated", {
      records: records.length,
      averageScore,
    });
    return safe.text;
  }
}

export function parseQuestionLines(text: string, limit: number): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim().replace(LIST_MARKER_PATTERN, "").trim())
    .filter((line) => line.length > 0)
    .slice(0, limit);
}
