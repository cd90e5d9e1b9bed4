import { InterviewConfig, InterviewType } from "../shared/types/interview.types";

export const MIN_QUESTION_COUNT = 3;
export const MAX_QUESTION_COUNT = 10;
export const DEFAULT_QUESTION_COUNT = 5;

const INTERVIEW_TYPE_LABELS: Record<InterviewType, string> = {
  technical: "Technical Interview",
  behavioral: "Behavioral Interview",
};

export function interviewTypeLabel(type: InterviewType): string {
  return INTERVIEW_TYPE_LABELS[type];
}

export type InterviewConfigParseResult =
  | { ok: true; config: InterviewConfig }
  | { ok: false; error: string };

export function parseInterviewType(value: unknown): InterviewType | null {
  if (typeof value !== "string") {
    return null;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "technical" || normalized === "technical interview") {
    return "technical";
  }
  if (normalized === "behavioral" || normalized === "behavioral interview") {
    return "behavioral";
  }
  return null;
}

/**
 * Validates untrusted start-interview input. `domain` is optional and blank
 * values are dropped; `questionCount` defaults to 5.
 */
export function parseInterviewConfig(raw: unknown): InterviewConfigParseResult {
  if (!isRecord(raw)) {
    return { ok: false, error: "Interview config must be an object." };
  }
  const input = raw;

  const jobRole = typeof input.jobRole === "string" ? input.jobRole.trim() : "";
  if (!jobRole) {
    return { ok: false, error: "Job role is required." };
  }

  const interviewType = parseInterviewType(input.interviewType);
  if (!interviewType) {
    return { ok: false, error: "Interview type must be either technical or behavioral." };
  }

  let questionCount = DEFAULT_QUESTION_COUNT;
  if (input.questionCount !== undefined) {
    const numeric = typeof input.questionCount === "number" ? input.questionCount : Number.NaN;
    if (!Number.isInteger(numeric) || numeric < MIN_QUESTION_COUNT || numeric > MAX_QUESTION_COUNT) {
      return {
        ok: false,
        error: `Question count must be a whole number between ${MIN_QUESTION_COUNT} and ${MAX_QUESTION_COUNT}.`,
      };
    }
    questionCount = numeric;
  }

  if (input.domain !== undefined && input.domain !== null && typeof input.domain !== "string") {
    return { ok: false, error: "Domain must be text when provided." };
  }
  const domain = typeof input.domain === "string" ? input.domain.trim() : "";

  const config: InterviewConfig = domain
    ? { jobRole, domain, interviewType, questionCount }
    : { jobRole, interviewType, questionCount };
  return { ok: true, config: Object.freeze(config) };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
