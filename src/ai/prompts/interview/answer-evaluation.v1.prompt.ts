import { interviewTypeLabel } from "../../../interviews/interview-config";
import { InterviewConfig } from "../../../shared/types/interview.types";

const EVALUATION_CRITERIA: Record<InterviewConfig["interviewType"], string> = {
  technical: "technical accuracy, problem-solving approach, and clarity",
  behavioral: "adherence to STAR format (Situation, Task, Action, Result), relevance, and clarity",
};

export function buildAnswerEvaluationV1Prompt(input: {
  config: InterviewConfig;
  question: string;
  answer: string;
}): string {
  const { config, question, answer } = input;
  const context = [`The candidate is interviewing for a ${config.jobRole} role (${interviewTypeLabel(config.interviewType)}).`];
  if (config.domain) {
    context.push(`The domain is ${config.domain}.`);
  }

  return [
    "You are an experienced interviewer. Evaluate the candidate's answer.",
    `Context: ${context.join(" ")}`,
    `Question: "${question}"`,
    `Candidate's Answer: "${answer}"`,
    "",
    "Provide:",
    `1. A brief feedback comment on strengths and weaknesses, focusing on ${EVALUATION_CRITERIA[config.interviewType]}.`,
    '2. A score for the answer, formatted exactly as: "Score: [score]/10".',
    "3. A suggestion for improvement.",
    "",
    'Use these exact headings: "Feedback:", "Score:", and "Improvement Suggestion:".',
  ].join("\n");
}
