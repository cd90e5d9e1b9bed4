import { interviewTypeLabel } from "../../../interviews/interview-config";
import { AnswerRecord, InterviewConfig } from "../../../shared/types/interview.types";

export function buildFinalReportV1Prompt(input: {
  config: InterviewConfig;
  records: ReadonlyArray<AnswerRecord>;
  averageScore: number;
}): string {
  const { config, records, averageScore } = input;
  const parts = [
    `Generate a final interview summary report for a ${config.jobRole} ${interviewTypeLabel(config.interviewType)} based on the following interactions:`,
  ];

  for (const record of records) {
    parts.push(
      `\n---\nQuestion: ${record.question}\nCandidate's Answer: ${record.answer}\nFeedback Given: ${record.feedback}`,
    );
  }

  parts.push(
    `\n---\nBased on all interactions (average score: ${averageScore.toFixed(1)}/10), provide a comprehensive final report with these sections:`,
  );
  parts.push("1. **Overall Strengths** (in bullet points)");
  parts.push("2. **Overall Areas for Improvement** (in bullet points)");
  parts.push("3. **Suggested Resources** for further learning");
  parts.push("4. A final overall rating formatted as: '**Final Score: [score]/10**'");
  return parts.join("\n");
}
