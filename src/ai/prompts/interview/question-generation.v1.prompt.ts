import { interviewTypeLabel } from "../../../interviews/interview-config";
import { InterviewConfig } from "../../../shared/types/interview.types";

const TYPE_GUIDANCE: Record<InterviewConfig["interviewType"], string> = {
  technical: "Include questions on algorithms, data structures, and core concepts relevant to the role.",
  behavioral: "Ensure these are STAR-format behavioral questions.",
};

export function buildQuestionGenerationV1Prompt(input: { config: InterviewConfig; count: number }): string {
  const { config, count } = input;
  const parts = [
    `As an expert interviewer, generate ${count} questions for a ${config.jobRole} ${interviewTypeLabel(config.interviewType)}.`,
  ];
  if (config.domain) {
    parts.push(`Focus on the ${config.domain} domain.`);
  }
  parts.push(TYPE_GUIDANCE[config.interviewType]);
  parts.push(
    "Provide only the questions, one per line, without any numbering, bullet points, or introductory/concluding remarks.",
  );
  return parts.join(" ");
}
