import { AnswerRecord } from "../shared/types/interview.types";

// "Score: 7/10", tolerating markdown emphasis and "[7]" brackets.
const SCORE_PATTERN = /Score:\s*\**\s*\[?(\d{1,2})\]?\s*\/\s*10/;

export function extractScore(feedback: string): number | null {
  const match = SCORE_PATTERN.exec(feedback);
  if (!match?.[1]) {
    return null;
  }
  return Number.parseInt(match[1], 10);
}

/**
 * Mean of the parseable scores, truncated to one decimal place. Records
 * without a score count toward neither the sum nor the divisor; with no
 * scores at all the average is 0.
 */
export function computeAverageScore(records: ReadonlyArray<AnswerRecord>): number {
  let total = 0;
  let scored = 0;
  for (const record of records) {
    const score = extractScore(record.feedback);
    if (score === null) {
      continue;
    }
    total += score;
    scored += 1;
  }
  if (scored === 0) {
    return 0;
  }
  return Math.trunc((total * 10) / scored) / 10;
}
