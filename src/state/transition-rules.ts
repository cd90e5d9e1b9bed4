import { SessionPhase } from "../shared/types/interview.types";

const transitionRules: Record<SessionPhase, SessionPhase[]> = {
  setup: ["in_progress"],
  in_progress: ["in_progress", "summary", "setup"],
  summary: ["reported", "setup"],
  reported: ["setup"],
};

export function isAllowedTransition(from: SessionPhase, to: SessionPhase): boolean {
  return transitionRules[from].includes(to);
}
