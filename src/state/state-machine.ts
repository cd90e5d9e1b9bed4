import { SessionPhase } from "../shared/types/interview.types";
import { isAllowedTransition } from "./transition-rules";

export function assertTransition(from: SessionPhase, to: SessionPhase): void {
  if (!isAllowedTransition(from, to)) {
    throw new Error(`Invalid transition from ${from} to ${to}`);
  }
}
