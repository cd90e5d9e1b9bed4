import { randomUUID } from "node:crypto";
import { InterviewSession, InterviewSessionDeps } from "../interviews/interview-session";

interface StateServiceOptions {
  maxSessions: number;
  generateId?: () => string;
}

/**
 * In-memory registry of interview sessions. Nothing survives a restart.
 * When full, the least recently created session is dropped.
 */
export class StateService {
  private readonly sessions = new Map<string, InterviewSession>();
  private readonly generateId: () => string;

  constructor(
    private readonly deps: InterviewSessionDeps,
    private readonly options: StateServiceOptions,
  ) {
    this.generateId = options.generateId ?? randomUUID;
  }

  create(): InterviewSession {
    while (this.sessions.size >= this.options.maxSessions) {
      const oldest = this.sessions.keys().next();
      if (oldest.done) {
        break;
      }
      this.sessions.delete(oldest.value);
      this.deps.logger.info("session.evicted", { session_id: oldest.value });
    }

    const session = new InterviewSession(this.generateId(), this.deps);
    this.sessions.set(session.id, session);
    return session;
  }

  getSession(sessionId: string): InterviewSession | null {
    return this.sessions.get(sessionId) ?? null;
  }

  delete(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  size(): number {
    return this.sessions.size;
  }
}
