import { Logger, logContext } from "../config/logger";
import {
  AnswerRecord,
  InterviewConfig,
  NoticeCode,
  NoticeLevel,
  SessionAction,
  SessionNotice,
  SessionPhase,
  SessionState,
} from "../shared/types/interview.types";
import { AudioCapture, SpokenAnswer, TranscriptionFailure, TranscriptionFailureKind } from "../shared/types/voice.types";
import { assertTransition } from "../state/state-machine";
import { parseInterviewConfig } from "./interview-config";
import { InterviewGateway, isGatewaySentinel, isQuestionGenerationFailure } from "./interview-gateway.service";

export const SKIPPED_ANSWER = "Skipped";
export const NO_FEEDBACK = "No feedback.";

export interface SpokenAnswerSource {
  captureSpokenAnswer(capture: AudioCapture): Promise<SpokenAnswer>;
}

export interface InterviewSessionDeps {
  gateway: InterviewGateway;
  transcription: SpokenAnswerSource;
  logger: Logger;
}

export interface SessionView {
  phase: SessionPhase;
  config: InterviewConfig | null;
  currentQuestion: string | null;
  questionNumber: number | null;
  totalQuestions: number;
  records: AnswerRecord[];
  finalReport: string | null;
  draftAnswer: string;
  notice: SessionNotice | null;
}

export interface ActionOutcome {
  ok: boolean;
  notice: SessionNotice | null;
}

const VOICE_NOTICE_CODES: Record<TranscriptionFailureKind, { code: NoticeCode; level: NoticeLevel }> = {
  no_audio: { code: "voice_no_audio", level: "warning" },
  unrecognized: { code: "voice_unrecognized", level: "warning" },
  service_unavailable: { code: "voice_service_unavailable", level: "error" },
  device_error: { code: "voice_device_error", level: "error" },
};

/**
 * One interview practice session: Setup -> InProgress -> Summary -> Reported,
 * with reset back to Setup from anywhere. Actions run one at a time; an
 * action that arrives while another is awaiting the gateway is rejected.
 * Reset is always accepted and makes any in-flight result stale.
 */
export class InterviewSession {
  private phase: SessionPhase = "setup";
  private state: SessionState | null = null;
  private draftAnswer = "";
  private notice: SessionNotice | null = null;
  private pendingAction: SessionAction | null = null;
  private epoch = 0;

  constructor(
    readonly id: string,
    private readonly deps: InterviewSessionDeps,
  ) {}

  getPhase(): SessionPhase {
    return this.phase;
  }

  getView(): SessionView {
    const state = this.state;
    const currentQuestion =
      this.phase === "in_progress" && state ? (state.questions[state.currentIndex] ?? null) : null;
    return {
      phase: this.phase,
      config: state?.config ?? null,
      currentQuestion,
      questionNumber: currentQuestion !== null && state ? state.currentIndex + 1 : null,
      totalQuestions: state?.questions.length ?? 0,
      records: state ? [...state.records] : [],
      finalReport: state?.finalReport ?? null,
      draftAnswer: this.draftAnswer,
      notice: this.notice ? { ...this.notice } : null,
    };
  }

  getCurrentQuestion(): string | null {
    return this.getView().currentQuestion;
  }

  async startInterview(input: unknown): Promise<ActionOutcome> {
    const blocked = this.guard("start_interview", ["setup"]);
    if (blocked) {
      return blocked;
    }

    const parsed = parseInterviewConfig(input);
    if (!parsed.ok) {
      return this.reject("start_interview", "error", "invalid_config", parsed.error);
    }
    const config = parsed.config;

    const epoch = this.begin("start_interview");
    let questions: string[];
    try {
      questions = await this.deps.gateway.generateQuestions(config, config.questionCount);
    } finally {
      this.end(epoch);
    }
    if (epoch !== this.epoch) {
      return this.stale("start_interview");
    }

    if (isQuestionGenerationFailure(questions)) {
      return this.reject(
        "start_interview",
        "error",
        "generation_failed",
        "Failed to generate questions. Please check your API key and try again.",
      );
    }

    assertTransition(this.phase, "in_progress");
    this.state = {
      config,
      questions: Object.freeze([...questions]),
      currentIndex: 0,
      records: [],
      finalReport: undefined,
    };
    this.phase = "in_progress";
    this.draftAnswer = "";
    this.notice = null;
    this.log("info", "session.interview.started", "start_interview", {
      questions: questions.length,
      requested: config.questionCount,
      interviewType: config.interviewType,
    });
    return { ok: true, notice: null };
  }

  /**
   * Evaluates and records the answer. When `answer` is omitted the draft from
   * the last voice capture is used.
   */
  async submitAnswer(answer?: string): Promise<ActionOutcome> {
    const blocked = this.guard("submit_answer", ["in_progress"]);
    if (blocked) {
      return blocked;
    }
    const text = (answer ?? this.draftAnswer).trim();
    if (!text) {
      return this.reject("submit_answer", "warning", "empty_answer", "Please provide an answer before submitting.");
    }

    const state = this.requireState();
    const question = this.requireCurrentQuestion(state);
    const epoch = this.begin("submit_answer");
    let feedback: string;
    try {
      feedback = await this.deps.gateway.evaluateAnswer(state.config, question, text);
    } finally {
      this.end(epoch);
    }
    if (epoch !== this.epoch) {
      return this.stale("submit_answer");
    }

    const notice: SessionNotice | null = isGatewaySentinel(feedback)
      ? { level: "error", code: "evaluation_failed", message: feedback }
      : null;
    this.advance(state, { question, answer: text, feedback }, "submit_answer", notice);
    return { ok: true, notice };
  }

  async requestVoiceAnswer(capture: AudioCapture): Promise<ActionOutcome> {
    const blocked = this.guard("request_voice_answer", ["in_progress"]);
    if (blocked) {
      return blocked;
    }

    const epoch = this.begin("request_voice_answer");
    let spoken: SpokenAnswer;
    try {
      spoken = await this.deps.transcription.captureSpokenAnswer(capture);
    } finally {
      this.end(epoch);
    }
    if (epoch !== this.epoch) {
      return this.stale("request_voice_answer");
    }

    if (spoken.failure || !spoken.text) {
      const failure: TranscriptionFailure = spoken.failure ?? {
        kind: "unrecognized",
        message: "Could not understand your response.",
      };
      const mapped = VOICE_NOTICE_CODES[failure.kind];
      return this.reject("request_voice_answer", mapped.level, mapped.code, failure.message);
    }

    this.draftAnswer = spoken.text;
    this.notice = { level: "info", code: "voice_captured", message: `You said: ${spoken.text}` };
    this.log("info", "session.voice.captured", "request_voice_answer", { textChars: spoken.text.length });
    return { ok: true, notice: { ...this.notice } };
  }

  skipQuestion(): ActionOutcome {
    const blocked = this.guard("skip_question", ["in_progress"]);
    if (blocked) {
      return blocked;
    }
    const state = this.requireState();
    const question = this.requireCurrentQuestion(state);
    this.advance(state, { question, answer: SKIPPED_ANSWER, feedback: NO_FEEDBACK }, "skip_question", null);
    return { ok: true, notice: null };
  }

  async generateReport(): Promise<ActionOutcome> {
    if (this.phase === "reported" && this.pendingAction === null) {
      this.notice = {
        level: "info",
        code: "report_already_generated",
        message: "The final report has already been generated.",
      };
      return { ok: true, notice: { ...this.notice } };
    }
    const blocked = this.guard("generate_report", ["summary"]);
    if (blocked) {
      return blocked;
    }

    const state = this.requireState();
    const epoch = this.begin("generate_report");
    let report: string;
    try {
      report = await this.deps.gateway.synthesizeReport(state.config, state.records);
    } finally {
      this.end(epoch);
    }
    if (epoch !== this.epoch) {
      return this.stale("generate_report");
    }

    assertTransition(this.phase, "reported");
    state.finalReport = report;
    this.phase = "reported";
    this.notice = isGatewaySentinel(report) ? { level: "error", code: "report_failed", message: report } : null;
    this.log("info", "session.report.generated", "generate_report", {
      records: state.records.length,
      degraded: this.notice !== null,
    });
    return { ok: true, notice: this.notice ? { ...this.notice } : null };
  }

  resetSession(): ActionOutcome {
    const from = this.phase;
    if (from !== "setup") {
      assertTransition(from, "setup");
    }
    this.epoch += 1;
    this.phase = "setup";
    this.state = null;
    this.draftAnswer = "";
    this.notice = null;
    this.pendingAction = null;
    this.log("info", "session.reset", "reset_session", { from });
    return { ok: true, notice: null };
  }

  private advance(
    state: SessionState,
    record: AnswerRecord,
    action: SessionAction,
    notice: SessionNotice | null,
  ): void {
    state.records.push(Object.freeze({ ...record }));
    state.currentIndex += 1;
    if (state.currentIndex !== state.records.length) {
      throw new Error(`Session ${this.id} index ${state.currentIndex} diverged from ${state.records.length} records`);
    }

    const next: SessionPhase = state.currentIndex >= state.questions.length ? "summary" : "in_progress";
    assertTransition(this.phase, next);
    this.phase = next;
    this.draftAnswer = "";
    this.notice = notice;
    this.log("info", "session.question.advanced", action, {
      currentIndex: state.currentIndex,
      totalQuestions: state.questions.length,
      skipped: record.answer === SKIPPED_ANSWER,
    });
  }

  private guard(action: SessionAction, allowed: ReadonlyArray<SessionPhase>): ActionOutcome | null {
    if (this.pendingAction) {
      return this.reject(
        action,
        "error",
        "busy",
        `Please wait, ${this.pendingAction.replace(/_/g, " ")} is still in progress.`,
      );
    }
    if (!allowed.includes(this.phase)) {
      return this.reject(
        action,
        "error",
        "invalid_phase",
        `Cannot ${action.replace(/_/g, " ")} while the session is in ${this.phase.replace(/_/g, " ")}.`,
      );
    }
    return null;
  }

  private begin(action: SessionAction): number {
    this.pendingAction = action;
    return this.epoch;
  }

  private end(epoch: number): void {
    if (epoch === this.epoch) {
      this.pendingAction = null;
    }
  }

  private stale(action: SessionAction): ActionOutcome {
    this.log("warn", "session.action.discarded", action, { reason: "reset_during_action" });
    return { ok: false, notice: null };
  }

  private reject(action: SessionAction, level: NoticeLevel, code: NoticeCode, message: string): ActionOutcome {
    this.notice = { level, code, message };
    this.log(level === "error" ? "warn" : "info", "session.action.rejected", action, { error_code: code });
    return { ok: false, notice: { ...this.notice } };
  }

  private requireState(): SessionState {
    if (!this.state) {
      throw new Error(`Session ${this.id} has no interview state in phase ${this.phase}`);
    }
    return this.state;
  }

  private requireCurrentQuestion(state: SessionState): string {
    const question = state.questions[state.currentIndex];
    if (question === undefined) {
      throw new Error(`Session ${this.id} has no question at index ${state.currentIndex}`);
    }
    return question;
  }

  private log(
    level: "info" | "warn",
    message: string,
    action: SessionAction,
    fields?: Record<string, unknown>,
  ): void {
    logContext(this.deps.logger, level, message, { session_id: this.id, phase: this.phase, action }, fields);
  }
}
