export type InterviewType = "technical" | "behavioral";

export interface InterviewConfig {
  readonly jobRole: string;
  readonly domain?: string;
  readonly interviewType: InterviewType;
  readonly questionCount: number;
}

export interface AnswerRecord {
  readonly question: string;
  readonly answer: string;
  readonly feedback: string;
}

export interface SessionState {
  readonly config: InterviewConfig;
  readonly questions: ReadonlyArray<string>;
  currentIndex: number;
  records: AnswerRecord[];
  finalReport?: string;
}

export type SessionPhase = "setup" | "in_progress" | "summary" | "reported";

export type SessionAction =
  | "start_interview"
  | "submit_answer"
  | "request_voice_answer"
  | "skip_question"
  | "generate_report"
  | "reset_session";

export type NoticeLevel = "error" | "warning" | "info";

export type NoticeCode =
  | "invalid_config"
  | "generation_failed"
  | "evaluation_failed"
  | "report_failed"
  | "empty_answer"
  | "voice_no_audio"
  | "voice_unrecognized"
  | "voice_service_unavailable"
  | "voice_device_error"
  | "voice_captured"
  | "report_already_generated"
  | "invalid_phase"
  | "busy";

export interface SessionNotice {
  level: NoticeLevel;
  code: NoticeCode;
  message: string;
}
