/**
 * Recording bounds shared with the client. The client stops waiting for speech
 * after `startTimeoutMs`; the server can only check the uploaded clip against
 * `calibrationMs` and `maxPhraseMs`.
 */
export interface ListenOptions {
  calibrationMs: number;
  startTimeoutMs: number;
  maxPhraseMs: number;
}

export interface CapturedAudio {
  buffer: Buffer;
  fileName: string;
  contentType: string;
  durationMs?: number;
}

export interface AudioCapture {
  listen(options: ListenOptions): Promise<CapturedAudio>;
}

export type TranscriptionFailureKind = "no_audio" | "unrecognized" | "service_unavailable" | "device_error";

export interface TranscriptionFailure {
  kind: TranscriptionFailureKind;
  message: string;
}

export interface SpokenAnswer {
  text: string;
  failure?: TranscriptionFailure;
}
