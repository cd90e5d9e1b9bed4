import { ListenOptions } from "../shared/types/voice.types";

export const DEFAULT_LISTEN_OPTIONS: Readonly<ListenOptions> = Object.freeze({
  calibrationMs: 500,
  startTimeoutMs: 15_000,
  maxPhraseMs: 45_000,
});

export type AudioCaptureErrorKind = "no_audio" | "device_error";

export class AudioCaptureError extends Error {
  constructor(
    readonly kind: AudioCaptureErrorKind,
    message: string,
  ) {
    super(message);
    this.name = "AudioCaptureError";
  }
}
