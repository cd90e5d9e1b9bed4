import { SpeechToTextClient, TranscriptionError } from "../ai/transcription.client";
import { Logger } from "../config/logger";
import { AudioCapture, ListenOptions, SpokenAnswer, TranscriptionFailure } from "../shared/types/voice.types";
import { AudioCaptureError, DEFAULT_LISTEN_OPTIONS } from "./audio-capture";

export class TranscriptionAdapter {
  constructor(
    private readonly speechToText: SpeechToTextClient,
    private readonly logger: Logger,
    private readonly listenOptions: Readonly<ListenOptions> = DEFAULT_LISTEN_OPTIONS,
  ) {}

  getListenOptions(): Readonly<ListenOptions> {
    return this.listenOptions;
  }

  /**
   * Never throws. On any failure the text is empty and `failure` describes
   * what the user should be told.
   */
  async captureSpokenAnswer(capture: AudioCapture): Promise<SpokenAnswer> {
    const startedAt = Date.now();
    try {
      const audio = await capture.listen({ ...this.listenOptions });
      const text = await this.speechToText.transcribe(audio.buffer, audio.fileName, audio.contentType);
      this.logger.info("voice.transcribed", {
        latencyMs: Date.now() - startedAt,
        audioBytes: audio.buffer.length,
        durationMs: audio.durationMs,
        textChars: text.length,
      });
      return { text };
    } catch (error) {
      const failure = describeFailure(error);
      this.logger.warn("voice.transcription.failed", {
        latencyMs: Date.now() - startedAt,
        kind: failure.kind,
        error: error instanceof Error ? error.message : "Unknown error",
      });
      return { text: "", failure };
    }
  }
}

function describeFailure(error: unknown): TranscriptionFailure {
  if (error instanceof AudioCaptureError) {
    if (error.kind === "no_audio") {
      return { kind: "no_audio", message: error.message };
    }
    return { kind: "device_error", message: `Microphone error: ${error.message}` };
  }
  if (error instanceof TranscriptionError) {
    if (error.code === "empty_text") {
      return { kind: "unrecognized", message: "Could not understand your response." };
    }
    return { kind: "service_unavailable", message: "Speech recognition service unavailable." };
  }
  const detail = error instanceof Error ? error.message : "Unknown error";
  return { kind: "device_error", message: `Microphone error: ${detail}` };
}
