import { AudioCapture, CapturedAudio, ListenOptions } from "../shared/types/voice.types";
import { AudioCaptureError } from "./audio-capture";

const EXTENSION_BY_CONTENT_TYPE: Record<string, string> = {
  "audio/webm": "webm",
  "audio/ogg": "ogg",
  "audio/wav": "wav",
  "audio/x-wav": "wav",
  "audio/mpeg": "mp3",
  "audio/mp4": "m4a",
  "audio/m4a": "m4a",
};

export interface UploadedAudio {
  buffer: Buffer;
  contentType?: string;
  durationMs?: number;
}

/**
 * Treats a clip recorded by the client as the capture device. The client
 * records with the same listen options; the server re-checks what it can
 * see: an empty body, or a declared duration outside the calibration and
 * utterance bounds.
 */
export class UploadedAudioCapture implements AudioCapture {
  constructor(private readonly upload: UploadedAudio) {}

  async listen(options: ListenOptions): Promise<CapturedAudio> {
    const { buffer, durationMs } = this.upload;
    if (buffer.length === 0) {
      throw new AudioCaptureError("no_audio", "No audio was detected in the recording.");
    }
    if (durationMs !== undefined && durationMs <= options.calibrationMs) {
      throw new AudioCaptureError("no_audio", "The recording ended before any speech was captured.");
    }
    if (durationMs !== undefined && durationMs > options.maxPhraseMs) {
      throw new AudioCaptureError(
        "device_error",
        `The recording is longer than the ${Math.round(options.maxPhraseMs / 1000)} second limit.`,
      );
    }

    const contentType = normalizeContentType(this.upload.contentType);
    return {
      buffer,
      contentType,
      fileName: `answer.${EXTENSION_BY_CONTENT_TYPE[contentType] ?? "webm"}`,
      durationMs,
    };
  }
}

export function parseDurationHeader(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") {
    return undefined;
  }
  const numeric = Number(value);
  if (!Number.isFinite(numeric) || numeric < 0) {
    return undefined;
  }
  return Math.round(numeric);
}

function normalizeContentType(value: string | undefined): string {
  const base = (value ?? "").split(";")[0]?.trim().toLowerCase() ?? "";
  return base.startsWith("audio/") ? base : "audio/webm";
}
