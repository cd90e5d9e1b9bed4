import fetch from "node-fetch";
import FormData from "form-data";

interface TranscriptionResponse {
  text?: string;
}

export type TranscriptionErrorCode = "http_error" | "empty_text";

export class TranscriptionError extends Error {
  constructor(
    readonly code: TranscriptionErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "TranscriptionError";
  }
}

export interface SpeechToTextClient {
  transcribe(buffer: Buffer, fileName: string, contentType: string): Promise<string>;
}

export class TranscriptionClient implements SpeechToTextClient {
  constructor(
    private readonly apiKey: string,
    private readonly model: string,
  ) {}

  async transcribe(buffer: Buffer, fileName = "answer.webm", contentType = "audio/webm"): Promise<string> {
    const form = new FormData();
    form.append("model", this.model);
    form.append("file", buffer, {
      filename: fileName,
      contentType,
    });

    const response = await fetch("https://api.openai.com/v1/audio/transcriptions", {
      method: "POST",
      headers: {
        authorization: `Bearer ${this.apiKey}`,
        ...form.getHeaders(),
      },
      body: form,
    }).catch((error: unknown) => {
      throw new TranscriptionError(
        "http_error",
        `Transcription request failed: ${error instanceof Error ? error.message : "Unknown error"}`,
      );
    });

    if (!response.ok) {
      const body = await response.text();
      throw new TranscriptionError("http_error", `Transcription API error: HTTP ${response.status} - ${body}`);
    }

    const body = (await response.json()) as TranscriptionResponse;
    const text = typeof body.text === "string" ? body.text.trim() : "";
    if (!text) {
      throw new TranscriptionError("empty_text", "Transcription returned empty text.");
    }

    return text;
  }
}
