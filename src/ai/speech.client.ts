import fetch from "node-fetch";

export const SUPPORTED_SPEECH_VOICES = ["alloy", "echo", "fable", "onyx", "nova", "shimmer"] as const;

export type SpeechVoice = (typeof SUPPORTED_SPEECH_VOICES)[number];

export interface TextToSpeechClient {
  synthesize(text: string): Promise<Buffer>;
}

export function parseSpeechVoice(value: string): SpeechVoice | null {
  const normalized = value.trim().toLowerCase();
  return SUPPORTED_SPEECH_VOICES.find((voice) => voice === normalized) ?? null;
}

export class SpeechClient implements TextToSpeechClient {
  constructor(
    private readonly apiKey: string,
    private readonly model: string,
    private readonly voice: SpeechVoice,
  ) {}

  async synthesize(text: string): Promise<Buffer> {
    const response = await fetch("https://api.openai.com/v1/audio/speech", {
      method: "POST",
      headers: {
        authorization: `Bearer ${this.apiKey}`,
        "content-type": "application/json",
      },
      body: JSON.stringify({
        model: this.model,
        voice: this.voice,
        input: text,
        response_format: "mp3",
      }),
    });

    if (!response.ok) {
      const body = await response.text();
      throw new Error(`Speech API error: HTTP ${response.status} - ${body}`);
    }

    return response.buffer();
  }
}
