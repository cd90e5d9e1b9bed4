import { parseSpeechVoice, SpeechClient, TextToSpeechClient } from "../ai/speech.client";
import { Logger } from "../config/logger";

export interface SpeechOutputSettings {
  enabled: boolean;
  apiKey: string;
  model: string;
  voice: string;
}

export type SpeechEngineFactory = (settings: SpeechOutputSettings) => TextToSpeechClient;

const defaultEngineFactory: SpeechEngineFactory = (settings) => {
  const voice = parseSpeechVoice(settings.voice);
  if (!voice) {
    throw new Error(`Unsupported speech voice: ${settings.voice}`);
  }
  if (!settings.model.trim()) {
    throw new Error("Speech model is not configured");
  }
  return new SpeechClient(settings.apiKey, settings.model, voice);
};

/**
 * Process-wide text-to-speech output. The engine is built once by
 * `initialize`; when that fails the error is logged a single time and every
 * later `speak` call returns null without touching the engine.
 */
export class SpeechOutputAdapter {
  private engine: TextToSpeechClient | null = null;
  private initialized = false;
  private initError: string | null = null;

  constructor(
    private readonly logger: Logger,
    private readonly engineFactory: SpeechEngineFactory = defaultEngineFactory,
  ) {}

  initialize(settings: SpeechOutputSettings): void {
    if (this.initialized) {
      return;
    }
    this.initialized = true;
    if (!settings.enabled) {
      this.logger.info("speech.output.disabled");
      return;
    }
    try {
      this.engine = this.engineFactory(settings);
      this.logger.info("speech.output.ready", { model: settings.model, voice: settings.voice });
    } catch (error) {
      this.initError = error instanceof Error ? error.message : "Unknown error";
      this.logger.error("Failed to initialize text-to-speech engine", { error: this.initError });
    }
  }

  isAvailable(): boolean {
    return this.engine !== null;
  }

  getInitError(): string | null {
    return this.initError;
  }

  async speak(text: string): Promise<Buffer | null> {
    const engine = this.engine;
    const trimmed = text.trim();
    if (!engine || !trimmed) {
      return null;
    }
    try {
      return await engine.synthesize(trimmed);
    } catch (error) {
      this.logger.error("TTS error", { error: error instanceof Error ? error.message : "Unknown error" });
      return null;
    }
  }
}
