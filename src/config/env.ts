import dotenv from "dotenv";
import { LogLevel, parseLogLevel } from "./logger";

dotenv.config();

export const API_KEY_ENV_NAME = "OPENAI_API_KEY";

export interface EnvConfig {
  nodeEnv: string;
  logLevel: LogLevel;
  port: number;
  openaiApiKey: string;
  openaiChatModel: string;
  openaiTranscriptionModel: string;
  openaiSpeechModel: string;
  openaiSpeechVoice: string;
  speechOutputEnabled: boolean;
  llmTimeoutMs: number;
  maxSessions: number;
}

type EnvSource = Record<string, string | undefined>;

export class ConfigurationError extends Error {
  constructor(
    message: string,
    readonly remediation: string,
  ) {
    super(message);
    this.name = "ConfigurationError";
  }
}

function getRequiredString(source: EnvSource, name: string, remediation: string): string {
  const trimmed = source[name]?.trim();
  if (!trimmed) {
    throw new ConfigurationError(`Missing required environment variable: ${name}`, remediation);
  }
  return trimmed;
}

function getOptionalTrimmed(source: EnvSource, name: string): string | undefined {
  const value = source[name];
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function loadEnv(source: EnvSource = process.env): EnvConfig {
  const portRaw = source.PORT ?? "3000";
  const port = Number(portRaw);
  const llmTimeoutRaw = source.LLM_TIMEOUT_MS ?? "45000";
  const llmTimeoutMs = Number(llmTimeoutRaw);
  const maxSessionsRaw = source.MAX_SESSIONS ?? "200";
  const maxSessions = Number(maxSessionsRaw);
  const speechOutputEnabled = parseBoolean(source.SPEECH_OUTPUT_ENABLED ?? "true");
  const logLevelRaw = (source.LOG_LEVEL ?? "info").trim().toLowerCase();
  const logLevel = parseLogLevel(logLevelRaw);
  if (!logLevel) {
    throw new Error(`Invalid LOG_LEVEL value: ${logLevelRaw}`);
  }

  if (!Number.isInteger(port) || port <= 0) {
    throw new Error(`Invalid PORT value: ${portRaw}`);
  }
  if (!Number.isInteger(llmTimeoutMs) || llmTimeoutMs < 1000) {
    throw new Error(`Invalid LLM_TIMEOUT_MS value: ${llmTimeoutRaw}`);
  }
  if (!Number.isInteger(maxSessions) || maxSessions < 1) {
    throw new Error(`Invalid MAX_SESSIONS value: ${maxSessionsRaw}`);
  }

  return {
    nodeEnv: source.NODE_ENV ?? "development",
    logLevel,
    port,
    openaiApiKey: getRequiredString(
      source,
      API_KEY_ENV_NAME,
      `Create a .env file next to package.json containing ${API_KEY_ENV_NAME}=<your key>, or export ${API_KEY_ENV_NAME} before starting the server.`,
    ),
    openaiChatModel: getOptionalTrimmed(source, "OPENAI_CHAT_MODEL") ?? "gpt-4o-mini",
    openaiTranscriptionModel: getOptionalTrimmed(source, "OPENAI_TRANSCRIPTION_MODEL") ?? "whisper-1",
    openaiSpeechModel: getOptionalTrimmed(source, "OPENAI_SPEECH_MODEL") ?? "tts-1",
    openaiSpeechVoice: getOptionalTrimmed(source, "OPENAI_SPEECH_VOICE") ?? "alloy",
    speechOutputEnabled,
    llmTimeoutMs,
    maxSessions,
  };
}

function parseBoolean(value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (normalized === "true" || normalized === "1" || normalized === "yes") {
    return true;
  }
  if (normalized === "false" || normalized === "0" || normalized === "no") {
    return false;
  }
  throw new Error(`Invalid boolean value: ${value}`);
}
