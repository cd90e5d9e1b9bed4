import express, { ErrorRequestHandler, Express, Request, Response } from "express";
import { LlmClient } from "./ai/llm.client";
import { SpeechToTextClient, TranscriptionClient } from "./ai/transcription.client";
import { buildSessionController } from "./api/session.controller";
import { EnvConfig } from "./config/env";
import { createLogger, Logger } from "./config/logger";
import { InterviewGateway, InterviewGatewayService } from "./interviews/interview-gateway.service";
import { StateService } from "./state/state.service";
import { SpeechEngineFactory, SpeechOutputAdapter } from "./voice/speech-output.adapter";
import { TranscriptionAdapter } from "./voice/transcription.adapter";

export interface AppContext {
  app: Express;
  logger: Logger;
  stateService: StateService;
  speechOutput: SpeechOutputAdapter;
}

/**
 * Replaces the OpenAI-backed collaborators, e.g. with in-process fakes.
 */
export interface AppOverrides {
  logger?: Logger;
  gateway?: InterviewGateway;
  speechToText?: SpeechToTextClient;
  speechEngineFactory?: SpeechEngineFactory;
}

const PARSER_ERROR_MESSAGES: Record<number, string> = {
  400: "Malformed request body",
  413: "Request body too large",
};

export function createApp(env: EnvConfig, overrides: AppOverrides = {}): AppContext {
  const logger = overrides.logger ?? createLogger({ minLevel: env.logLevel });
  const app = express();

  app.use(express.json({ limit: "1mb" }));

  const gateway =
    overrides.gateway ??
    new InterviewGatewayService(new LlmClient(env.openaiApiKey, logger, env.openaiChatModel), logger, {
      timeoutMs: env.llmTimeoutMs,
    });
  const speechToText =
    overrides.speechToText ?? new TranscriptionClient(env.openaiApiKey, env.openaiTranscriptionModel);
  const transcription = new TranscriptionAdapter(speechToText, logger);

  const speechOutput = new SpeechOutputAdapter(logger, overrides.speechEngineFactory);
  speechOutput.initialize({
    enabled: env.speechOutputEnabled,
    apiKey: env.openaiApiKey,
    model: env.openaiSpeechModel,
    voice: env.openaiSpeechVoice,
  });

  const stateService = new StateService(
    { gateway, transcription, logger },
    { maxSessions: env.maxSessions },
  );

  app.get("/health", (_request: Request, response: Response) => {
    response.status(200).json({
      ok: true,
      speechOutput: speechOutput.isAvailable(),
      speechOutputError: speechOutput.getInitError(),
    });
  });

  app.use(
    "/api/sessions",
    buildSessionController({
      stateService,
      speechOutput,
      listenOptions: transcription.getListenOptions(),
      logger,
    }),
  );

  const handleError: ErrorRequestHandler = (error: unknown, request, response, next) => {
    if (response.headersSent) {
      next(error);
      return;
    }
    const status = readErrorStatus(error);
    logger.warn("http.request.failed", {
      method: request.method,
      path: request.path,
      status,
      error: error instanceof Error ? error.message : "Unknown error",
    });
    const message = PARSER_ERROR_MESSAGES[status] ?? (status < 500 ? "Invalid request" : "Internal error");
    response.status(status).json({ ok: false, error: message });
  };
  app.use(handleError);

  return { app, logger, stateService, speechOutput };
}

// Body parsers tag their errors with an HTTP status.
function readErrorStatus(error: unknown): number {
  if (typeof error === "object" && error !== null && "status" in error) {
    const status = error.status;
    if (typeof status === "number" && status >= 400 && status < 600) {
      return status;
    }
  }
  return 500;
}
