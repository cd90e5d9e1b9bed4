import express, { Request, Response, Router } from "express";
import { Logger } from "../config/logger";
import { ActionOutcome, InterviewSession } from "../interviews/interview-session";
import { StateService } from "../state/state.service";
import { ListenOptions } from "../shared/types/voice.types";
import { parseDurationHeader, UploadedAudioCapture } from "../voice/uploaded-audio.capture";
import { SpeechOutputAdapter } from "../voice/speech-output.adapter";

interface SessionControllerDeps {
  stateService: StateService;
  speechOutput: SpeechOutputAdapter;
  listenOptions: Readonly<ListenOptions>;
  logger: Logger;
}

const MAX_AUDIO_UPLOAD = "10mb";

export function buildSessionController(deps: SessionControllerDeps): Router {
  const router = Router();

  function findSession(request: Request, response: Response): InterviewSession | null {
    const session = deps.stateService.getSession(String(request.params.sessionId ?? ""));
    if (!session) {
      response.status(404).json({ ok: false, error: "Session not found" });
      return null;
    }
    return session;
  }

  function sendOutcome(response: Response, session: InterviewSession, outcome: ActionOutcome): void {
    response.status(200).json({
      ok: outcome.ok,
      notice: outcome.notice,
      session: renderSession(session, deps.listenOptions),
    });
  }

  function handle(
    action: string,
    run: (session: InterviewSession, request: Request) => Promise<ActionOutcome> | ActionOutcome,
  ) {
    return async (request: Request, response: Response): Promise<void> => {
      const session = findSession(request, response);
      if (!session) {
        return;
      }
      try {
        const outcome = await run(session, request);
        sendOutcome(response, session, outcome);
      } catch (error) {
        deps.logger.error("Failed to process session action", {
          session_id: session.id,
          action,
          error: error instanceof Error ? error.message : "Unknown error",
        });
        response.status(500).json({ ok: false, error: "Internal error" });
      }
    };
  }

  router.post("/", (_request: Request, response: Response) => {
    const session = deps.stateService.create();
    deps.logger.info("session.created", { session_id: session.id });
    response.status(201).json({
      ok: true,
      sessionId: session.id,
      session: renderSession(session, deps.listenOptions),
    });
  });

  router.get("/:sessionId", (request: Request, response: Response) => {
    const session = findSession(request, response);
    if (!session) {
      return;
    }
    response.status(200).json({ ok: true, session: renderSession(session, deps.listenOptions) });
  });

  router.delete("/:sessionId", (request: Request, response: Response) => {
    const deleted = deps.stateService.delete(String(request.params.sessionId ?? ""));
    response.status(deleted ? 200 : 404).json(deleted ? { ok: true } : { ok: false, error: "Session not found" });
  });

  router.post(
    "/:sessionId/start",
    handle("start_interview", (session, request) => session.startInterview(request.body)),
  );

  router.post(
    "/:sessionId/answer",
    handle("submit_answer", (session, request) => {
      const answer = readAnswerField(request.body);
      return session.submitAnswer(answer);
    }),
  );

  router.post(
    "/:sessionId/voice-answer",
    express.raw({ type: ["audio/*", "application/octet-stream"], limit: MAX_AUDIO_UPLOAD }),
    handle("request_voice_answer", (session, request) => {
      const capture = new UploadedAudioCapture({
        buffer: Buffer.isBuffer(request.body) ? request.body : Buffer.alloc(0),
        contentType: request.header("content-type"),
        durationMs: parseDurationHeader(request.header("x-audio-duration-ms")),
      });
      return session.requestVoiceAnswer(capture);
    }),
  );

  router.post(
    "/:sessionId/skip",
    handle("skip_question", (session) => session.skipQuestion()),
  );

  router.post(
    "/:sessionId/report",
    handle("generate_report", (session) => session.generateReport()),
  );

  router.post(
    "/:sessionId/reset",
    handle("reset_session", (session) => session.resetSession()),
  );

  router.get("/:sessionId/question/audio", async (request: Request, response: Response) => {
    const session = findSession(request, response);
    if (!session) {
      return;
    }
    const question = session.getCurrentQuestion();
    if (!question) {
      response.status(409).json({ ok: false, error: "No question is currently being asked" });
      return;
    }
    const audio = await deps.speechOutput.speak(question);
    if (!audio) {
      response.status(204).end();
      return;
    }
    response.status(200).type("audio/mpeg").send(audio);
  });

  return router;
}

/**
 * An omitted or null `answer` means "use the draft". Any other non-text value
 * is read as an empty answer so it is rejected instead of submitting the draft.
 */
export function readAnswerField(body: unknown): string | undefined {
  if (typeof body !== "object" || body === null || !("answer" in body)) {
    return undefined;
  }
  if (body.answer === undefined || body.answer === null) {
    return undefined;
  }
  return typeof body.answer === "string" ? body.answer : "";
}

function renderSession(session: InterviewSession, listenOptions: Readonly<ListenOptions>) {
  return {
    id: session.id,
    ...session.getView(),
    listenOptions,
  };
}
