import "dotenv/config";
import { LlmClient } from "../src/ai/llm.client";
import { TranscriptionClient } from "../src/ai/transcription.client";
import { createLogger } from "../src/config/logger";
import { InterviewGatewayService } from "../src/interviews/interview-gateway.service";
import { InterviewSession } from "../src/interviews/interview-session";
import { computeAverageScore } from "../src/interviews/score-extraction";
import { TranscriptionAdapter } from "../src/voice/transcription.adapter";

async function run(): Promise<void> {
  const apiKey = process.env.OPENAI_API_KEY?.trim();
  if (!apiKey) {
    throw new Error("OPENAI_API_KEY is required for sanity:interview");
  }

  const logger = createLogger({ minLevel: "warn" });
  const llmClient = new LlmClient(apiKey, logger);
  const session = new InterviewSession("sanity", {
    gateway: new InterviewGatewayService(llmClient, logger),
    transcription: new TranscriptionAdapter(new TranscriptionClient(apiKey, "whisper-1"), logger),
    logger,
  });

  const started = await session.startInterview({
    jobRole: "Backend Engineer",
    domain: "Payments",
    interviewType: "technical",
    questionCount: 3,
  });
  if (!started.ok) {
    throw new Error(`Interview did not start: ${started.notice?.message ?? "unknown"}`);
  }
  console.log("First question:", session.getView().currentQuestion);

  const answered = await session.submitAnswer(
    "I would put an idempotency key on every payment request, store it with a unique index, and return the stored result when the same key arrives again.",
  );
  if (!answered.ok) {
    throw new Error(`Answer was not recorded: ${answered.notice?.message ?? "unknown"}`);
  }
  while (session.getPhase() === "in_progress") {
    session.skipQuestion();
  }

  const records = session.getView().records;
  console.log("First feedback:", records[0]?.feedback);
  console.log("Average score:", computeAverageScore(records).toFixed(1));

  await session.generateReport();
  const view = session.getView();
  if (view.phase !== "reported" || !view.finalReport) {
    throw new Error("Expected a final report");
  }
  console.log("Final report:\n", view.finalReport);
  console.log("interview sanity passed");
}

run().catch((error) => {
  console.error("interview sanity failed:", error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
