import { Logger } from "../config/logger";
import { LlmBlockedError, LlmTextClient } from "./llm.client";

export interface TextSafeCallArgs {
  llmClient: LlmTextClient;
  prompt: string;
  maxTokens: number;
  promptName: string;
  temperature?: number;
  logger?: Logger;
  timeoutMs?: number;
}

export type SafeTextErrorCode = "blocked" | "timeout" | "llm_failure";

export type SafeTextResult =
  | { ok: true; text: string }
  | { ok: false; error_code: SafeTextErrorCode; detail: string };

const DEFAULT_TIMEOUT_MS = 45_000;

// Single attempt: a failure is terminal for the call and is returned, never retried.
export async function callTextPromptSafe(args: TextSafeCallArgs): Promise<SafeTextResult> {
  const timeoutMs = normalizeTimeout(args.timeoutMs);
  try {
    const text = await withTimeout(
      args.llmClient.generateText(args.prompt, args.maxTokens, {
        promptName: args.promptName,
        temperature: args.temperature,
      }),
      timeoutMs,
    );
    return { ok: true, text: text.trim() };
  } catch (error) {
    const errorCode: SafeTextErrorCode =
      error instanceof LlmBlockedError ? "blocked" : isTimeoutError(error) ? "timeout" : "llm_failure";
    const detail = error instanceof Error ? error.message : "Unknown error";
    args.logger?.warn("llm.safe.failed", {
      promptName: args.promptName,
      modelName: args.llmClient.getModelName?.(),
      errorCode,
      error: detail,
    });
    return { ok: false, error_code: errorCode, detail };
  }
}

function normalizeTimeout(value?: number): number {
  if (typeof value === "number" && Number.isFinite(value) && value > 0) {
    return Math.round(value);
  }
  return DEFAULT_TIMEOUT_MS;
}

function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new Error("timeout"));
    }, timeoutMs);
    promise
      .then((value) => {
        clearTimeout(timer);
        resolve(value);
      })
      .catch((error: unknown) => {
        clearTimeout(timer);
        reject(error);
      });
  });
}

function isTimeoutError(error: unknown): boolean {
  const message = error instanceof Error ? error.message.toLowerCase() : "";
  return message.includes("timeout");
}
