import fetch from "node-fetch";
import { Logger } from "../config/logger";
import { COACH_SYSTEM_PROMPT } from "./system/coach.system";

export const CHAT_MODEL = process.env.OPENAI_CHAT_MODEL || "gpt-4o-mini";

const CHAT_COMPLETIONS_URL = "https://api.openai.com/v1/chat/completions";

export interface ChatCompletionsRequestBody {
  model: string;
  temperature: number;
  messages: Array<{
    role: "system" | "user";
    content: string;
  }>;
  max_tokens?: number;
  max_completion_tokens?: number;
}

export interface ChatCompletionsResponse {
  choices?: Array<{
    finish_reason?: string | null;
    message?: {
      content?: string | null;
      refusal?: string | null;
    };
  }>;
}

export interface LlmCallOptions {
  promptName?: string;
  temperature?: number;
}

/**
 * Minimal surface the gateway and tests depend on.
 */
export interface LlmTextClient {
  generateText(prompt: string, maxTokens: number, options?: LlmCallOptions): Promise<string>;
  getModelName?(): string;
}

export class LlmBlockedError extends Error {
  constructor(readonly reason: string) {
    super(`LLM response blocked: ${reason}`);
    this.name = "LlmBlockedError";
  }
}

export class LlmClient implements LlmTextClient {
  private readonly chatModel: string;

  constructor(
    private readonly apiKey: string,
    private readonly logger: Logger,
    modelOverride?: string,
  ) {
    this.chatModel = modelOverride || CHAT_MODEL;
    if (!COACH_SYSTEM_PROMPT.trim()) {
      throw new Error("COACH_SYSTEM_PROMPT is empty. Refusing to start.");
    }
  }

  getModelName(): string {
    return this.chatModel;
  }

  async generateText(prompt: string, maxTokens: number, options?: LlmCallOptions): Promise<string> {
    const startedAt = Date.now();
    const promptName = options?.promptName ?? "text";
    const requestBody = this.buildRequestBody(prompt, maxTokens, options?.temperature ?? 0.4);
    try {
      const response = await fetch(CHAT_COMPLETIONS_URL, {
        method: "POST",
        headers: {
          authorization: `Bearer ${this.apiKey}`,
          "content-type": "application/json",
        },
        body: JSON.stringify(requestBody),
      });

      if (!response.ok) {
        const body = await response.text();
        throw new Error(`OpenAI API error: HTTP ${response.status} - ${body}`);
      }

      const body = (await response.json()) as ChatCompletionsResponse;
      const content = readCompletionText(body);

      this.logger.info("llm.call.completed", {
        promptName,
        modelName: this.chatModel,
        latencyMs: Date.now() - startedAt,
        maxTokens,
        promptChars: prompt.length,
        outputChars: content.length,
      });
      return content;
    } catch (error) {
      if (error instanceof LlmBlockedError) {
        this.logger.warn("llm.call.blocked", {
          promptName,
          modelName: this.chatModel,
          latencyMs: Date.now() - startedAt,
          reason: error.reason,
        });
        throw error;
      }
      this.logger.warn("llm.call.failed", {
        promptName,
        modelName: this.chatModel,
        latencyMs: Date.now() - startedAt,
        maxTokens,
        error: error instanceof Error ? error.message : "Unknown error",
      });
      throw error;
    }
  }

  buildRequestBody(prompt: string, maxTokens: number, temperature: number): ChatCompletionsRequestBody {
    const body: ChatCompletionsRequestBody = {
      model: this.chatModel,
      temperature,
      messages: [
        {
          role: "system",
          content: COACH_SYSTEM_PROMPT,
        },
        {
          role: "user",
          content: prompt,
        },
      ],
    };
    if (usesMaxCompletionTokens(this.chatModel)) {
      body.max_completion_tokens = maxTokens;
    } else {
      body.max_tokens = maxTokens;
    }
    return body;
  }
}

/**
 * Extracts the assistant text from a completion. A content-filter finish or an
 * explicit refusal throws LlmBlockedError, an empty message throws a plain Error.
 */
export function readCompletionText(body: ChatCompletionsResponse): string {
  const choice = body.choices?.[0];
  if (!choice) {
    throw new Error("OpenAI response does not contain choices");
  }
  if (choice.finish_reason === "content_filter") {
    throw new LlmBlockedError("content_filter");
  }
  const refusal = choice.message?.refusal?.trim();
  if (refusal) {
    throw new LlmBlockedError(refusal);
  }
  const content = choice.message?.content?.trim();
  if (!content) {
    throw new Error("OpenAI response does not contain message content");
  }
  return content;
}

function usesMaxCompletionTokens(model: string): boolean {
  const normalized = model.trim().toLowerCase();
  return normalized.startsWith("gpt-5") || /^o\d/.test(normalized);
}
