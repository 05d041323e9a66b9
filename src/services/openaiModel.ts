import OpenAI from "openai";

import type { AiConfig } from "../config";
import { AnalysisError, EmptyResponse, InvalidInput, TransientModelError, type TransientReason, errorMessage } from "../errors";
import { safeStr } from "../utils/text";

export interface ModelInvoker {
  invoke(prompt: string): Promise<string>;
}

export type ChatRequest = {
  model: string;
  messages: Array<{ role: "user"; content: string }>;
  temperature: number;
  top_p: number;
  max_tokens: number;
};

export type ChatReply = {
  choices: Array<{ message?: { content?: string | null } | null }>;
};

export type ChatComplete = (body: ChatRequest) => Promise<ChatReply>;

function statusOf(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null) return undefined;
  const status = "status" in err ? err.status : undefined;
  return typeof status === "number" ? status : undefined;
}

function reasonFor(status: number | undefined): TransientReason {
  if (status === undefined) return "connection_error";
  if (status === 429) return "quota_exceeded";
  if (status === 401 || status === 403) return "bad_api_key";
  return "openai_error";
}

export function createChatComplete(ai: AiConfig): ChatComplete {
  const client = new OpenAI({
    apiKey: ai.apiKey,
    baseURL: ai.baseURL,
    timeout: ai.timeoutMs,
    // RetryController owns retrying
    maxRetries: 0,
  });
  return (body) => client.chat.completions.create(body);
}

/**
 * One blocking chat completion per invoke(). Every SDK or network failure
 * comes back as a TransientModelError; a reply without text is EmptyResponse.
 */
export class OpenAIModelInvoker implements ModelInvoker {
  private readonly ai: AiConfig;
  private readonly complete: ChatComplete;

  constructor(ai: AiConfig, complete: ChatComplete = createChatComplete(ai)) {
    this.ai = ai;
    this.complete = complete;
  }

  async invoke(prompt: string): Promise<string> {
    if (!safeStr(prompt)) throw new InvalidInput("Prompt is empty");

    let reply: ChatReply;
    try {
      reply = await this.complete({
        model: this.ai.model,
        messages: [{ role: "user", content: prompt }],
        temperature: this.ai.temperature,
        top_p: this.ai.topP,
        max_tokens: this.ai.maxOutputTokens,
      });
    } catch (e: unknown) {
      if (e instanceof AnalysisError) throw e;
      const status = statusOf(e);
      throw new TransientModelError(`AI model error: ${errorMessage(e)}`, reasonFor(status), status, { cause: e });
    }

    const raw = safeStr(reply.choices[0]?.message?.content);
    if (!raw) throw new EmptyResponse("AI model returned no text");
    return raw;
  }
}
