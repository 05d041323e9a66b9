import { describe, expect, it, vi } from "vitest";
import { loadConfig } from "../src/config";
import { EmptyResponse, InvalidInput, TransientModelError } from "../src/errors";
import { OpenAIModelInvoker, type ChatReply, type ChatRequest } from "../src/services/openaiModel";

const ai = loadConfig({ OPENAI_API_KEY: "test-key" }).ai;

function reply(content: string | null): ChatReply {
  return { choices: [{ message: { content } }] };
}

function httpError(status: number, message: string): Error {
  return Object.assign(new Error(message), { status });
}

describe("OpenAIModelInvoker", () => {
  it("sends one chat completion with the fixed generation settings", async () => {
    const complete = vi.fn(async (_body: ChatRequest) => reply('  {"JD Match": "70%"}  '));
    const invoker = new OpenAIModelInvoker(ai, complete);

    await expect(invoker.invoke("evaluate this")).resolves.toBe('{"JD Match": "70%"}');
    expect(complete).toHaveBeenCalledTimes(1);
    expect(complete).toHaveBeenCalledWith({
      model: "gpt-4.1-mini",
      messages: [{ role: "user", content: "evaluate this" }],
      temperature: 0.1,
      top_p: 0.8,
      max_tokens: 1024,
    });
  });

  it("raises EmptyResponse when the reply has no text", async () => {
    const invoker = new OpenAIModelInvoker(ai, async () => reply(null));
    await expect(invoker.invoke("p")).rejects.toBeInstanceOf(EmptyResponse);

    const noChoices = new OpenAIModelInvoker(ai, async () => ({ choices: [] }));
    await expect(noChoices.invoke("p")).rejects.toBeInstanceOf(EmptyResponse);
  });

  it("rejects an empty prompt without calling the model", async () => {
    const complete = vi.fn(async (_body: ChatRequest) => reply("x"));
    const invoker = new OpenAIModelInvoker(ai, complete);

    await expect(invoker.invoke("   ")).rejects.toBeInstanceOf(InvalidInput);
    expect(complete).not.toHaveBeenCalled();
  });

  it.each([
    [429, "quota_exceeded"],
    [401, "bad_api_key"],
    [503, "openai_error"],
  ] as const)("maps HTTP %i to a transient %s error", async (status, reason) => {
    const invoker = new OpenAIModelInvoker(ai, async () => {
      throw httpError(status, "upstream said no");
    });

    const err = await invoker.invoke("p").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TransientModelError);
    if (!(err instanceof TransientModelError)) return;
    expect(err.status).toBe(status);
    expect(err.reason).toBe(reason);
    expect(err.message).toBe("AI model error: upstream said no");
  });

  it("maps errors without a status to connection errors", async () => {
    const invoker = new OpenAIModelInvoker(ai, async () => {
      throw new Error("socket hang up");
    });

    const err = await invoker.invoke("p").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TransientModelError);
    if (!(err instanceof TransientModelError)) return;
    expect(err.reason).toBe("connection_error");
    expect(err.status).toBeUndefined();
  });
});
