import type { AppConfig } from "../config";
import { InvalidInput, errorMessage } from "../errors";
import type { AnalysisRequest, PipelineOutcome } from "../types";
import { OpenAIModelInvoker, type ModelInvoker } from "./openaiModel";
import { buildPrompt } from "./prompt";
import { RetryController, type RetryControllerOptions } from "./retryController";

export type PipelineOptions = {
  maxAttempts: number;
  maxPromptChars: number;
};

/**
 * Prompt -> model -> normalized result for one request. Holds no
 * per-request state, so one instance serves every request.
 */
export class AnalysisPipeline {
  private readonly controller: RetryController;
  private readonly opts: PipelineOptions;

  constructor(invoker: ModelInvoker, opts: PipelineOptions, controllerOpts: RetryControllerOptions = {}) {
    this.controller = new RetryController(invoker, controllerOpts);
    this.opts = opts;
  }

  async analyze(req: AnalysisRequest): Promise<PipelineOutcome> {
    let prompt: string;
    try {
      prompt = buildPrompt(req.resumeText, req.jobDescription, { maxResumeChars: this.opts.maxPromptChars });
    } catch (e: unknown) {
      if (e instanceof InvalidInput) {
        return { kind: "fatal", error: "invalid_input", message: e.message, attempts: 0 };
      }
      throw e;
    }

    return this.controller.run(prompt, this.opts.maxAttempts);
  }
}

export function createAnalysisPipeline(config: AppConfig, invoker: ModelInvoker = new OpenAIModelInvoker(config.ai)) {
  return new AnalysisPipeline(
    invoker,
    { maxAttempts: config.ai.maxAttempts, maxPromptChars: config.maxPromptChars },
    { baseDelayMs: config.ai.retryBaseDelayMs }
  );
}

/** Sends a one-line prompt to confirm the credential and model work. Never throws. */
export async function probeModel(invoker: ModelInvoker): Promise<boolean> {
  try {
    const reply = await invoker.invoke("Test connection. Respond with 'OK'.");
    console.log("✅ AI_PROBE ok:", reply.slice(0, 40));
    return true;
  } catch (e: unknown) {
    console.warn("⚠️ AI_PROBE_FAILED (starting anyway):", errorMessage(e));
    return false;
  }
}
