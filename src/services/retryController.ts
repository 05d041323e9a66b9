import { InvalidInput, errorMessage, isRetryable } from "../errors";
import type { AnalysisResult, FatalKind, PipelineOutcome } from "../types";
import { sleep as realSleep } from "../utils/text";
import type { ModelInvoker } from "./openaiModel";
import { normalize, type Normalizer } from "./responseNormalizer";

export const DEFAULT_MAX_ATTEMPTS = 3;

export const FALLBACK_KEYWORD = "AI analysis unavailable";

export function fallbackResult(attempts: number): AnalysisResult {
  return {
    matchPercentage: "50%",
    missingKeywords: [FALLBACK_KEYWORD],
    profileSummary:
      `The AI analysis service is currently unavailable, so this resume could not be evaluated ` +
      `after ${attempts} attempt${attempts === 1 ? "" : "s"}. The match shown is a neutral placeholder; please try again in a few minutes.`,
  };
}

// ============================
// State machine
// ============================
export type RetryState =
  | { name: "attempting"; attempt: number }
  | { name: "retrying"; attempt: number; delayMs: number; error: string }
  | { name: "succeeded"; attempt: number; result: AnalysisResult }
  | { name: "fallbackReturned"; attempt: number; error: string }
  | { name: "fatal"; attempt: number; kind: FatalKind; error: string };

export type RetryEvent =
  | { type: "ok"; result: AnalysisResult }
  | { type: "failed"; error: unknown }
  | { type: "waited" };

export type RetryPolicy = {
  maxAttempts: number;
  baseDelayMs: number;
};

export function backoffDelay(attempt: number, baseDelayMs: number): number {
  return baseDelayMs * 2 ** (attempt - 1);
}

/** Pure transition function; `run` drives it. */
export function transition(state: RetryState, event: RetryEvent, policy: RetryPolicy): RetryState {
  switch (state.name) {
    case "attempting": {
      if (event.type === "ok") return { name: "succeeded", attempt: state.attempt, result: event.result };
      if (event.type !== "failed") return state;

      const error = errorMessage(event.error);
      if (event.error instanceof InvalidInput) {
        return { name: "fatal", attempt: state.attempt, kind: "invalid_input", error };
      }
      if (!isRetryable(event.error)) {
        return { name: "fatal", attempt: state.attempt, kind: "internal", error };
      }
      if (state.attempt >= policy.maxAttempts) {
        return { name: "fallbackReturned", attempt: state.attempt, error };
      }
      return { name: "retrying", attempt: state.attempt, delayMs: backoffDelay(state.attempt, policy.baseDelayMs), error };
    }
    case "retrying":
      return event.type === "waited" ? { name: "attempting", attempt: state.attempt + 1 } : state;
    default:
      return state;
  }
}

export type RetryControllerOptions = {
  baseDelayMs?: number;
  normalizer?: Normalizer;
  sleep?: (ms: number) => Promise<void>;
};

export class RetryController {
  private readonly invoker: ModelInvoker;
  private readonly normalizer: Normalizer;
  private readonly baseDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(invoker: ModelInvoker, opts: RetryControllerOptions = {}) {
    this.invoker = invoker;
    this.normalizer = opts.normalizer ?? ((raw) => normalize(raw));
    this.baseDelayMs = opts.baseDelayMs ?? 1000;
    this.sleep = opts.sleep ?? realSleep;
  }

  async run(prompt: string, maxAttempts: number = DEFAULT_MAX_ATTEMPTS): Promise<PipelineOutcome> {
    const policy: RetryPolicy = { maxAttempts: Math.max(1, Math.floor(maxAttempts)), baseDelayMs: this.baseDelayMs };
    let state: RetryState = { name: "attempting", attempt: 1 };

    for (;;) {
      switch (state.name) {
        case "attempting": {
          let event: RetryEvent;
          try {
            const raw = await this.invoker.invoke(prompt);
            event = { type: "ok", result: this.normalizer(raw) };
          } catch (e: unknown) {
            event = { type: "failed", error: e };
          }
          state = transition(state, event, policy);
          break;
        }
        case "retrying":
          console.warn(
            `⚠️ AI_ATTEMPT_FAILED (${state.attempt}/${policy.maxAttempts}), retrying in ${state.delayMs}ms:`,
            state.error
          );
          await this.sleep(state.delayMs);
          state = transition(state, { type: "waited" }, policy);
          break;
        case "succeeded":
          return { kind: "success", result: state.result, attempts: state.attempt };
        case "fallbackReturned":
          console.error(`❌ AI_RETRIES_EXHAUSTED after ${state.attempt} attempts:`, state.error);
          return { kind: "fallback", result: fallbackResult(state.attempt), attempts: state.attempt, lastError: state.error };
        case "fatal":
          console.error(`❌ AI_PIPELINE_FATAL (${state.kind}):`, state.error);
          return { kind: "fatal", error: state.kind, message: state.error, attempts: state.attempt };
      }
    }
  }
}
