// =======================================================
// ERROR TAXONOMY
// =======================================================

export type AnalysisErrorKind =
  | "invalid_input"
  | "transient_model_error"
  | "empty_response"
  | "unparsable_response"
  | "extraction_error"
  | "config_error";

export abstract class AnalysisError extends Error {
  abstract readonly kind: AnalysisErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Caller error. Never retried. */
export class InvalidInput extends AnalysisError {
  readonly kind = "invalid_input" as const;
}

export type TransientReason = "quota_exceeded" | "bad_api_key" | "connection_error" | "openai_error";

export class TransientModelError extends AnalysisError {
  readonly kind = "transient_model_error" as const;
  readonly reason: TransientReason;
  readonly status: number | undefined;

  constructor(message: string, reason: TransientReason, status?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.reason = reason;
    this.status = status;
  }
}

export class EmptyResponse extends AnalysisError {
  readonly kind = "empty_response" as const;
}

export class UnparsableResponse extends AnalysisError {
  readonly kind = "unparsable_response" as const;
}

export class ExtractionError extends AnalysisError {
  readonly kind = "extraction_error" as const;
}

/** Raised at startup only. Carries every problem found, not just the first. */
export class ConfigError extends AnalysisError {
  readonly kind = "config_error" as const;
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration: ${problems.join("; ")}`);
    this.problems = problems;
  }
}

export function isRetryable(err: unknown): err is TransientModelError | EmptyResponse | UnparsableResponse {
  return err instanceof TransientModelError || err instanceof EmptyResponse || err instanceof UnparsableResponse;
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
