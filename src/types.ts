import type { AnalysisErrorKind } from "./errors";

export type AnalysisRequest = {
  resumeText: string;
  jobDescription: string;
};

export type AnalysisResult = {
  /** "NN%", or MATCH_SENTINEL when the model gave nothing usable. */
  matchPercentage: string;
  missingKeywords: string[];
  profileSummary: string;
};

/** JSON body of a 200 from POST /analyze. */
export type AnalysisResponse = {
  jd_match: string;
  missing_keywords: string[];
  profile_summary: string;
};

export type FatalKind = Extract<AnalysisErrorKind, "invalid_input"> | "internal";

export type PipelineOutcome =
  | { kind: "success"; result: AnalysisResult; attempts: number }
  | { kind: "fallback"; result: AnalysisResult; attempts: number; lastError: string }
  | { kind: "fatal"; error: FatalKind; message: string; attempts: number };

export const MATCH_SENTINEL = "N/A";

export function toAnalysisResponse(result: AnalysisResult): AnalysisResponse {
  return {
    jd_match: result.matchPercentage,
    missing_keywords: [...result.missingKeywords],
    profile_summary: result.profileSummary,
  };
}
