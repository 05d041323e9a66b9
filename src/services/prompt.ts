import { InvalidInput } from "../errors";
import { clampText, safeStr } from "../utils/text";

export const DEFAULT_MAX_RESUME_CHARS = 60_000;

export type PromptOptions = {
  maxResumeChars?: number;
};

/**
 * Builds the ATS evaluation prompt. The reply shape asked for here is what
 * the response normalizer's primary aliases expect.
 */
export function buildPrompt(resumeText: string, jobDescription: string, opts: PromptOptions = {}): string {
  const resume = safeStr(resumeText);
  const jd = safeStr(jobDescription);

  if (!resume) throw new InvalidInput("Resume text is empty");
  if (!jd) throw new InvalidInput("Job description is empty");

  const maxChars = opts.maxResumeChars ?? DEFAULT_MAX_RESUME_CHARS;

  return `
You are a skilled ATS (Application Tracking System) with a deep understanding of the tech field:
software engineering, data science, data analysis and big data engineering.
Your task is to evaluate the resume against the given job description.
The job market is very competitive, so give the best possible assistance for improving the resume.
Assign the percentage match based on the job description and list the missing keywords with high accuracy.

Return ONLY a JSON object, with no markdown and no text before or after it, in exactly this format:
{
  "JD Match": string (percentage such as "75%"),
  "MissingKeywords": string[],
  "Profile Summary": string
}

Resume:
"""
${clampText(resume, maxChars)}
"""

Job description:
"""
${jd}
"""
`.trim();
}
