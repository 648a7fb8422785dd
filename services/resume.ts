import { Language, ProviderFamily } from "../types";
import { ModelCallError, ValidationError } from "./errors";
import type { LLMClient } from "./llm";
import { INTERVIEW_POLICY } from "./policy";
import { buildPrompt } from "./prompts";

/**
 * Condenses extracted resume text into the summary every later prompt uses.
 * Model failures propagate; there is no fallback summary.
 */
export const summarizeResume = async (resumeText: string, llm: LLMClient): Promise<string> => {
  const text = resumeText.trim();
  if (text.length < INTERVIEW_POLICY.RESUME.MIN_TEXT_CHARS) {
    throw new ValidationError(
      "Insufficient text extracted. This may be a scanned or image-based PDF; upload a text-based PDF.",
    );
  }

  // The summary prompt is language- and provider-independent.
  const prompt = buildPrompt('resume_summary', Language.EN, ProviderFamily.Gemini, { resume_text: text });
  const summary = (await llm.complete(prompt)).trim();
  if (!summary) throw new ModelCallError("Model returned an empty resume summary");
  return summary;
};
