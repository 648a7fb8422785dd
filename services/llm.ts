import { ProviderFamily, type ModelOption } from "../types";
import type { EngineConfig } from "./config";
import { ValidationError } from "./errors";
import { GeminiClient } from "./gemini";
import { OpenRouterClient } from "./openrouter";
import { INTERVIEW_POLICY } from "./policy";

/**
 * A text-completion capability. Implementations wrap every failure,
 * including timeouts and empty completions, in ModelCallError.
 */
export interface LLMClient {
  readonly modelId: string;
  readonly family: ProviderFamily;
  complete(prompt: string): Promise<string>;
}

export const resolveProviderFamily = (modelId: string): ProviderFamily =>
  modelId.toLowerCase().includes('gemini') ? ProviderFamily.Gemini : ProviderFamily.OpenRouter;

export const createLLMClient = (modelId: string, config: EngineConfig): LLMClient => {
  const family = resolveProviderFamily(modelId);

  if (family === ProviderFamily.Gemini) {
    if (!config.geminiApiKey) throw new ValidationError("GEMINI_API_KEY not found in environment");
    return new GeminiClient(modelId, { apiKey: config.geminiApiKey, timeoutMs: config.timeoutMs });
  }

  if (!config.openRouterApiKey) throw new ValidationError("OPENROUTER_API_KEY not found in environment");
  return new OpenRouterClient(modelId, {
    apiKey: config.openRouterApiKey,
    baseURL: config.openRouterBaseUrl,
    timeoutMs: config.timeoutMs,
  });
};

export const listAvailableModels = (): Record<ProviderFamily, ModelOption[]> => ({
  [ProviderFamily.Gemini]: INTERVIEW_POLICY.MODELS.filter(m => m.provider === ProviderFamily.Gemini),
  [ProviderFamily.OpenRouter]: INTERVIEW_POLICY.MODELS.filter(m => m.provider === ProviderFamily.OpenRouter),
});
