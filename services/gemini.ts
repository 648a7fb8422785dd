import { GoogleGenAI } from "@google/genai";
import { ProviderFamily } from "../types";
import { describeError, ModelCallError } from "./errors";
import type { LLMClient } from "./llm";
import { INTERVIEW_POLICY } from "./policy";

export interface GeminiClientOptions {
  apiKey: string;
  timeoutMs: number;
}

export class GeminiClient implements LLMClient {
  public readonly family = ProviderFamily.Gemini;
  private readonly ai: GoogleGenAI;

  constructor(public readonly modelId: string, options: GeminiClientOptions) {
    this.ai = new GoogleGenAI({ apiKey: options.apiKey, httpOptions: { timeout: options.timeoutMs } });
  }

  public async complete(prompt: string): Promise<string> {
    try {
      const response = await this.ai.models.generateContent({
        model: this.modelId,
        contents: prompt,
        config: {
          temperature: INTERVIEW_POLICY.GENERATION.TEMPERATURE,
          maxOutputTokens: INTERVIEW_POLICY.GENERATION.MAX_OUTPUT_TOKENS[ProviderFamily.Gemini],
        },
      });

      if (!response.text) throw new Error("Empty response");
      return response.text;
    } catch (error) {
      console.warn("Gemini Call Failed:", error);
      throw new ModelCallError(`Gemini call failed (${this.modelId}): ${describeError(error)}`, { cause: error });
    }
  }
}
