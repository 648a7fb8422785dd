import OpenAI from 'openai';
import { ProviderFamily } from "../types";
import { describeError, ModelCallError } from "./errors";
import type { LLMClient } from "./llm";
import { INTERVIEW_POLICY } from "./policy";

export interface OpenRouterClientOptions {
  apiKey: string;
  baseURL: string;
  timeoutMs: number;
}

/** OpenAI-compatible chat completions routed through OpenRouter. */
export class OpenRouterClient implements LLMClient {
  public readonly family = ProviderFamily.OpenRouter;
  private readonly openai: OpenAI;

  constructor(public readonly modelId: string, options: OpenRouterClientOptions) {
    // The engine owns the retry budget, so the SDK must not retry on its own.
    this.openai = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseURL,
      timeout: options.timeoutMs,
      maxRetries: 0,
    });
  }

  public async complete(prompt: string): Promise<string> {
    try {
      const completion = await this.openai.chat.completions.create({
        model: this.modelId,
        temperature: INTERVIEW_POLICY.GENERATION.TEMPERATURE,
        max_tokens: INTERVIEW_POLICY.GENERATION.MAX_OUTPUT_TOKENS[ProviderFamily.OpenRouter],
        messages: [{ role: 'user', content: prompt }],
      });

      const content = completion.choices[0]?.message?.content;
      if (!content) throw new Error("Upstream response missing content");
      return content;
    } catch (error) {
      console.warn("OpenRouter Call Failed:", error);
      throw new ModelCallError(`OpenRouter call failed (${this.modelId}): ${describeError(error)}`, { cause: error });
    }
  }
}
