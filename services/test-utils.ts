import { ProviderFamily } from "../types";
import { ModelCallError } from "./errors";
import type { LLMClient } from "./llm";

export type ScriptedReply = string | Error;

/** Replays completions in order and records every prompt it receives. */
export class ScriptedLLM implements LLMClient {
  public readonly prompts: string[] = [];
  private readonly replies: ScriptedReply[];

  constructor(
    replies: ScriptedReply[] = [],
    public readonly modelId: string = 'gemini-2.5-flash',
    public readonly family: ProviderFamily = ProviderFamily.Gemini,
  ) {
    this.replies = [...replies];
  }

  public get remaining() { return this.replies.length; }

  public push(...replies: ScriptedReply[]) {
    this.replies.push(...replies);
  }

  public async complete(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    const next = this.replies.shift();
    if (next === undefined) throw new ModelCallError("No scripted reply left");
    if (next instanceof Error) throw next;
    return next;
  }
}

export const evaluationJson = (rating: number, missingPoints: string | string[] = 'None'): string =>
  JSON.stringify({
    rating,
    strengths: 'Clear explanation',
    improvements: 'Add a concrete example',
    missing_points: missingPoints,
  });

export const RESUME_SUMMARY =
  'Backend engineer with five years of TypeScript and PostgreSQL experience, building payment APIs and event pipelines.';
