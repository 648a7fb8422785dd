import { z } from 'zod';
import { ValidationError } from './errors';

const EnvSchema = z.object({
  GEMINI_API_KEY: z.string().trim().min(1).optional(),
  OPENROUTER_API_KEY: z.string().trim().min(1).optional(),
  OPENROUTER_BASE_URL: z.string().url().default('https://openrouter.ai/api/v1'),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
});

export interface EngineConfig {
  geminiApiKey?: string;
  openRouterApiKey?: string;
  openRouterBaseUrl: string;
  timeoutMs: number;
}

/**
 * Reads provider settings from the environment. Keys are optional here;
 * their absence only matters once a client for that provider is requested.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): EngineConfig => {
  // Blank variables count as unset.
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ''),
  );
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(`Invalid environment variable ${issue?.path.join('.') ?? ''}: ${issue?.message ?? 'unknown issue'}`);
  }
  return {
    geminiApiKey: parsed.data.GEMINI_API_KEY,
    openRouterApiKey: parsed.data.OPENROUTER_API_KEY,
    openRouterBaseUrl: parsed.data.OPENROUTER_BASE_URL,
    timeoutMs: parsed.data.LLM_TIMEOUT_MS,
  };
};
