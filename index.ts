export * from './types';
export { INTERVIEW_POLICY } from './services/policy';
export { loadConfig, type EngineConfig } from './services/config';
export {
  InterviewError,
  ValidationError,
  InvalidStateError,
  ModelCallError,
  ReportGenerationError,
  isRecoverable,
} from './services/errors';
export { createLLMClient, resolveProviderFamily, listAvailableModels, type LLMClient } from './services/llm';
export { GeminiClient } from './services/gemini';
export { OpenRouterClient } from './services/openrouter';
export { selectPrompt, fillPrompt, buildPrompt } from './services/prompts';
export { ConversationMemory } from './services/memory';
export {
  normalize,
  parseEvaluation,
  fallbackEvaluation,
  clampRating,
  isDegraded,
  type ParseOutcome,
} from './services/normalizer';
export { summarizeResume } from './services/resume';
export { buildReport, averageRating, classifyPerformance } from './services/report';
export {
  LogicCore,
  InterviewSession,
  startSession,
  nextQuestion,
  recordAnswer,
  finalizeReport,
  endSession,
} from './services/engine';
