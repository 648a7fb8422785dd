export enum Difficulty {
  Easy = 'Easy',
  Medium = 'Medium',
  Hard = 'Hard',
}

export enum Language {
  EN = 'en',
  HI = 'hi',
}

export enum ProviderFamily {
  Gemini = 'gemini',
  OpenRouter = 'openrouter',
}

export type PromptStage = 'resume_summary' | 'question' | 'evaluation' | 'overall_summary';

export type EvaluationMode = 'LLM' | 'FALLBACK_RULE_BASED';

export type SessionStatus =
  | 'CREATED'
  | 'GENERATING'
  | 'AWAITING_ANSWER'
  | 'EVALUATING'
  | 'EVALUATED'
  | 'FINALIZING'
  | 'FINALIZED'
  | 'ENDED';

export interface EvaluationResult {
  rating: number; // 1.00-10.00
  strengths: string;
  improvements: string;
  missingPoints: string;
  isFallback: boolean; // True if the heuristic evaluator was used
}

export interface InterviewTurn extends EvaluationResult {
  question: string;
  answer: string;
}

export interface MemoryEntry {
  kind: 'question' | 'evaluation';
  turn: number;
  content: string;
}

export interface InterviewSessionState {
  id: string;
  status: SessionStatus;
  resumeSummary: string;
  role: string;
  language: Language; // Effective prompt language (HI when hinglishMode is on)
  hinglishMode: boolean;
  modelId: string;
  providerFamily: ProviderFamily;
  difficulty: Difficulty;
  evaluationMode: EvaluationMode;
  currentQuestion: string | null;
  questionCount: number;
  lastRating: number | null;
  history: InterviewTurn[];
  memory: MemoryEntry[];
  logs: string[];
}

export interface StartSessionOptions {
  resumeSummary: string;
  role: string;
  difficulty: Difficulty;
  modelId: string;
  language: Language;
  hinglishMode?: boolean;
}

export interface NextQuestionResult {
  question: string;
  questionNumber: number;
}

export interface RecordAnswerResult {
  evaluation: EvaluationResult;
  previousDifficulty: Difficulty;
  newDifficulty: Difficulty;
  totalQuestions: number;
}

export type PerformanceBand = 'EXCELLENT' | 'GOOD' | 'FAIR' | 'NEEDS_IMPROVEMENT';

export interface ReportBundle {
  role: string;
  difficulty: Difficulty;
  model: string;
  language: Language;
  questionCount: number;
  history: readonly Readonly<InterviewTurn>[];
  overallSummary: string;
  averageRating: number;
  performanceBand: PerformanceBand;
  assessment: string;
  recommendations: readonly string[];
}

export interface ModelOption {
  id: string;
  name: string;
  provider: ProviderFamily;
}
