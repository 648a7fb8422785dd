import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import {
  Difficulty,
  Language,
  ProviderFamily,
  type EvaluationResult,
  type InterviewSessionState,
  type InterviewTurn,
  type MemoryEntry,
  type NextQuestionResult,
  type RecordAnswerResult,
  type ReportBundle,
  type SessionStatus,
  type StartSessionOptions,
} from "../types";
import { loadConfig } from "./config";
import { describeError, InvalidStateError, ModelCallError, ValidationError } from "./errors";
import { createLLMClient, resolveProviderFamily, type LLMClient } from "./llm";
import { ConversationMemory } from "./memory";
import { countWords, fallbackEvaluation, parseEvaluation } from "./normalizer";
import { INTERVIEW_POLICY } from "./policy";
import { buildPrompt } from "./prompts";
import { buildReport } from "./report";

// ============================================================================
// PURE DETERMINISTIC MECHANISM
// ============================================================================

export const LogicCore = {
  /**
   * Steps one level up above the upper threshold and one level down below
   * the lower one. The band between them, bounds included, keeps the level.
   */
  nextDifficulty: (current: Difficulty, rating: number): Difficulty => {
    const { LEVELS, STEP_UP_ABOVE, STEP_DOWN_BELOW } = INTERVIEW_POLICY.DIFFICULTY;
    const index = LEVELS.indexOf(current);

    if (rating > STEP_UP_ABOVE) return LEVELS[Math.min(index + 1, LEVELS.length - 1)];
    if (rating < STEP_DOWN_BELOW) return LEVELS[Math.max(index - 1, 0)];
    return current;
  },
};

// ============================================================================
// INPUT & STATE SCHEMAS
// ============================================================================

const RESUME_MISSING = 'Please upload a resume first';
const requiredText = (field: string) =>
  z.string({ required_error: `Missing required field: ${field}` }).trim().min(1, `Missing required field: ${field}`);

const StartSessionSchema = z.object({
  resumeSummary: z.string({ required_error: RESUME_MISSING }).trim().min(1, RESUME_MISSING),
  role: requiredText('role'),
  difficulty: z.nativeEnum(Difficulty, { errorMap: () => ({ message: 'Difficulty must be Easy, Medium or Hard' }) }),
  modelId: requiredText('modelId'),
  language: z.nativeEnum(Language, { errorMap: () => ({ message: "Language must be 'en' or 'hi'" }) }),
  hinglishMode: z.boolean().default(false),
});

const TurnSchema = z.object({
  question: z.string(),
  answer: z.string(),
  rating: z.number().min(INTERVIEW_POLICY.RATING.MIN).max(INTERVIEW_POLICY.RATING.MAX),
  strengths: z.string(),
  improvements: z.string(),
  missingPoints: z.string(),
  isFallback: z.boolean(),
});

const SessionStateSchema = z.object({
  id: z.string().min(1),
  status: z.enum(['CREATED', 'GENERATING', 'AWAITING_ANSWER', 'EVALUATING', 'EVALUATED', 'FINALIZING', 'FINALIZED', 'ENDED']),
  resumeSummary: z.string(),
  role: z.string(),
  language: z.nativeEnum(Language),
  hinglishMode: z.boolean(),
  modelId: z.string().min(1),
  providerFamily: z.nativeEnum(ProviderFamily),
  difficulty: z.nativeEnum(Difficulty),
  evaluationMode: z.enum(['LLM', 'FALLBACK_RULE_BASED']),
  currentQuestion: z.string().nullable(),
  questionCount: z.number().int().nonnegative(),
  lastRating: z.number().nullable(),
  history: z.array(TurnSchema),
  memory: z.array(z.object({
    kind: z.enum(['question', 'evaluation']),
    turn: z.number().int().positive(),
    content: z.string(),
  })),
  logs: z.array(z.string()),
}).superRefine((state, ctx) => {
  const answered = state.history.length;
  const pending = state.currentQuestion !== null;

  // A pending question is always numbered one past the answered turns.
  const expectedCount = pending ? answered + 1 : answered;
  if (state.questionCount !== expectedCount) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['questionCount'],
      message: `Expected ${expectedCount} for ${answered} answered turns${pending ? ' and a pending question' : ''}`,
    });
  }

  if ((state.status === 'AWAITING_ANSWER' || state.status === 'EVALUATING') && !pending) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['currentQuestion'],
      message: `Status ${state.status} requires a pending question`,
    });
  }

  if ((state.status === 'EVALUATED' || state.status === 'FINALIZING') && answered === 0) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['history'],
      message: `Status ${state.status} requires at least one answered turn`,
    });
  }

  if ((state.status === 'FINALIZED' || state.status === 'ENDED') && (answered > 0 || pending)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['status'],
      message: `A ${state.status} session keeps no turn state`,
    });
  }
});

const toValidationError = (error: z.ZodError, prefix = ''): ValidationError => {
  const issue = error.issues[0];
  const path = issue?.path.join('.');
  return new ValidationError(`${prefix}${path && prefix ? `${path}: ` : ''}${issue?.message ?? 'Invalid input'}`);
};

type AttemptResult =
  | { ok: true; evaluation: EvaluationResult; repaired: boolean }
  | { ok: false; error: 'PARSE_FAILURE' | 'MODEL_CALL_ERROR'; reason: string };

type Subscriber = (state: Readonly<InterviewSessionState>) => void;

// ============================================================================
// STATEFUL SESSION
// Caller-owned aggregate. Every operation goes through one instance; there is
// no process-wide session.
// ============================================================================

export class InterviewSession {
  private state: InterviewSessionState;
  private readonly memory: ConversationMemory;
  private subscribers: Subscriber[] = [];

  private constructor(state: InterviewSessionState, private readonly llm: LLMClient) {
    this.state = state;
    this.memory = new ConversationMemory(state.memory);
  }

  public static start(options: StartSessionOptions, llm?: LLMClient): InterviewSession {
    const parsed = StartSessionSchema.safeParse(options);
    if (!parsed.success) throw toValidationError(parsed.error);
    const input = parsed.data;

    const session = new InterviewSession({
      id: randomUUID(),
      status: 'CREATED',
      resumeSummary: input.resumeSummary,
      role: input.role,
      // Hinglish answers are graded with the Hindi prompt set.
      language: input.hinglishMode ? Language.HI : input.language,
      hinglishMode: input.hinglishMode,
      modelId: input.modelId,
      providerFamily: resolveProviderFamily(input.modelId),
      difficulty: input.difficulty,
      evaluationMode: 'LLM',
      currentQuestion: null,
      questionCount: 0,
      lastRating: null,
      history: [],
      memory: [],
      logs: [],
    }, llm ?? createLLMClient(input.modelId, loadConfig()));

    session.log(`[STATE] Session created. Role: ${input.role} | Model: ${input.modelId} | Difficulty: ${input.difficulty}.`);
    return session;
  }

  /** Rebuilds a session from a record produced by toState(). */
  public static restore(snapshot: unknown, llm?: LLMClient): InterviewSession {
    const parsed = SessionStateSchema.safeParse(snapshot);
    if (!parsed.success) throw toValidationError(parsed.error, 'Invalid session state: ');
    const state: InterviewSessionState = parsed.data;

    const session = new InterviewSession(state, llm ?? createLLMClient(state.modelId, loadConfig()));
    // A snapshot taken mid-call has no call to wait for any more.
    if (state.status === 'GENERATING' || state.status === 'EVALUATING' || state.status === 'FINALIZING') {
      const settled: SessionStatus = state.currentQuestion !== null
        ? 'AWAITING_ANSWER'
        : state.history.length > 0 ? 'EVALUATED' : 'CREATED';
      session.state.status = settled;
      session.log(`[STATE] Restored from an interrupted ${state.status} call; resuming as ${settled}.`);
    }
    return session;
  }

  // --- State Access ---
  public get id() { return this.state.id; }
  public get status() { return this.state.status; }
  public get difficulty() { return this.state.difficulty; }

  public getState(): Readonly<InterviewSessionState> { return this.toState(); }

  /** JSON-safe copy of the full session, suitable for a key/value store. */
  public toState(): InterviewSessionState {
    return {
      ...this.state,
      history: this.state.history.map(turn => ({ ...turn })),
      memory: this.memory.snapshot(),
      logs: [...this.state.logs],
    };
  }

  public subscribe(cb: Subscriber) {
    this.subscribers.push(cb);
    return () => { this.subscribers = this.subscribers.filter(s => s !== cb); };
  }

  private notify() {
    const snapshot = this.toState();
    this.subscribers.forEach(cb => cb(snapshot));
  }

  private log(msg: string) {
    const time = new Date().toLocaleTimeString();
    this.state.logs = [`[${time}] ${msg}`, ...this.state.logs];
    if (this.state.logs.length > INTERVIEW_POLICY.AUDIT.MAX_LOG_LINES) this.state.logs.pop();
  }

  private assertOpen(action: string) {
    switch (this.state.status) {
      case 'FINALIZED':
        throw new InvalidStateError(`Cannot ${action}: the report was already generated for this session.`);
      case 'ENDED':
        throw new InvalidStateError(`Cannot ${action}: the session has ended.`);
      case 'GENERATING':
      case 'EVALUATING':
      case 'FINALIZING':
        throw new InvalidStateError(`Cannot ${action}: a model call is still in progress.`);
      default:
        return;
    }
  }

  /**
   * After a model call returns, the session may have been ended or finalized
   * in the meantime. Nothing is committed into a session that left `expected`.
   */
  private assertStillInFlight(expected: SessionStatus, action: string) {
    const current = this.state.status;
    if (current !== expected) {
      throw new InvalidStateError(`Cannot ${action}: the session moved to ${current} while the model call was in flight.`);
    }
  }

  private remember(entry: MemoryEntry) {
    this.memory.append(entry);
    const evicted = this.memory.prune();
    if (evicted > 0) {
      this.log(`[MEMORY] Pruned ${evicted} oldest entries. Current count: ${this.memory.size}.`);
    }
  }

  // --- Interview Lifecycle ---

  public async nextQuestion(): Promise<NextQuestionResult> {
    this.assertOpen('generate the next question');
    if (!this.state.resumeSummary) {
      throw new InvalidStateError("Cannot generate a question: no resume context for this session.");
    }

    const previousStatus = this.state.status;
    const questionNumber = this.state.history.length + 1;
    const { lastRating } = this.state;

    const prompt = buildPrompt('question', this.state.language, this.state.providerFamily, {
      resume_summary: this.state.resumeSummary,
      role: this.state.role,
      difficulty: this.state.difficulty,
      history: this.memory.format(),
      last_rating: lastRating === null ? 'N/A' : lastRating.toFixed(INTERVIEW_POLICY.RATING.DECIMALS),
    });

    this.state.status = 'GENERATING';
    this.notify();

    let question: string;
    try {
      question = (await this.llm.complete(prompt)).trim();
      if (!question) throw new ModelCallError("Model returned an empty question");
    } catch (error) {
      if (this.state.status === 'GENERATING') {
        this.state.status = previousStatus;
        this.log(`[WARN] Question generation failed: ${describeError(error)}`);
        this.notify();
      }
      throw error;
    }
    this.assertStillInFlight('GENERATING', 'present the question');

    // Only one question may be pending; a re-issue takes the old one's place.
    if (this.state.currentQuestion !== null) {
      this.memory.discardPendingQuestion(questionNumber);
      this.log(`[EVENT] Pending Q${questionNumber} replaced.`);
    }

    this.state.currentQuestion = question;
    this.state.questionCount = questionNumber;
    this.remember({ kind: 'question', turn: questionNumber, content: question });
    this.state.status = 'AWAITING_ANSWER';
    this.log(`[QUESTION] Q${questionNumber} Presented (${this.state.difficulty}).`);
    this.notify();

    return { question, questionNumber };
  }

  public async recordAnswer(answerText: string): Promise<RecordAnswerResult> {
    this.assertOpen('record an answer');
    const question = this.state.currentQuestion;
    if (this.state.status !== 'AWAITING_ANSWER' || question === null) {
      throw new InvalidStateError("Cannot record an answer: no active question to evaluate.");
    }

    const turnNumber = this.state.history.length + 1;
    this.state.status = 'EVALUATING';
    this.log(`[EVENT] Answer submitted for Q${turnNumber} (${countWords(answerText)} words).`);
    this.notify();

    const prompt = buildPrompt('evaluation', this.state.language, this.state.providerFamily, {
      question,
      answer: answerText,
    });

    let evaluation: EvaluationResult;
    try {
      evaluation = await this.evaluate(prompt, answerText);
    } catch (error) {
      if (this.state.status === 'EVALUATING') {
        this.state.status = 'AWAITING_ANSWER';
        this.notify();
      }
      throw error;
    }
    this.assertStillInFlight('EVALUATING', 'record the answer');

    const turn: InterviewTurn = { question, answer: answerText, ...evaluation };
    const previousDifficulty = this.state.difficulty;
    const newDifficulty = LogicCore.nextDifficulty(previousDifficulty, evaluation.rating);

    this.state.history.push(turn);
    this.state.difficulty = newDifficulty;
    this.state.lastRating = evaluation.rating;
    this.state.currentQuestion = null;
    this.state.status = 'EVALUATED';
    this.remember({ kind: 'evaluation', turn: turnNumber, content: `${answerText} (Rating: ${evaluation.rating}/10)` });

    this.log(`[SCORE] Q${turnNumber} rated ${evaluation.rating.toFixed(2)}/10${evaluation.isFallback ? ' (heuristic)' : ''}.`);
    if (newDifficulty !== previousDifficulty) {
      this.log(`[ADAPT] Difficulty transitioning: ${previousDifficulty} -> ${newDifficulty}`);
    }
    if (evaluation.isFallback && this.state.evaluationMode !== 'FALLBACK_RULE_BASED') {
      this.state.evaluationMode = 'FALLBACK_RULE_BASED';
      this.log('[WARN] Model evaluation unavailable. Switched to Deterministic Fallback Mode.');
    }
    this.notify();

    return {
      evaluation: { ...evaluation },
      previousDifficulty,
      newDifficulty,
      totalQuestions: this.state.history.length,
    };
  }

  public async finalizeReport(): Promise<ReportBundle> {
    this.assertOpen('finalize the report');
    if (this.state.history.length === 0) throw new ValidationError("No interview data available");

    const previousStatus = this.state.status;
    this.state.status = 'FINALIZING';
    this.notify();

    let report: ReportBundle;
    try {
      report = await buildReport(this.toState(), this.llm);
    } catch (error) {
      if (this.state.status === 'FINALIZING') {
        this.state.status = previousStatus;
        this.log(`[WARN] Report generation failed: ${describeError(error)}`);
        this.notify();
      }
      throw error;
    }
    this.assertStillInFlight('FINALIZING', 'finalize the report');

    this.discard('FINALIZED');
    this.log(`[FINAL] Interview score finalized: ${report.averageRating.toFixed(2)}`);
    this.log('[TERM] Report generated. Session closed.');
    this.notify();
    return report;
  }

  public end() {
    this.discard('ENDED');
    this.log('[TERM] Session ended by caller.');
    this.notify();
  }

  // --- Evaluation Pipeline ---

  /**
   * Sequential attempts against the model, then the heuristic. Model-call
   * failures and unparseable output both spend an attempt.
   */
  private async evaluate(prompt: string, answer: string): Promise<EvaluationResult> {
    const { MAX_ATTEMPTS } = INTERVIEW_POLICY.EVALUATION;

    for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt++) {
      const result = await this.attemptEvaluation(prompt);
      if (result.ok) {
        if (result.repaired) this.log(`[WARN] Attempt ${attempt}: truncated evaluation repaired.`);
        return result.evaluation;
      }
      this.log(`[WARN] Evaluation attempt ${attempt}/${MAX_ATTEMPTS} failed (${result.error}): ${result.reason}`);
    }

    console.warn(`Session ${this.state.id}: all evaluation attempts failed, using heuristic fallback.`);
    return fallbackEvaluation(answer);
  }

  private async attemptEvaluation(prompt: string): Promise<AttemptResult> {
    let raw: string;
    try {
      raw = await this.llm.complete(prompt);
    } catch (error) {
      if (error instanceof ModelCallError) return { ok: false, error: 'MODEL_CALL_ERROR', reason: error.message };
      throw error;
    }

    const outcome = parseEvaluation(raw);
    if (outcome.kind === 'success') return { ok: true, evaluation: outcome.evaluation, repaired: outcome.repaired };
    return { ok: false, error: 'PARSE_FAILURE', reason: outcome.reason };
  }

  private discard(status: 'FINALIZED' | 'ENDED') {
    this.memory.clear();
    this.state = {
      ...this.state,
      status,
      resumeSummary: '',
      currentQuestion: null,
      questionCount: 0,
      lastRating: null,
      history: [],
      memory: [],
      logs: [],
    };
  }
}

// ============================================================================
// FUNCTIONAL API
// ============================================================================

export const startSession = (options: StartSessionOptions, llm?: LLMClient) => InterviewSession.start(options, llm);
export const nextQuestion = (session: InterviewSession) => session.nextQuestion();
export const recordAnswer = (session: InterviewSession, answerText: string) => session.recordAnswer(answerText);
export const finalizeReport = (session: InterviewSession) => session.finalizeReport();
export const endSession = (session: InterviewSession) => session.end();
