import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { Difficulty, Language, ProviderFamily, type SessionStatus, type StartSessionOptions } from '../types';
import {
  endSession,
  finalizeReport,
  InterviewSession,
  LogicCore,
  nextQuestion,
  recordAnswer,
  startSession,
} from './engine';
import { InvalidStateError, ModelCallError, ReportGenerationError, ValidationError } from './errors';
import { INTERVIEW_POLICY } from './policy';
import { evaluationJson, RESUME_SUMMARY, ScriptedLLM } from './test-utils';

const baseOptions = (overrides: Partial<StartSessionOptions> = {}): StartSessionOptions => ({
  resumeSummary: RESUME_SUMMARY,
  role: 'Backend Engineer',
  difficulty: Difficulty.Easy,
  modelId: 'gemini-2.5-flash',
  language: Language.EN,
  ...overrides,
});

describe('LogicCore.nextDifficulty', () => {
  it('steps up above 7.0', () => {
    expect(LogicCore.nextDifficulty(Difficulty.Easy, 8.0)).toBe(Difficulty.Medium);
    expect(LogicCore.nextDifficulty(Difficulty.Medium, 7.01)).toBe(Difficulty.Hard);
  });

  it('stays at the ceiling and the floor', () => {
    expect(LogicCore.nextDifficulty(Difficulty.Hard, 9.0)).toBe(Difficulty.Hard);
    expect(LogicCore.nextDifficulty(Difficulty.Easy, 2.0)).toBe(Difficulty.Easy);
  });

  it('steps down below 4.0', () => {
    expect(LogicCore.nextDifficulty(Difficulty.Hard, 3.99)).toBe(Difficulty.Medium);
    expect(LogicCore.nextDifficulty(Difficulty.Medium, 1)).toBe(Difficulty.Easy);
  });

  it('keeps the level inside the neutral band, bounds included', () => {
    expect(LogicCore.nextDifficulty(Difficulty.Medium, 5.5)).toBe(Difficulty.Medium);
    expect(LogicCore.nextDifficulty(Difficulty.Medium, 4.0)).toBe(Difficulty.Medium);
    expect(LogicCore.nextDifficulty(Difficulty.Medium, 7.0)).toBe(Difficulty.Medium);
  });
});

describe('InterviewSession', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('start', () => {
    it('creates a session in CREATED with the provider family resolved once', () => {
      const session = startSession(baseOptions({ modelId: 'meta-llama/llama-3.2-3b-instruct:free' }), new ScriptedLLM());
      const state = session.getState();

      expect(state.status).toBe('CREATED');
      expect(state.providerFamily).toBe(ProviderFamily.OpenRouter);
      expect(state.history).toEqual([]);
      expect(state.currentQuestion).toBeNull();
      expect(state.evaluationMode).toBe('LLM');
    });

    it('switches prompts to Hindi in Hinglish mode', () => {
      const session = startSession(baseOptions({ hinglishMode: true }), new ScriptedLLM());
      expect(session.getState().language).toBe(Language.HI);
    });

    it('requires a resume summary', () => {
      expect(() => startSession(baseOptions({ resumeSummary: '   ' }), new ScriptedLLM()))
        .toThrow(new ValidationError('Please upload a resume first'));
    });

    it('requires a role', () => {
      expect(() => startSession(baseOptions({ role: '' }), new ScriptedLLM()))
        .toThrow('Missing required field: role');
    });
  });

  describe('nextQuestion', () => {
    it('issues a trimmed question and numbers it', async () => {
      const llm = new ScriptedLLM(['  How does a B-tree index work?\n']);
      const session = startSession(baseOptions(), llm);

      await expect(nextQuestion(session)).resolves.toEqual({
        question: 'How does a B-tree index work?',
        questionNumber: 1,
      });
      expect(session.status).toBe('AWAITING_ANSWER');
      expect(session.getState().questionCount).toBe(1);
      expect(llm.prompts[0]).toContain('Last Answer Rating: N/A/10');
      expect(llm.prompts[0]).toContain('No previous questions asked yet.');
      expect(llm.prompts[0]).toContain(RESUME_SUMMARY);
    });

    it('replaces a pending question instead of stacking a second one', async () => {
      const llm = new ScriptedLLM(['First question?', 'Replacement question?']);
      const session = startSession(baseOptions(), llm);

      await session.nextQuestion();
      const second = await session.nextQuestion();
      const state = session.getState();

      expect(second).toEqual({ question: 'Replacement question?', questionNumber: 1 });
      expect(state.currentQuestion).toBe('Replacement question?');
      expect(state.memory).toEqual([{ kind: 'question', turn: 1, content: 'Replacement question?' }]);
    });

    it('propagates model failures and keeps the previous status', async () => {
      const session = startSession(baseOptions(), new ScriptedLLM([new ModelCallError('provider down')]));

      await expect(session.nextQuestion()).rejects.toThrow(ModelCallError);
      expect(session.status).toBe('CREATED');
    });

    it('treats an empty completion as a model failure', async () => {
      const session = startSession(baseOptions(), new ScriptedLLM(['   ']));
      await expect(session.nextQuestion()).rejects.toThrow('Model returned an empty question');
    });

    it('rejects a second call while the first is in flight', async () => {
      const session = startSession(baseOptions(), new ScriptedLLM(['Q1?']));
      const pending = session.nextQuestion();

      expect(session.status).toBe('GENERATING');
      await expect(session.nextQuestion()).rejects.toThrow(InvalidStateError);
      await pending;
      expect(session.status).toBe('AWAITING_ANSWER');
    });

    it('does not revive a session ended while the question was being generated', async () => {
      const session = startSession(baseOptions(), new ScriptedLLM(['Q1?']));
      const pending = session.nextQuestion();
      session.end();

      await expect(pending).rejects.toThrow(InvalidStateError);
      const state = session.getState();
      expect(state.status).toBe('ENDED');
      expect(state.currentQuestion).toBeNull();
      expect(state.questionCount).toBe(0);
      expect(state.memory).toEqual([]);
    });
  });

  describe('recordAnswer', () => {
    it('requires a pending question', async () => {
      const session = startSession(baseOptions(), new ScriptedLLM());
      await expect(recordAnswer(session, 'An answer')).rejects.toThrow(
        new InvalidStateError('Cannot record an answer: no active question to evaluate.'),
      );
    });

    it('scores the answer, appends a turn and adapts difficulty', async () => {
      const llm = new ScriptedLLM(['Explain MVCC.', evaluationJson(8.5, ['Vacuum', 'Snapshots'])]);
      const session = startSession(baseOptions(), llm);
      await session.nextQuestion();

      const result = await session.recordAnswer('Each transaction sees a snapshot of committed rows.');

      expect(result).toEqual({
        evaluation: {
          rating: 8.5,
          strengths: 'Clear explanation',
          improvements: 'Add a concrete example',
          missingPoints: 'Vacuum, Snapshots',
          isFallback: false,
        },
        previousDifficulty: Difficulty.Easy,
        newDifficulty: Difficulty.Medium,
        totalQuestions: 1,
      });

      const state = session.getState();
      expect(state.status).toBe('EVALUATED');
      expect(state.currentQuestion).toBeNull();
      expect(state.history[0]).toMatchObject({
        question: 'Explain MVCC.',
        answer: 'Each transaction sees a snapshot of committed rows.',
        rating: 8.5,
      });
      expect(state.logs.some(line => line.includes('[ADAPT] Difficulty transitioning: Easy -> Medium'))).toBe(true);
    });

    it('uses the concise evaluation prompt for OpenRouter models', async () => {
      const llm = new ScriptedLLM(['Q?', evaluationJson(5)], 'meta-llama/llama-3.2-3b-instruct:free', ProviderFamily.OpenRouter);
      const session = startSession(baseOptions({ modelId: 'meta-llama/llama-3.2-3b-instruct:free' }), llm);
      await session.nextQuestion();
      await session.recordAnswer('Some answer');

      expect(llm.prompts[1]).toContain('max 50 words');
      expect(llm.prompts[1]).toContain("Candidate's Answer: Some answer");
    });

    it('retries once after unparseable output', async () => {
      const llm = new ScriptedLLM(['Q?', 'Sorry, I cannot grade this.', evaluationJson(6.5)]);
      const session = startSession(baseOptions({ difficulty: Difficulty.Medium }), llm);
      await session.nextQuestion();

      const { evaluation, newDifficulty } = await session.recordAnswer('Use a queue between the services.');

      expect(evaluation.rating).toBe(6.5);
      expect(evaluation.isFallback).toBe(false);
      expect(newDifficulty).toBe(Difficulty.Medium);
      expect(llm.prompts).toHaveLength(3);
      expect(session.getState().logs.some(line => line.includes('Evaluation attempt 1/2 failed (PARSE_FAILURE)'))).toBe(true);
    });

    it('falls back to heuristic scoring after the attempt budget is spent', async () => {
      const llm = new ScriptedLLM(['Q?', 'not json', new ModelCallError('timeout'), evaluationJson(9)]);
      const session = startSession(baseOptions({ difficulty: Difficulty.Medium }), llm);
      await session.nextQuestion();

      const result = await session.recordAnswer('idk');

      expect(result.evaluation).toEqual({
        rating: 1.5,
        strengths: 'Honest admission of not knowing',
        improvements: 'Study the topic and answer substantively',
        missingPoints: INTERVIEW_POLICY.FALLBACK_SCORING.SENTINEL,
        isFallback: true,
      });
      expect(result.newDifficulty).toBe(Difficulty.Easy);
      expect(llm.remaining).toBe(1);
      expect(session.getState().evaluationMode).toBe('FALLBACK_RULE_BASED');
    });

    it('propagates unexpected errors and leaves the question pending', async () => {
      const session = startSession(baseOptions(), new ScriptedLLM(['Q?', new TypeError('boom')]));
      await session.nextQuestion();

      await expect(session.recordAnswer('answer')).rejects.toThrow('boom');
      expect(session.status).toBe('AWAITING_ANSWER');
      expect(session.getState().currentQuestion).toBe('Q?');
    });

    it('does not commit a turn into a session ended during evaluation', async () => {
      const session = startSession(baseOptions(), new ScriptedLLM(['Q1?', evaluationJson(9)]));
      await session.nextQuestion();
      const pending = session.recordAnswer('An answer that arrives too late.');
      session.end();

      await expect(pending).rejects.toThrow(InvalidStateError);
      const state = session.getState();
      expect(state.status).toBe('ENDED');
      expect(state.history).toEqual([]);
      expect(state.difficulty).toBe(Difficulty.Easy);
      expect(state.lastRating).toBeNull();
    });

    it('feeds the bounded memory and last rating into the next question prompt', async () => {
      const llm = new ScriptedLLM(['What is a deadlock?', evaluationJson(8.2), 'How would you detect one?']);
      const session = startSession(baseOptions(), llm);
      await session.nextQuestion();
      await session.recordAnswer('Two transactions wait on each other.');
      await session.nextQuestion();

      expect(llm.prompts[2]).toContain('Last Answer Rating: 8.20/10');
      expect(llm.prompts[2]).toContain('Q1: What is a deadlock?\nA1: Two transactions wait on each other. (Rating: 8.2/10)');
      expect(llm.prompts[2]).toContain('Current Difficulty Level: Medium');
    });
  });

  describe('memory bound', () => {
    it('prunes the oldest five turns once the watermark is passed', async () => {
      const llm = new ScriptedLLM();
      const session = startSession(baseOptions(), llm);

      for (let turn = 1; turn <= 10; turn++) {
        llm.push(`Question ${turn}?`, evaluationJson(5));
        await session.nextQuestion();
        await session.recordAnswer(`Answer ${turn}`);
      }
      expect(session.getState().memory).toHaveLength(20);

      llm.push('Question 11?');
      await session.nextQuestion();
      const memory = session.getState().memory;

      expect(memory).toHaveLength(11);
      expect(memory[0]).toEqual({ kind: 'question', turn: 6, content: 'Question 6?' });
      expect(memory[10]).toEqual({ kind: 'question', turn: 11, content: 'Question 11?' });
      expect(session.getState().history).toHaveLength(10);
    });
  });

  describe('finalizeReport', () => {
    it('requires at least one answered question', async () => {
      const session = startSession(baseOptions(), new ScriptedLLM());
      await expect(finalizeReport(session)).rejects.toThrow(new ValidationError('No interview data available'));
    });

    it('surfaces summary failures and keeps the session usable', async () => {
      const llm = new ScriptedLLM(['Q?', evaluationJson(6), new ModelCallError('quota exceeded'), 'Solid overall.']);
      const session = startSession(baseOptions(), llm);
      await session.nextQuestion();
      await session.recordAnswer('An answer with a few words.');

      await expect(session.finalizeReport()).rejects.toThrow(ReportGenerationError);
      expect(session.status).toBe('EVALUATED');

      const report = await session.finalizeReport();
      expect(report.overallSummary).toBe('Solid overall.');
      expect(session.status).toBe('FINALIZED');
    });

    it('rejects overlapping calls while the summary is generated', async () => {
      const session = startSession(baseOptions(), new ScriptedLLM(['Q?', evaluationJson(6), 'Summary.']));
      await session.nextQuestion();
      await session.recordAnswer('An answer with a few words.');

      const pending = session.finalizeReport();
      expect(session.status).toBe('FINALIZING');
      await expect(session.finalizeReport()).rejects.toThrow(InvalidStateError);
      await expect(session.nextQuestion()).rejects.toThrow(InvalidStateError);
      await expect(session.recordAnswer('again')).rejects.toThrow(InvalidStateError);

      expect((await pending).overallSummary).toBe('Summary.');
      expect(session.status).toBe('FINALIZED');
    });

    it('keeps an ended session ended when the summary arrives afterwards', async () => {
      const session = startSession(baseOptions(), new ScriptedLLM(['Q?', evaluationJson(6), 'Summary.']));
      await session.nextQuestion();
      await session.recordAnswer('An answer with a few words.');

      const pending = session.finalizeReport();
      session.end();

      await expect(pending).rejects.toThrow(InvalidStateError);
      expect(session.status).toBe('ENDED');
    });
  });

  describe('end-to-end', () => {
    it('adapts difficulty turn by turn and averages the ratings', async () => {
      const llm = new ScriptedLLM([
        'Q1?', evaluationJson(8.2),
        'Q2?', evaluationJson(3.0),
        'Q3?', evaluationJson(5.0),
        '  The candidate is close to ready.  ',
      ]);
      const session = startSession(baseOptions(), llm);

      await session.nextQuestion();
      expect((await session.recordAnswer('First answer')).newDifficulty).toBe(Difficulty.Medium);
      await session.nextQuestion();
      expect((await session.recordAnswer('Second answer')).newDifficulty).toBe(Difficulty.Easy);
      const third = await session.nextQuestion();
      expect(third.questionNumber).toBe(3);
      const last = await session.recordAnswer('Third answer');
      expect(last).toMatchObject({ previousDifficulty: Difficulty.Easy, newDifficulty: Difficulty.Easy, totalQuestions: 3 });

      const report = await session.finalizeReport();

      expect(report.averageRating).toBe(5.4);
      expect(report.questionCount).toBe(3);
      expect(report.difficulty).toBe(Difficulty.Easy);
      expect(report.model).toBe('gemini-2.5-flash');
      expect(report.language).toBe(Language.EN);
      expect(report.overallSummary).toBe('The candidate is close to ready.');
      expect(report.performanceBand).toBe('FAIR');
      expect(report.history.map(turn => turn.rating)).toEqual([8.2, 3, 5]);
      expect(llm.prompts[6]).toContain('Average Rating: 5.40/10.00');
    });

    it('accepts no further turns after the report', async () => {
      const session = startSession(baseOptions(), new ScriptedLLM(['Q?', evaluationJson(7), 'Summary.']));
      await session.nextQuestion();
      await session.recordAnswer('Answer');
      await session.finalizeReport();

      expect(session.getState().history).toEqual([]);
      await expect(session.nextQuestion()).rejects.toThrow(InvalidStateError);
      await expect(session.finalizeReport()).rejects.toThrow(InvalidStateError);
    });
  });

  describe('endSession', () => {
    it('discards all state unconditionally', async () => {
      const session = startSession(baseOptions(), new ScriptedLLM(['Q?']));
      await session.nextQuestion();

      endSession(session);
      const state = session.getState();

      expect(state.status).toBe('ENDED');
      expect(state.resumeSummary).toBe('');
      expect(state.currentQuestion).toBeNull();
      expect(state.memory).toEqual([]);
      await expect(session.recordAnswer('late answer')).rejects.toThrow(InvalidStateError);
    });
  });

  describe('persistence', () => {
    it('restores a serialized session and continues the interview', async () => {
      const session = startSession(baseOptions(), new ScriptedLLM(['Q1?']));
      await session.nextQuestion();
      const stored: unknown = JSON.parse(JSON.stringify(session.toState()));

      const restored = InterviewSession.restore(stored, new ScriptedLLM([evaluationJson(7.5)]));
      const result = await restored.recordAnswer('Restored answer');

      expect(restored.id).toBe(session.id);
      expect(result.totalQuestions).toBe(1);
      expect(result.newDifficulty).toBe(Difficulty.Medium);
    });

    it('settles a snapshot taken during a model call', () => {
      const session = startSession(baseOptions(), new ScriptedLLM());
      const stored = { ...session.toState(), status: 'EVALUATING' as const, currentQuestion: 'Q1?', questionCount: 1 };

      expect(InterviewSession.restore(stored, new ScriptedLLM()).status).toBe('AWAITING_ANSWER');
    });

    it('settles a snapshot taken while the report was generated', async () => {
      const session = startSession(baseOptions(), new ScriptedLLM(['Q1?', evaluationJson(6)]));
      await session.nextQuestion();
      await session.recordAnswer('answer');
      const stored = { ...session.toState(), status: 'FINALIZING' as const };

      expect(InterviewSession.restore(stored, new ScriptedLLM()).status).toBe('EVALUATED');
    });

    it('rejects a malformed snapshot', () => {
      expect(() => InterviewSession.restore({ id: 'x' }, new ScriptedLLM())).toThrow(ValidationError);
    });

    it('rejects a question count that does not match the history', () => {
      const session = startSession(baseOptions(), new ScriptedLLM());
      const stored = { ...session.toState(), questionCount: 3 };

      expect(() => InterviewSession.restore(stored, new ScriptedLLM()))
        .toThrow(new ValidationError('Invalid session state: questionCount: Expected 0 for 0 answered turns'));
    });

    it('rejects an awaiting session without a pending question', () => {
      const session = startSession(baseOptions(), new ScriptedLLM());
      const stored = { ...session.toState(), status: 'AWAITING_ANSWER' as const };

      expect(() => InterviewSession.restore(stored, new ScriptedLLM()))
        .toThrow(new ValidationError('Invalid session state: currentQuestion: Status AWAITING_ANSWER requires a pending question'));
    });
  });

  describe('subscribe', () => {
    it('notifies observers of every status change', async () => {
      const session = startSession(baseOptions(), new ScriptedLLM(['Q?', evaluationJson(5)]));
      const seen: SessionStatus[] = [];
      const unsubscribe = session.subscribe(state => seen.push(state.status));

      await session.nextQuestion();
      await session.recordAnswer('answer');
      unsubscribe();
      endSession(session);

      expect(seen).toEqual(['GENERATING', 'AWAITING_ANSWER', 'EVALUATING', 'EVALUATED']);
    });

    it('reports the finalizing step before the closed session', async () => {
      const session = startSession(baseOptions(), new ScriptedLLM(['Q?', evaluationJson(5), 'Summary.']));
      await session.nextQuestion();
      await session.recordAnswer('answer');
      const seen: SessionStatus[] = [];
      session.subscribe(state => seen.push(state.status));

      await session.finalizeReport();

      expect(seen).toEqual(['FINALIZING', 'FINALIZED']);
    });
  });
});
