import type { InterviewSessionState, InterviewTurn, ReportBundle } from "../types";
import { describeError, ReportGenerationError, ValidationError } from "./errors";
import type { LLMClient } from "./llm";
import { INTERVIEW_POLICY, type ReportBandRule } from "./policy";
import { buildPrompt } from "./prompts";

export const averageRating = (history: readonly InterviewTurn[]): number => {
  if (history.length === 0) throw new ValidationError("No interview data available");
  const sum = history.reduce((acc, turn) => acc + turn.rating, 0);
  return Number((sum / history.length).toFixed(INTERVIEW_POLICY.RATING.DECIMALS));
};

export const classifyPerformance = (average: number): ReportBandRule => {
  const bands: ReportBandRule[] = INTERVIEW_POLICY.REPORT.BANDS;
  // The last band has no lower bound.
  return bands.find(rule => average >= rule.minAverage) ?? bands[bands.length - 1];
};

export const formatHistory = (history: readonly InterviewTurn[]): string =>
  history
    .map((turn, i) => [
      `Q${i + 1}: ${turn.question}`,
      `A${i + 1}: ${turn.answer}`,
      `Rating: ${turn.rating}/10 | Strengths: ${turn.strengths} | Improvements: ${turn.improvements}`,
    ].join('\n'))
    .join('\n\n');

/**
 * Reduces a session's history into the bundle the renderer consumes.
 * The narrative summary has no retry or fallback: a failed call fails the report.
 */
export const buildReport = async (
  state: Readonly<InterviewSessionState>,
  llm: LLMClient,
): Promise<ReportBundle> => {
  const average = averageRating(state.history);

  const prompt = buildPrompt('overall_summary', state.language, state.providerFamily, {
    role: state.role,
    num_questions: state.history.length,
    avg_rating: average.toFixed(INTERVIEW_POLICY.RATING.DECIMALS),
    history: formatHistory(state.history),
  });

  let overallSummary: string;
  try {
    overallSummary = (await llm.complete(prompt)).trim();
  } catch (error) {
    throw new ReportGenerationError(`Failed to generate report: ${describeError(error)}`, { cause: error });
  }

  const performance = classifyPerformance(average);
  const history = Object.freeze(state.history.map(turn => Object.freeze({ ...turn })));

  return Object.freeze({
    role: state.role,
    difficulty: state.difficulty,
    model: state.modelId,
    language: state.language,
    questionCount: history.length,
    history,
    overallSummary,
    averageRating: average,
    performanceBand: performance.band,
    assessment: performance.assessment,
    recommendations: Object.freeze([...performance.recommendations]),
  });
};
