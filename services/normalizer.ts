import { z } from 'zod';
import type { EvaluationResult } from "../types";
import { INTERVIEW_POLICY } from "./policy";

// ============================================================================
// RESPONSE NORMALIZER
// Turns free-form model output into an EvaluationResult.
//   Tier 1: strip code fences, parse the JSON record.
//   Tier 2: repair text that looks truncated, parse again.
//   Tier 3: heuristic scoring from the answer alone (no model call).
// Parse failures are values, never exceptions.
// ============================================================================

export type ParseOutcome =
  | { kind: 'success'; evaluation: EvaluationResult; repaired: boolean }
  | { kind: 'malformed'; reason: string };

const TextField = z
  .union([z.string(), z.number(), z.boolean()])
  .transform(value => String(value).trim());

const RawEvaluationSchema = z.object({
  rating: z.union([z.number(), z.string().trim().min(1)]).pipe(z.coerce.number().finite()),
  strengths: TextField,
  improvements: TextField,
  missing_points: z
    .union([
      z.array(z.union([z.string(), z.number()])).transform(items => items.map(String).join(', ').trim()),
      TextField,
    ])
    .nullish(),
});

export const clampRating = (rating: number): number => {
  const { MIN, MAX, DECIMALS } = INTERVIEW_POLICY.RATING;
  const clamped = Math.min(MAX, Math.max(MIN, rating));
  return Number(clamped.toFixed(DECIMALS));
};

/**
 * Returns the first fenced segment. A ```json fence wins over a bare one.
 */
export const stripCodeFence = (text: string): string => {
  const trimmed = text.trim();
  const jsonFence = trimmed.indexOf('```json');
  if (jsonFence !== -1) {
    const body = trimmed.slice(jsonFence + '```json'.length);
    return body.split('```')[0].trim();
  }
  if (trimmed.includes('```')) {
    return (trimmed.split('```')[1] ?? '').trim();
  }
  return trimmed;
};

export const looksTruncated = (text: string): boolean =>
  text.endsWith('...') || !text.endsWith('}');

const count = (text: string, char: string): number => text.split(char).length - 1;

/**
 * Closes a record that was cut off mid string. Assumes the flat
 * rating/strengths/improvements/missing_points shape; not a general JSON fixer.
 */
export const repairTruncatedJson = (text: string): string => {
  const openBraces = count(text, '{') - count(text, '}');
  let repaired = text;

  if (repaired.includes('...')) {
    // Cut back to the last field that closed before the truncation point.
    const lastComma = repaired.lastIndexOf(',');
    if (lastComma > 0) {
      const lastQuote = repaired.lastIndexOf('"', lastComma - 1);
      if (lastQuote > 0) repaired = repaired.slice(0, lastQuote + 1);
    }
  }

  if (count(repaired, '"') % 2 !== 0) repaired += '"';
  if (openBraces > 0) repaired += '}'.repeat(openBraces);
  return repaired;
};

const parseRecord = (text: string): ParseOutcome => {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    return { kind: 'malformed', reason: `Invalid JSON: ${error instanceof Error ? error.message : String(error)}` };
  }

  const result = RawEvaluationSchema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue?.path.join('.') || 'record';
    return { kind: 'malformed', reason: `Invalid field ${field}: ${issue?.message ?? 'unknown issue'}` };
  }

  const raw = result.data;
  return {
    kind: 'success',
    repaired: false,
    evaluation: {
      rating: clampRating(raw.rating),
      strengths: raw.strengths,
      improvements: raw.improvements,
      missingPoints: raw.missing_points ?? INTERVIEW_POLICY.EVALUATION.MISSING_POINTS_DEFAULT,
      isFallback: false,
    },
  };
};

/** Tiers 1 and 2. */
export const parseEvaluation = (rawModelText: string): ParseOutcome => {
  const text = stripCodeFence(rawModelText);
  if (text.length === 0) return { kind: 'malformed', reason: 'Empty response' };

  const direct = parseRecord(text);
  if (direct.kind === 'success' || !looksTruncated(text)) return direct;

  const repaired = parseRecord(repairTruncatedJson(text));
  if (repaired.kind === 'success') return { ...repaired, repaired: true };
  return { kind: 'malformed', reason: `${direct.reason} (repair failed: ${repaired.reason})` };
};

export const countWords = (text: string): number =>
  text.trim().split(/\s+/).filter(word => word.length > 0).length;

/** Tier 3. Deterministic: the same answer always yields the same evaluation. */
export const fallbackEvaluation = (answer: string): EvaluationResult => {
  const { DONT_KNOW_PHRASES, BANDS, DETAILED, SENTINEL } = INTERVIEW_POLICY.FALLBACK_SCORING;
  const lowerAnswer = answer.toLowerCase().trim();
  const words = countWords(answer);
  const isDontKnow = DONT_KNOW_PHRASES.some(phrase => lowerAnswer.includes(phrase));

  const band = isDontKnow ? BANDS[0] : BANDS.find(b => words < b.belowWords) ?? DETAILED;

  return {
    rating: clampRating(band.rating),
    strengths: band.strengths,
    improvements: band.improvements,
    missingPoints: SENTINEL,
    isFallback: true,
  };
};

/** Single-shot normalization: never throws, degrades to the heuristic. */
export const normalize = (rawModelText: string, answer: string): EvaluationResult => {
  const outcome = parseEvaluation(rawModelText);
  return outcome.kind === 'success' ? outcome.evaluation : fallbackEvaluation(answer);
};

export const isDegraded = (evaluation: EvaluationResult): boolean =>
  evaluation.missingPoints === INTERVIEW_POLICY.FALLBACK_SCORING.SENTINEL;
