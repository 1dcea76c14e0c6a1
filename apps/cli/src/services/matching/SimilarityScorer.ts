import type { SimilarityScore } from '@dat-curator/shared-types';
import {
  type PreparedText,
  prepareText,
  tokenSortRatioOf,
  weightedRatioOf,
} from '../../utils/TextSimilarity';
import { describeError } from '../../utils/errors';
import { logger } from '../../utils/logger';

export class ScoreError extends Error {
  constructor(
    public readonly left: string,
    public readonly right: string,
    public readonly originalError: unknown
  ) {
    super(`Similarity failed for '${left}' vs '${right}': ${describeError(originalError)}`);
    this.name = 'ScoreError';
  }
}

export type ScoreResult =
  | { ok: true; score: SimilarityScore }
  | { ok: false; error: ScoreError };

export type ScoreFunction = (a: string, b: string, floor?: number) => ScoreResult;

function scoreWith(
  a: string,
  b: string,
  floor: number,
  prepare: (text: string) => PreparedText
): ScoreResult {
  try {
    const left = prepare(a);
    const right = prepare(b);
    const primary = weightedRatioOf(left, right, floor);
    if (primary < floor) {
      return { ok: true, score: { primary, tieBreak: 0 } };
    }
    return { ok: true, score: { primary, tieBreak: Math.round(tokenSortRatioOf(left, right)) } };
  } catch (error) {
    return { ok: false, error: new ScoreError(a, b, error) };
  }
}

/**
 * Score two normalized titles.
 *
 * When the primary score is below `floor` the tie-break is skipped and
 * reported as 0, and the primary is only known to be below `floor`; such a
 * pair is never ranked.
 */
export const scorePair: ScoreFunction = (a, b, floor = 0) => scoreWith(a, b, floor, prepareText);

/**
 * A `scorePair` that prepares each distinct string once. Meant for one
 * matching pass, where every entry meets every reference title.
 */
export function createPairScorer(prepare: (text: string) => PreparedText = prepareText): ScoreFunction {
  const prepared = new Map<string, PreparedText>();
  const lookup = (text: string): PreparedText => {
    let result = prepared.get(text);
    if (!result) {
      result = prepare(text);
      prepared.set(text, result);
    }
    return result;
  };
  return (a, b, floor = 0) => scoreWith(a, b, floor, lookup);
}

/**
 * Scorer failures count as "no similarity" for that pair only: the error is
 * logged and the pair is dropped.
 */
export function scoreOrSkip(
  a: string,
  b: string,
  floor = 0,
  score: ScoreFunction = scorePair
): SimilarityScore | null {
  const result = score(a, b, floor);
  if (result.ok) {
    return result.score;
  }
  logger.error(`[Scorer] ${result.error.message}`);
  return null;
}
