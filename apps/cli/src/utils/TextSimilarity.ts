/**
 * Fuzzy string similarity on a 0-100 scale.
 *
 * `ratio` is the indel similarity (twice the longest common subsequence over
 * the combined length). The token and partial variants build on it, and
 * `weightedRatio` picks the best of them with penalties for the variants that
 * ignore word order or length differences.
 *
 * Matching scores the same strings many times, so the `*Of` functions take a
 * `PreparedText` built once per string by `prepareText`.
 */

const UNBASE_SCALE = 0.95;
const PARTIAL_TRIGGER_LENGTH_RATIO = 1.5;
const LONG_PARTIAL_LENGTH_RATIO = 8;

/** Float slack when comparing a bound against a rescaled score */
const BOUND_EPSILON = 1e-9;

type CharCounts = Map<number, number>;

export interface PreparedText {
  processed: string;
  /** Words of `processed` sorted and joined by single spaces */
  sortedTokens: string;
  /** Distinct words, sorted */
  uniqueTokens: readonly string[];
  uniqueJoined: string;
  /** UTF-16 code unit counts of `processed` (and so of `sortedTokens`) */
  counts: CharCounts;
  uniqueCounts: CharCounts;
}

/**
 * Lowercase and reduce to letters and digits separated by single spaces.
 */
export function processForScoring(input: string): string {
  return (input ?? '')
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, ' ')
    .trim();
}

function countChars(s: string): CharCounts {
  const counts: CharCounts = new Map();
  for (let i = 0; i < s.length; i += 1) {
    const code = s.charCodeAt(i);
    counts.set(code, (counts.get(code) ?? 0) + 1);
  }
  return counts;
}

/** Upper bound on the longest common subsequence of two strings */
function countSharedChars(a: CharCounts, b: CharCounts): number {
  const [small, large] = a.size <= b.size ? [a, b] : [b, a];
  let shared = 0;
  for (const [code, count] of small) {
    const other = large.get(code);
    if (other !== undefined) {
      shared += Math.min(count, other);
    }
  }
  return shared;
}

export function prepareText(input: string): PreparedText {
  const processed = processForScoring(input);
  const sorted = processed ? processed.split(' ').sort() : [];
  const uniqueTokens = [...new Set(sorted)];
  const uniqueJoined = uniqueTokens.join(' ');
  const counts = countChars(processed);

  return {
    processed,
    sortedTokens: sorted.join(' '),
    uniqueTokens,
    uniqueJoined,
    counts,
    uniqueCounts: uniqueTokens.length === sorted.length ? counts : countChars(uniqueJoined),
  };
}

// Rows shared by every LCS run; grown on demand
let previousRow = new Int32Array(64);
let currentRow = new Int32Array(64);

function ensureRowCapacity(size: number): void {
  if (previousRow.length >= size) return;
  let capacity = previousRow.length;
  while (capacity < size) capacity *= 2;
  previousRow = new Int32Array(capacity);
  currentRow = new Int32Array(capacity);
}

/**
 * LCS length of `a` against `b.slice(bStart, bStart + bLength)`.
 */
function longestCommonSubsequence(a: string, b: string, bStart = 0, bLength = b.length): number {
  if (a.length === 0 || bLength === 0) return 0;

  ensureRowCapacity(a.length + 1);
  let previous = previousRow;
  let current = currentRow;
  previous.fill(0, 0, a.length + 1);
  current[0] = 0;

  for (let i = 0; i < bLength; i += 1) {
    const ch = b.charCodeAt(bStart + i);
    for (let j = 1; j <= a.length; j += 1) {
      if (ch === a.charCodeAt(j - 1)) {
        current[j] = previous[j - 1] + 1;
      } else {
        const up = previous[j];
        const left = current[j - 1];
        current[j] = up > left ? up : left;
      }
    }
    const swap = previous;
    previous = current;
    current = swap;
  }

  return previous[a.length];
}

/**
 * `ratio`, or 0 when `sharedChars` shows it cannot reach `minimum`.
 */
function boundedRatio(a: string, b: string, sharedChars: number, minimum: number): number {
  const total = a.length + b.length;
  if (total === 0) return 100;
  if ((200 * sharedChars) / total < minimum) return 0;
  return (200 * longestCommonSubsequence(a, b)) / total;
}

function boundedPartialRatio(a: string, b: string, sharedChars: number, minimum: number): number {
  if (!a || !b) return 0;

  const [shorter, longer] = a.length <= b.length ? [a, b] : [b, a];
  const windowTotal = 2 * shorter.length;
  // No window shares more characters with the shorter string than the whole longer one
  if ((200 * Math.min(sharedChars, shorter.length)) / windowTotal < minimum) return 0;

  let best = 0;
  for (let start = 0; start <= longer.length - shorter.length; start += 1) {
    const score = (200 * longestCommonSubsequence(shorter, longer, start, shorter.length)) / windowTotal;
    if (score > best) {
      best = score;
      if (best === 100) break;
    }
  }
  return best;
}

export function ratio(a: string, b: string): number {
  return boundedRatio(a, b, Math.min(a.length, b.length), 0);
}

/**
 * Best `ratio` of the shorter string against each same-length window of the
 * longer one.
 */
export function partialRatio(a: string, b: string): number {
  return boundedPartialRatio(a, b, Math.min(a.length, b.length), 0);
}

export function tokenSortRatioOf(a: PreparedText, b: PreparedText): number {
  if (!a.sortedTokens || !b.sortedTokens) return 0;
  return boundedRatio(a.sortedTokens, b.sortedTokens, countSharedChars(a.counts, b.counts), 0);
}

export function tokenSortRatio(a: string, b: string): number {
  return tokenSortRatioOf(prepareText(a), prepareText(b));
}

export function partialTokenSortRatio(a: string, b: string): number {
  const left = prepareText(a);
  const right = prepareText(b);
  return boundedPartialRatio(left.sortedTokens, right.sortedTokens, countSharedChars(left.counts, right.counts), 0);
}

interface TokenSets {
  intersection: string[];
  onlyA: string[];
  onlyB: string[];
}

/** Merge of two sorted distinct-word lists */
function splitTokenSets(a: PreparedText, b: PreparedText): TokenSets | null {
  const tokensA = a.uniqueTokens;
  const tokensB = b.uniqueTokens;
  if (tokensA.length === 0 || tokensB.length === 0) return null;

  const sets: TokenSets = { intersection: [], onlyA: [], onlyB: [] };
  let i = 0;
  let j = 0;
  while (i < tokensA.length && j < tokensB.length) {
    if (tokensA[i] === tokensB[j]) {
      sets.intersection.push(tokensA[i]);
      i += 1;
      j += 1;
    } else if (tokensA[i] < tokensB[j]) {
      sets.onlyA.push(tokensA[i]);
      i += 1;
    } else {
      sets.onlyB.push(tokensB[j]);
      j += 1;
    }
  }
  sets.onlyA.push(...tokensA.slice(i));
  sets.onlyB.push(...tokensB.slice(j));
  return sets;
}

function boundedTokenSetRatio(a: PreparedText, b: PreparedText, minimum: number): number {
  const sets = splitTokenSets(a, b);
  if (!sets) return 0;

  const { intersection, onlyA, onlyB } = sets;
  if (intersection.length === 0) {
    return boundedRatio(
      a.uniqueJoined,
      b.uniqueJoined,
      countSharedChars(a.uniqueCounts, b.uniqueCounts),
      minimum
    );
  }
  if (onlyA.length === 0 || onlyB.length === 0) {
    return 100;
  }

  const shared = intersection.join(' ');
  const combinedA = `${shared} ${onlyA.join(' ')}`;
  const combinedB = `${shared} ${onlyB.join(' ')}`;

  // `shared` is a prefix of both combined strings, so its LCS with them is its own length
  const best = Math.max(
    (200 * shared.length) / (shared.length + combinedA.length),
    (200 * shared.length) / (shared.length + combinedB.length)
  );
  const rest = boundedRatio(
    combinedA,
    combinedB,
    Math.min(combinedA.length, combinedB.length),
    Math.max(minimum, best)
  );
  return Math.max(best, rest);
}

/**
 * Compares the shared words against each side's full word set, so extra
 * words on one side cost little. A subset relation scores 100.
 */
export function tokenSetRatio(a: string, b: string): number {
  return boundedTokenSetRatio(prepareText(a), prepareText(b), 0);
}

function boundedPartialTokenSetRatio(a: PreparedText, b: PreparedText, minimum: number): number {
  const sets = splitTokenSets(a, b);
  if (!sets) return 0;
  if (sets.intersection.length > 0) return 100;
  // Disjoint: each side's words are all of its distinct words
  return boundedPartialRatio(
    a.uniqueJoined,
    b.uniqueJoined,
    countSharedChars(a.uniqueCounts, b.uniqueCounts),
    minimum
  );
}

export function partialTokenSetRatio(a: string, b: string): number {
  return boundedPartialTokenSetRatio(prepareText(a), prepareText(b), 0);
}

/**
 * `weightedRatio` over prepared text.
 *
 * Variants whose upper bound cannot beat the best score so far, or cannot
 * round up to `floor`, are not computed. The result is exact whenever it is
 * at least `floor`; below it, the result is only known to be below `floor`.
 */
export function weightedRatioOf(a: PreparedText, b: PreparedText, floor = 0): number {
  const p1 = a.processed;
  const p2 = b.processed;
  if (!p1 || !p2) return 0;

  const needed = floor - 0.5;
  const sharedChars = countSharedChars(a.counts, b.counts);
  let best = boundedRatio(p1, p2, sharedChars, needed);
  const minimumFor = (scale: number): number => Math.max(best, needed) / scale - BOUND_EPSILON;

  const lengthRatio = Math.max(p1.length, p2.length) / Math.min(p1.length, p2.length);

  if (lengthRatio < PARTIAL_TRIGGER_LENGTH_RATIO) {
    const sorted = boundedRatio(a.sortedTokens, b.sortedTokens, sharedChars, minimumFor(UNBASE_SCALE));
    best = Math.max(best, sorted * UNBASE_SCALE);
    const set = boundedTokenSetRatio(a, b, minimumFor(UNBASE_SCALE));
    best = Math.max(best, set * UNBASE_SCALE);
    return Math.round(best);
  }

  const partialScale = lengthRatio < LONG_PARTIAL_LENGTH_RATIO ? 0.9 : 0.6;
  const tokenScale = UNBASE_SCALE * partialScale;

  const partial = boundedPartialRatio(p1, p2, sharedChars, minimumFor(partialScale));
  best = Math.max(best, partial * partialScale);
  const partialSorted = boundedPartialRatio(
    a.sortedTokens,
    b.sortedTokens,
    sharedChars,
    minimumFor(tokenScale)
  );
  best = Math.max(best, partialSorted * UNBASE_SCALE * partialScale);
  const partialSet = boundedPartialTokenSetRatio(a, b, minimumFor(tokenScale));
  best = Math.max(best, partialSet * UNBASE_SCALE * partialScale);
  return Math.round(best);
}

/**
 * Holistic similarity: the best of the straight, token and (for strings of
 * clearly different length) partial comparisons, rounded to an integer.
 */
export function weightedRatio(a: string, b: string, floor = 0): number {
  return weightedRatioOf(prepareText(a), prepareText(b), floor);
}
