/**
 * Automatic best-match selection.
 *
 * Every catalog entry is scored against every reference title. Each title
 * keeps the candidates at or above the threshold and takes the single best
 * one, plus the other parts of that release when it is disc 1.
 */
import type { CatalogEntry, MatchCandidate } from '@dat-curator/shared-types';
import { normalizeTitle } from '../../utils/TitleNormalizer';
import { findSiblingParts } from '../../utils/MultiPartDetector';
import { ValidationError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { ScoreFunction, createPairScorer, scoreOrSkip } from './SimilarityScorer';
import { SelectionSet } from './SelectionSet';

/** Normalized name per entry; entries that normalize to '' are left out */
export type NormalizedEntryIndex = Map<CatalogEntry, string>;

export interface MatchSelectionInput {
  entries: readonly CatalogEntry[];
  normalizedIndex: NormalizedEntryIndex;
  referenceTitles: Iterable<string>;
  threshold: number;
  score?: ScoreFunction;
}

export interface MatchOutcome {
  selection: SelectionSet;
  matched: Set<string>;
}

export function buildNormalizedIndex(entries: readonly CatalogEntry[]): NormalizedEntryIndex {
  const index: NormalizedEntryIndex = new Map();
  for (const entry of entries) {
    const normalized = normalizeTitle(entry.displayName);
    if (normalized) {
      index.set(entry, normalized);
    }
  }
  return index;
}

export function assertThreshold(threshold: number, label = 'Threshold'): void {
  if (!Number.isInteger(threshold) || threshold < 0 || threshold > 100) {
    throw new ValidationError(`${label} must be an integer between 0 and 100 (got ${threshold})`);
  }
}

/**
 * Primary score first, tie-break second. Remaining ties fall back to the
 * display name and then catalog position so the order never depends on
 * scan order.
 */
export function compareCandidates(a: MatchCandidate, b: MatchCandidate): number {
  if (a.primary !== b.primary) return b.primary - a.primary;
  if (a.tieBreak !== b.tieBreak) return b.tieBreak - a.tieBreak;
  if (a.entry.displayName !== b.entry.displayName) {
    return a.entry.displayName < b.entry.displayName ? -1 : 1;
  }
  return a.entry.index - b.entry.index;
}

export function rankCandidates(candidates: readonly MatchCandidate[]): MatchCandidate[] {
  return [...candidates].sort(compareCandidates);
}

export function describeCandidates(candidates: readonly MatchCandidate[]): string {
  return candidates
    .map((c) => `'${c.entry.displayName}' (WR ${c.primary}%, TSR ${c.tieBreak}%)`)
    .join(', ');
}

/**
 * Add a chosen entry together with its sibling parts. Names already selected
 * are left as they are.
 */
export function commitMatch(
  selection: SelectionSet,
  chosen: MatchCandidate,
  siblings: readonly MatchCandidate[],
  stage: string
): void {
  for (const candidate of [chosen, ...siblings]) {
    const name = candidate.entry.displayName;
    if (selection.add(candidate.entry)) {
      logger.debug(`[${stage}] Added '${name}' to the curated catalog`);
    } else {
      logger.debug(`[${stage}] '${name}' was already selected`);
    }
  }
}

export function selectBestMatches(input: MatchSelectionInput): MatchOutcome {
  const { entries, normalizedIndex, threshold } = input;
  const score = input.score ?? createPairScorer();
  assertThreshold(threshold);

  const titles = [...new Set(input.referenceTitles)].filter((title) => title.length > 0);
  logger.info(
    `[Selector] Scoring ${normalizedIndex.size} catalog titles against ${titles.length} reference titles (threshold ${threshold}%)`
  );

  const candidatesByTitle = new Map<string, MatchCandidate[]>();
  for (const entry of entries) {
    const normalized = normalizedIndex.get(entry);
    if (!normalized) continue;

    for (const title of titles) {
      const result = scoreOrSkip(normalized, title, threshold, score);
      if (!result || result.primary < threshold) continue;

      logger.debug(
        `[Selector] Candidate for '${title}': '${entry.displayName}' (WR ${result.primary}%, TSR ${result.tieBreak}%)`
      );
      const candidates = candidatesByTitle.get(title) ?? [];
      candidates.push({ ...result, entry });
      candidatesByTitle.set(title, candidates);
    }
  }

  logger.info(`[Selector] Found candidates for ${candidatesByTitle.size} reference titles`);

  const selection = new SelectionSet();
  const matched = new Set<string>();

  for (const title of [...candidatesByTitle.keys()].sort()) {
    const ranked = rankCandidates(candidatesByTitle.get(title) ?? []);
    const best = ranked[0];
    if (!best) continue;

    logger.debug(`[Selector] Ranked candidates for '${title}': ${describeCandidates(ranked)}`);
    const siblings = findSiblingParts(best, ranked.slice(1)).filter(
      (candidate) => candidate.primary >= threshold
    );
    if (siblings.length > 0) {
      logger.debug(
        `[Selector] '${best.entry.displayName}' is a first part; bundling ${siblings
          .map((s) => `'${s.entry.displayName}'`)
          .join(', ')}`
      );
    }

    commitMatch(selection, best, siblings, 'Selector');
    matched.add(title);
  }

  logger.info(`[Selector] Selected ${selection.size} catalog entries for ${matched.size} reference titles`);

  return { selection, matched };
}
