/**
 * Interactive review of reference titles the automatic pass left unmatched.
 *
 * Candidates come from the entries nobody selected yet, filtered by a lower
 * threshold on both scores. A person picks one (or none) through the
 * injected InteractionPort.
 */
import type {
  CatalogEntry,
  MatchCandidate,
  ReviewDecision,
  ReviewRequest,
} from '@dat-curator/shared-types';
import { findSiblingParts } from '../../utils/MultiPartDetector';
import { REVIEW_LOW_THRESHOLD } from '../../config/curator.config';
import { logger } from '../../utils/logger';
import { ScoreFunction, createPairScorer, scoreOrSkip } from './SimilarityScorer';
import { SelectionSet } from './SelectionSet';
import {
  NormalizedEntryIndex,
  assertThreshold,
  commitMatch,
  describeCandidates,
  rankCandidates,
} from './MatchSelector';

export interface InteractionPort {
  presentCandidates(request: ReviewRequest): Promise<ReviewDecision>;
}

export interface ReviewInput {
  entries: readonly CatalogEntry[];
  normalizedIndex: NormalizedEntryIndex;
  selection: SelectionSet;
  unmatchedTitles: Iterable<string>;
  automaticThreshold: number;
  lowThreshold?: number;
  port: InteractionPort;
  score?: ScoreFunction;
}

export interface ReviewOutcome {
  selection: SelectionSet;
  matched: Set<string>;
  /** Titles shown to the reviewer */
  reviewedCount: number;
  acceptedCount: number;
  /** Input ended before every title was reviewed */
  aborted: boolean;
}

export async function reviewUnmatched(input: ReviewInput): Promise<ReviewOutcome> {
  const { entries, normalizedIndex, port, automaticThreshold } = input;
  const lowThreshold = input.lowThreshold ?? REVIEW_LOW_THRESHOLD;
  const score = input.score ?? createPairScorer();
  assertThreshold(lowThreshold, 'Review threshold');

  const selection = input.selection.clone();
  const matched = new Set<string>();

  // Entries not yet selected, in catalog order
  const pool = new Map<string, CatalogEntry[]>();
  for (const entry of entries) {
    if (!normalizedIndex.has(entry) || selection.has(entry.displayName)) continue;
    const sameName = pool.get(entry.displayName) ?? [];
    sameName.push(entry);
    pool.set(entry.displayName, sameName);
  }

  const titles = [...new Set(input.unmatchedTitles)].sort();
  logger.info(
    `[Review] Reviewing ${titles.length} unmatched titles against ${pool.size} discarded catalog titles (both scores >= ${lowThreshold}%)`
  );

  let reviewedCount = 0;
  let acceptedCount = 0;
  let aborted = false;

  for (const title of titles) {
    const candidates: MatchCandidate[] = [];
    for (const sameName of pool.values()) {
      for (const entry of sameName) {
        const normalized = normalizedIndex.get(entry);
        if (!normalized) continue;
        const result = scoreOrSkip(normalized, title, lowThreshold, score);
        if (!result || result.primary < lowThreshold || result.tieBreak < lowThreshold) continue;
        candidates.push({ ...result, entry });
      }
    }

    if (candidates.length === 0) {
      logger.info(`[Review] No candidates for '${title}' above ${lowThreshold}%, skipping`);
      continue;
    }

    const ranked = rankCandidates(candidates);
    logger.debug(`[Review] Candidates for '${title}': ${describeCandidates(ranked)}`);

    reviewedCount += 1;
    const decision = await port.presentCandidates({
      referenceTitle: title,
      candidates: ranked,
      automaticThreshold,
      lowThreshold,
    });

    if (decision.kind === 'abort') {
      logger.warn('[Review] Input ended, stopping review; remaining titles stay unmatched');
      aborted = true;
      break;
    }

    if (decision.kind === 'skip') {
      logger.info(`[Review] Skipped '${title}'`);
      continue;
    }

    const chosen = ranked[decision.index];
    if (!chosen) {
      logger.warn(`[Review] Selection ${decision.index + 1} is out of range for '${title}', skipping`);
      continue;
    }

    const siblings = findSiblingParts(chosen, ranked);
    commitMatch(selection, chosen, siblings, 'Review');
    for (const committed of [chosen, ...siblings]) {
      pool.delete(committed.entry.displayName);
    }
    matched.add(title);
    acceptedCount += 1;
    logger.info(`[Review] Accepted '${chosen.entry.displayName}' for '${title}'`);
  }

  logger.info(
    `[Review] Finished: ${acceptedCount} accepted out of ${reviewedCount} reviewed${aborted ? ' (input ended early)' : ''}`
  );

  return { selection, matched, reviewedCount, acceptedCount, aborted };
}
