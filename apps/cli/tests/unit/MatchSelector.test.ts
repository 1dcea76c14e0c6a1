/**
 * Unit tests for automatic best-match selection
 *
 * No network, no files; scores come from the real scorer unless a test
 * injects a fixed one.
 */

import { describe, it, expect } from 'vitest';
import {
  buildNormalizedIndex,
  compareCandidates,
  selectBestMatches,
} from '../../src/services/matching/MatchSelector';
import { ScoreError, ScoreFunction } from '../../src/services/matching/SimilarityScorer';
import { ValidationError } from '../../src/utils/errors';
import { createCandidate, createEntries, createEntry, tableScorer } from '../helpers';

function select(names: string[], titles: string[], threshold: number, score?: ScoreFunction) {
  const entries = createEntries(...names);
  return selectBestMatches({
    entries,
    normalizedIndex: buildNormalizedIndex(entries),
    referenceTitles: titles,
    threshold,
    score,
  });
}

describe('buildNormalizedIndex', () => {
  it('should leave out entries whose name normalizes to nothing', () => {
    const entries = createEntries('Super Game (USA)', '(Beta)', '');
    const index = buildNormalizedIndex(entries);

    expect(index.size).toBe(1);
    expect(index.get(entries[0])).toBe('super game');
  });
});

describe('compareCandidates', () => {
  it('should order by primary, then tie-break, then name, then catalog position', () => {
    const a = createCandidate(createEntry('B', 0), 90, 80);
    const b = createCandidate(createEntry('A', 1), 90, 70);
    const c = createCandidate(createEntry('A', 2), 95, 10);
    const d = createCandidate(createEntry('A', 3), 90, 80);
    const e = createCandidate(createEntry('A', 4), 90, 80);

    expect([a, b, c, d, e].sort(compareCandidates)).toEqual([c, d, e, a, b]);
  });
});

describe('selectBestMatches', () => {
  it('should choose one entry among equal candidates by display name', () => {
    const outcome = select(
      ['Super Game (USA)', 'Super Game (Japan)', 'Other Title (Europe)'],
      ['super game'],
      90
    );

    expect(outcome.selection.names()).toEqual(['Super Game (Japan)']);
    expect([...outcome.matched]).toEqual(['super game']);
  });

  it('should bundle the other discs of a chosen first disc', () => {
    const outcome = select(
      ['Epic Quest (USA) (Disc 3)', 'Epic Quest (USA) (Disc 2)', 'Epic Quest (USA) (Disc 1)'],
      ['epic quest'],
      90
    );

    expect(outcome.selection.names().sort()).toEqual([
      'Epic Quest (USA) (Disc 1)',
      'Epic Quest (USA) (Disc 2)',
      'Epic Quest (USA) (Disc 3)',
    ]);
  });

  it('should not bundle parts of a different release', () => {
    const outcome = select(
      ['Epic Quest (USA) (Disc 1)', 'Epic Quest (USA) (Disc 2)', 'Epic Quest (World) (Disc 2)'],
      ['epic quest'],
      90
    );

    expect(outcome.selection.names()).toEqual(['Epic Quest (USA) (Disc 1)', 'Epic Quest (USA) (Disc 2)']);
  });

  it('should treat the threshold as inclusive', () => {
    const fixed: ScoreFunction = () => ({ ok: true, score: { primary: 80, tieBreak: 50 } });

    expect(select(['Alpha'], ['alpha x'], 80, fixed).matched.size).toBe(1);
    expect(select(['Alpha'], ['alpha x'], 81, fixed).matched.size).toBe(0);
  });

  it('should only lose matches as the threshold rises', () => {
    const names = ['Super Game (USA)', 'Super Game Deluxe (USA)', 'Other Tale (USA)', 'Dragon Quest (Japan)'];
    const titles = ['super game', 'other title', 'dragon quest ii', 'unrelated'];

    let previous: Set<string> | null = null;
    for (const threshold of [0, 50, 75, 86, 90, 95, 100]) {
      const { matched } = select(names, titles, threshold);
      if (previous) {
        for (const title of matched) {
          expect(previous.has(title)).toBe(true);
        }
      }
      previous = matched;
    }
  });

  it('should select a shared entry once for two titles', () => {
    const outcome = select(['Super Game (USA)'], ['super game', 'super game deluxe'], 90);

    expect(outcome.selection.size).toBe(1);
    expect(outcome.matched).toEqual(new Set(['super game', 'super game deluxe']));
  });

  it('should leave a title unmatched when nothing reaches the threshold', () => {
    const outcome = select(['Other Title (Europe)'], ['other tale'], 90);

    expect(outcome.selection.size).toBe(0);
    expect(outcome.matched.size).toBe(0);
  });

  it('should drop pairs whose scoring failed and keep going', () => {
    const score: ScoreFunction = (a, b) =>
      a === 'broken'
        ? { ok: false, error: new ScoreError(a, b, new Error('boom')) }
        : { ok: true, score: { primary: 100, tieBreak: 100 } };

    const outcome = select(['Broken', 'Working'], ['anything'], 0, score);
    expect(outcome.selection.names()).toEqual(['Working']);
  });

  it('should prefer the higher tie-break among equal primaries', () => {
    const score = tableScorer({
      'alpha one|alpha': [92, 60],
      'alpha two|alpha': [92, 80],
    });

    const outcome = select(['Alpha One', 'Alpha Two'], ['alpha'], 90, score);
    expect(outcome.selection.names()).toEqual(['Alpha Two']);
  });

  it('should reject thresholds outside 0-100', () => {
    expect(() => select(['A'], ['a'], 101)).toThrow(ValidationError);
    expect(() => select(['A'], ['a'], -1)).toThrow(ValidationError);
    expect(() => select(['A'], ['a'], 50.5)).toThrow(ValidationError);
  });
});
