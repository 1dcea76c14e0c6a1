import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { CatalogEntry, MatchCandidate } from '@dat-curator/shared-types';
import type { ScoreFunction } from '../src/services/matching/SimilarityScorer';

export const FIXTURE_CATALOG = path.join(__dirname, 'fixtures', 'sample.dat');

/**
 * Minimal catalog entry with a `<game name="...">` payload
 */
export function createEntry(displayName: string, index = 0): CatalogEntry {
  return {
    displayName,
    index,
    payload: { game: [], ':@': { '@_name': displayName } },
  };
}

export function createEntries(...names: string[]): CatalogEntry[] {
  return names.map((name, index) => createEntry(name, index));
}

export function createCandidate(entry: CatalogEntry, primary = 100, tieBreak = 100): MatchCandidate {
  return { entry, primary, tieBreak };
}

/**
 * Scorer backed by a lookup of `normalized|title` pairs; unknown pairs score 0
 */
export function tableScorer(table: Record<string, [number, number]>): ScoreFunction {
  return (a, b) => {
    const [primary, tieBreak] = table[`${a}|${b}`] ?? [0, 0];
    return { ok: true, score: { primary, tieBreak } };
  };
}

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'dat-curator-'));
}
