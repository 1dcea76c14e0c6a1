import type { CatalogEntry } from '@dat-curator/shared-types';
import { SelectionSet } from './SelectionSet';

export interface Coverage {
  matched: Set<string>;
  unmatched: Set<string>;
}

/** Splits the reference titles into matched and unmatched */
export function computeCoverage(all: Iterable<string>, matched: ReadonlySet<string>): Coverage {
  const result: Coverage = { matched: new Set(), unmatched: new Set() };
  for (const title of all) {
    if (matched.has(title)) {
      result.matched.add(title);
    } else {
      result.unmatched.add(title);
    }
  }
  return result;
}

/**
 * Unmatched titles per source, sorted. Sources where everything matched are
 * left out.
 */
export function unmatchedBySource(
  titlesBySource: ReadonlyMap<string, ReadonlySet<string>>,
  unmatched: ReadonlySet<string>
): Map<string, string[]> {
  const result = new Map<string, string[]>();
  for (const [source, titles] of titlesBySource) {
    const missing = [...titles].filter((title) => unmatched.has(title)).sort();
    if (missing.length > 0) {
      result.set(source, missing);
    }
  }
  return result;
}

/** Selected entries in input catalog order */
export function assembleEntries(
  entries: readonly CatalogEntry[],
  selection: SelectionSet
): CatalogEntry[] {
  return entries.filter((entry) => selection.contains(entry));
}
