import type { CatalogEntry } from '@dat-curator/shared-types';

/**
 * Catalog entries chosen for the curated output, keyed by display name.
 *
 * Add-only: a stage that extends the selection works on a `clone()` and
 * hands the result on, so earlier stage results are never changed.
 */
export class SelectionSet {
  private readonly byName = new Map<string, CatalogEntry>();

  constructor(entries: Iterable<CatalogEntry> = []) {
    this.addAll(entries);
  }

  /**
   * Returns false when an entry with the same display name is already held.
   */
  add(entry: CatalogEntry): boolean {
    if (this.byName.has(entry.displayName)) {
      return false;
    }
    this.byName.set(entry.displayName, entry);
    return true;
  }

  /** Number of entries that were new */
  addAll(entries: Iterable<CatalogEntry>): number {
    let added = 0;
    for (const entry of entries) {
      if (this.add(entry)) added += 1;
    }
    return added;
  }

  has(displayName: string): boolean {
    return this.byName.has(displayName);
  }

  /** True if this exact entry instance is the one selected under its name */
  contains(entry: CatalogEntry): boolean {
    return this.byName.get(entry.displayName) === entry;
  }

  get size(): number {
    return this.byName.size;
  }

  entries(): CatalogEntry[] {
    return [...this.byName.values()];
  }

  names(): string[] {
    return [...this.byName.keys()];
  }

  clone(): SelectionSet {
    return new SelectionSet(this.byName.values());
  }
}
