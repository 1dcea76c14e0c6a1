/**
 * Multi-part Detection Utility
 *
 * Recognizes catalog names that are one part of a multi-disc (or disk, side,
 * tape) release, e.g. "Game X (USA) (Disc 2)". Once disc 1 of a release is
 * chosen, the other parts of the same release are chosen with it.
 */

const FIRST_PART_PATTERN = /\((?:Disc|Disk|Side|Tape)\s+1\)/i;
const ANY_PART_PATTERN = /\((?:Disc|Disk|Side|Tape)\s+0*[1-9]\d*\)/i;
const TRAILING_PART_PATTERN = /\s*\((?:Disc|Disk|Side|Tape)\s+0*[1-9]\d*\)\s*$/i;

export function isFirstPart(name: string): boolean {
  return FIRST_PART_PATTERN.test(name);
}

export function isAnyPart(name: string): boolean {
  return ANY_PART_PATTERN.test(name);
}

/**
 * Name without its trailing part marker. Markers elsewhere in the name are
 * left alone, so "Game (Disc 1) (USA)" is its own base.
 */
export function baseName(name: string): string {
  if (!TRAILING_PART_PATTERN.test(name)) {
    return name;
  }
  return name.replace(TRAILING_PART_PATTERN, '').trim();
}

/**
 * Other parts of the same release as `primary`, taken from `candidates`.
 * Empty unless `primary` is itself a first part.
 */
export function findSiblingParts<T extends { entry: { displayName: string } }>(
  primary: T,
  candidates: readonly T[]
): T[] {
  const primaryName = primary.entry.displayName;
  if (!isFirstPart(primaryName)) {
    return [];
  }

  const primaryBase = baseName(primaryName);
  return candidates.filter((candidate) => {
    if (candidate === primary || candidate.entry === primary.entry) return false;
    const name = candidate.entry.displayName;
    return isAnyPart(name) && baseName(name) === primaryBase;
  });
}
