import type { CatalogEntry } from './catalog';

export interface SimilarityScore {
  /** Weighted ratio, used for threshold acceptance */
  primary: number;
  /** Token sort ratio, only used to order equal primaries */
  tieBreak: number;
}

export interface MatchCandidate extends SimilarityScore {
  entry: CatalogEntry;
}

export interface ReviewRequest {
  referenceTitle: string;
  /** Ranked best first */
  candidates: MatchCandidate[];
  automaticThreshold: number;
  lowThreshold: number;
}

export type ReviewDecision =
  | { kind: 'select'; index: number }
  | { kind: 'skip' }
  | { kind: 'abort' };
