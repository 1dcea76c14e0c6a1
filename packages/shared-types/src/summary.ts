export interface SourceSummary {
  source: string;
  /** null when the fetch failed */
  titleCount: number | null;
}

export interface CurationSummary {
  inputPath: string;
  outputPath: string;
  originalEntryCount: number;
  sources: SourceSummary[];
  failedSourceCount: number;
  uniqueTitleCount: number;
  threshold: number;
  reviewEnabled: boolean;
  reviewThreshold: number;
  keptEntryCount: number;
  removedEntryCount: number;
  matchedTitleCount: number;
  unmatchedTitleCount: number;
  reportsWritten: string[];
  /** Entry count re-read from the written catalog, null if it could not be confirmed */
  confirmedEntryCount: number | null;
}
