import type { CurationSummary, ReferenceTitleCollection } from '@dat-curator/shared-types';
import type { LogLevel } from '../../config/curator.config';
import { logger } from '../../utils/logger';

export interface SummaryLine {
  level: Extract<LogLevel, 'info' | 'warn'>;
  text: string;
}

const LABEL_WIDTH = 34;

export interface SummaryInput {
  inputPath: string;
  outputPath: string;
  originalEntryCount: number;
  /** Sources in fetch order */
  sources: readonly string[];
  collection: ReferenceTitleCollection;
  threshold: number;
  reviewEnabled: boolean;
  reviewThreshold: number;
  keptEntryCount: number;
  matchedTitleCount: number;
  unmatchedTitleCount: number;
  reportsWritten: string[];
  confirmedEntryCount: number | null;
}

export function buildSummary(input: SummaryInput): CurationSummary {
  const { collection, sources, ...counts } = input;
  return {
    ...counts,
    sources: [...new Set(sources)].map((source) => ({
      source,
      titleCount: collection.titlesBySource.get(source)?.size ?? null,
    })),
    failedSourceCount: collection.failedSources.length,
    uniqueTitleCount: collection.allTitles.size,
    removedEntryCount: input.originalEntryCount - input.keptEntryCount,
  };
}

function row(label: string, value: string | number): string {
  return `${label.padEnd(LABEL_WIDTH)} ${value}`;
}

export function formatSummary(summary: CurationSummary): SummaryLine[] {
  const lines: SummaryLine[] = [];
  const info = (text: string) => lines.push({ level: 'info', text });
  const warn = (text: string) => lines.push({ level: 'warn', text });

  info('--- Final Operation Summary ---');
  info(row('Input catalog:', summary.inputPath));
  info(row('Output catalog:', summary.outputPath));
  info(row('Entries in original catalog:', summary.originalEntryCount));

  info('Reference titles (sources):');
  const width = Math.max(0, ...summary.sources.map((s) => s.source.length));
  for (const { source, titleCount } of summary.sources) {
    const count = titleCount === null ? 'Fetch Error' : `${titleCount} titles`;
    info(`- ${source.padEnd(width)} -> ${count}`);
  }
  if (summary.failedSourceCount > 0) {
    warn(row('Sources that failed to fetch:', summary.failedSourceCount));
  }
  info(row('Unique reference titles:', summary.uniqueTitleCount));
  info(row('Similarity threshold:', `${summary.threshold}%`));
  if (summary.reviewEnabled) {
    info(row('Review threshold (both scores):', `${summary.reviewThreshold}%`));
  }

  info('Catalog results:');
  info(row('- Entries kept:', summary.keptEntryCount));
  info(row('- Entries removed:', summary.removedEntryCount));
  info('Reference coverage:');
  info(row('- Titles matched:', summary.matchedTitleCount));
  info(row('- Titles not matched:', summary.unmatchedTitleCount));
  info(row('Unmatched reports written:', summary.reportsWritten.length));

  if (summary.confirmedEntryCount === null) {
    warn('Could not confirm the entry count of the output catalog');
  } else if (summary.confirmedEntryCount === summary.keptEntryCount) {
    info(`Confirmation: counted ${summary.confirmedEntryCount} entries in the output catalog`);
  } else {
    warn(
      `Confirmation: counted ${summary.confirmedEntryCount} entries in the output catalog, expected ${summary.keptEntryCount}`
    );
  }

  return lines;
}

export function logSummary(summary: CurationSummary): void {
  for (const line of formatSummary(summary)) {
    logger.log(line.level, line.text);
  }
}
