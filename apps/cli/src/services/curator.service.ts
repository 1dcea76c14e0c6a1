/**
 * Curation run: fetch reference titles, read the catalog, select matches,
 * optionally review the leftovers, then write the curated catalog, the
 * unmatched reports and a summary.
 */
import * as path from 'path';
import type {
  CurationSummary,
  HeaderInfo,
  ReferenceTitleCollection,
  SourceExpansionOptions,
} from '@dat-curator/shared-types';
import { CURATOR_VERSION, REVIEW_LOW_THRESHOLD } from '../config/curator.config';
import { describeError } from '../utils/errors';
import { logger } from '../utils/logger';
import { CatalogService } from './catalog/catalog.service';
import { buildCuratedHeader, formatDate } from './catalog/header';
import { buildNormalizedIndex, selectBestMatches } from './matching/MatchSelector';
import { InteractionPort, reviewUnmatched } from './matching/ReviewStage';
import { SelectionSet } from './matching/SelectionSet';
import { assembleEntries, computeCoverage, unmatchedBySource } from './matching/coverage';
import { CsvUnmatchedReportWriter, UnmatchedReportWriter } from './reports/unmatched-report.service';
import { buildSummary, logSummary } from './reports/summary';
import { TitleSource, collectReferenceTitles, expandSourceUrls } from './sources/source-collector';

export interface CurationOptions {
  inputPath: string;
  outputPath: string;
  urls: string[];
  threshold: number;
  interactiveReview: boolean;
  expand: SourceExpansionOptions;
  header: Pick<HeaderInfo, 'label' | 'author' | 'homepage'>;
}

export interface CuratorDependencies {
  titleSource: TitleSource;
  catalog?: CatalogService;
  /** Required when interactive review is requested */
  reviewPort?: InteractionPort;
  createReportWriter?: (outputDir: string) => UnmatchedReportWriter;
  now?: () => Date;
}

export interface CurationResult {
  summary: CurationSummary;
  success: boolean;
}

export class CuratorService {
  private readonly catalog: CatalogService;
  private readonly createReportWriter: (outputDir: string) => UnmatchedReportWriter;
  private readonly now: () => Date;

  constructor(private readonly deps: CuratorDependencies) {
    this.catalog = deps.catalog ?? new CatalogService();
    this.createReportWriter =
      deps.createReportWriter ?? ((outputDir) => new CsvUnmatchedReportWriter(outputDir));
    this.now = deps.now ?? (() => new Date());
  }

  async run(options: CurationOptions): Promise<CurationResult> {
    const { inputPath, outputPath, threshold } = options;

    const sources = expandSourceUrls(options.urls, options.expand);
    const document = await this.catalog.read(inputPath);
    const collection = await collectReferenceTitles(sources, this.deps.titleSource);
    if (collection.allTitles.size === 0) {
      logger.warn('[Curator] No reference titles to compare against; the curated catalog will be empty');
    }

    const { entries } = document;
    const normalizedIndex = buildNormalizedIndex(entries);
    logger.info(`[Curator] ${normalizedIndex.size} of ${entries.length} catalog entries have a comparable title`);

    const automatic = selectBestMatches({
      entries,
      normalizedIndex,
      referenceTitles: collection.allTitles,
      threshold,
    });

    let selection: SelectionSet = automatic.selection;
    const matched = new Set(automatic.matched);
    const afterAutomatic = computeCoverage(collection.allTitles, matched);

    if (options.interactiveReview) {
      const port = this.deps.reviewPort;
      if (!port) {
        logger.warn('[Curator] Interactive review requested but no prompt is available; skipping review');
      } else if (afterAutomatic.unmatched.size === 0) {
        logger.info('[Curator] Every reference title was matched; nothing to review');
      } else {
        const review = await reviewUnmatched({
          entries,
          normalizedIndex,
          selection,
          unmatchedTitles: afterAutomatic.unmatched,
          automaticThreshold: threshold,
          lowThreshold: REVIEW_LOW_THRESHOLD,
          port,
        });
        selection = review.selection;
        for (const title of review.matched) {
          matched.add(title);
        }
      }
    }

    const coverage = computeCoverage(collection.allTitles, matched);
    const kept = assembleEntries(entries, selection);
    logger.info(`[Curator] Final selected entry count: ${kept.length}`);

    const header = buildCuratedHeader(document.header, {
      ...options.header,
      version: CURATOR_VERSION,
      date: formatDate(this.now()),
    });

    let writeError: unknown = null;
    let confirmedEntryCount: number | null = null;
    try {
      await this.catalog.write(outputPath, header, kept);
      confirmedEntryCount = await this.confirmEntryCount(outputPath);
    } catch (error) {
      writeError = error;
    }

    const reportsWritten = await this.writeReports(
      collection,
      coverage.unmatched,
      path.dirname(path.resolve(outputPath))
    );

    const summary = buildSummary({
      inputPath,
      outputPath,
      originalEntryCount: entries.length,
      sources,
      collection,
      threshold,
      reviewEnabled: options.interactiveReview,
      reviewThreshold: REVIEW_LOW_THRESHOLD,
      keptEntryCount: kept.length,
      matchedTitleCount: coverage.matched.size,
      unmatchedTitleCount: coverage.unmatched.size,
      reportsWritten,
      confirmedEntryCount,
    });
    logSummary(summary);

    if (writeError !== null) {
      throw writeError;
    }

    logger.info('[Curator] Operation completed');
    return { summary, success: true };
  }

  private async confirmEntryCount(outputPath: string): Promise<number | null> {
    logger.info('[Curator] Confirming entry count in output catalog');
    try {
      return await this.catalog.countEntries(outputPath);
    } catch (error) {
      logger.error(`[Curator] Could not re-read output catalog: ${describeError(error)}`);
      return null;
    }
  }

  private async writeReports(
    collection: ReferenceTitleCollection,
    unmatched: ReadonlySet<string>,
    outputDir: string
  ): Promise<string[]> {
    const written: string[] = [];
    if (collection.titlesBySource.size === 0) {
      return written;
    }

    const positions = new Map([...collection.titlesBySource.keys()].map((source, i) => [source, i + 1]));
    const writer = this.createReportWriter(outputDir);

    for (const [source, titles] of unmatchedBySource(collection.titlesBySource, unmatched)) {
      try {
        written.push(await writer.writeUnmatchedReport(source, titles, positions.get(source) ?? 0));
      } catch (error) {
        logger.error(`[Reports] Could not write report for ${source}: ${describeError(error)}`);
      }
    }

    if (written.length > 0) {
      logger.info(`[Reports] Created ${written.length} unmatched report(s) in '${outputDir}'`);
    } else if (unmatched.size === 0) {
      logger.info('[Reports] Every reference title was matched; no reports needed');
    } else {
      logger.warn('[Reports] Some titles remain unmatched but no reports were written');
    }
    return written;
  }
}
