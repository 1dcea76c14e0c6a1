import type { ReferenceTitleCollection, SourceExpansionOptions } from '@dat-curator/shared-types';
import { logger } from '../../utils/logger';

export interface TitleSource {
  /** null when the source could not be fetched or parsed */
  fetchTitles(source: string): Promise<Set<string> | null>;
}

const VARIANTS: ReadonlyArray<{ option: keyof SourceExpansionOptions; segment: string }> = [
  { option: 'homebrew', segment: 'Homebrew' },
  { option: 'japan', segment: 'Japan' },
];

/**
 * Adds the `/Homebrew` and `/Japan` sub-pages of each given URL when asked
 * to. Variants are only derived from the URLs passed in, never from each
 * other. Result is de-duplicated and sorted.
 */
export function expandSourceUrls(urls: readonly string[], options: SourceExpansionOptions): string[] {
  const expanded = new Set(urls);

  for (const { option, segment } of VARIANTS) {
    if (!options[option]) continue;
    logger.info(`[Sources] Checking for '/${segment}' URL variants`);

    for (const url of urls) {
      const trimmed = url.replace(/\/+$/, '');
      if (trimmed.toLowerCase().endsWith(`/${segment.toLowerCase()}`)) continue;
      const variant = `${trimmed}/${segment}`;
      logger.debug(`[Sources] Adding ${segment} variant: ${variant}`);
      expanded.add(variant);
    }
  }

  const result = [...expanded].sort();
  if (result.length > urls.length) {
    logger.info(`[Sources] Source list expanded to ${result.length} URLs`);
  }
  return result;
}

export async function collectReferenceTitles(
  sources: readonly string[],
  titleSource: TitleSource
): Promise<ReferenceTitleCollection> {
  const collection: ReferenceTitleCollection = {
    allTitles: new Set(),
    titlesBySource: new Map(),
    failedSources: [],
  };

  if (sources.length === 0) {
    logger.error('[Sources] No source URLs provided');
    return collection;
  }

  const seen = new Set<string>();
  for (const source of sources) {
    if (seen.has(source)) {
      logger.debug(`[Sources] Skipping already fetched source: ${source}`);
      continue;
    }
    seen.add(source);

    const titles = await titleSource.fetchTitles(source);
    if (titles === null) {
      logger.warn(`[Sources] Fetch or parsing failed for ${source}; no titles added`);
      collection.failedSources.push(source);
      continue;
    }

    collection.titlesBySource.set(source, titles);
    if (titles.size === 0) {
      logger.info(`[Sources] No titles extracted from ${source}`);
    }
    for (const title of titles) {
      collection.allTitles.add(title);
    }
  }

  if (collection.allTitles.size === 0) {
    logger.warn('[Sources] No reference titles found in any source');
  } else {
    logger.info(`[Sources] ${collection.allTitles.size} unique reference titles collected`);
  }

  return collection;
}
