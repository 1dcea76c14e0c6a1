/**
 * Reference titles scraped from wiki pages.
 *
 * Each `table.wikitable` on the page lists one release per row with the
 * title in the second cell. A cell may hold several titles separated by
 * line breaks, and footnote markers like "[1]" are dropped.
 */
import * as cheerio from 'cheerio';
import { normalizeTitle } from '../../utils/TitleNormalizer';
import { describeError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { HttpError } from '../../clients/base/HttpError';
import type { TitleSource } from './source-collector';

export interface TextFetcher {
  getText(url: string): Promise<string>;
}

const FOOTNOTE_PATTERN = /\[[^\]]*\]/g;

/**
 * Normalized titles from every wikitable in `html`. Returns an empty set
 * when the page has no wikitable.
 */
export function extractWikiTableTitles(html: string, source: string): Set<string> {
  const $ = cheerio.load(html);
  const titles = new Set<string>();

  const tables = $('table.wikitable').toArray();
  if (tables.length === 0) {
    logger.warn(`[WikiTable] No wikitable found on ${source}`);
    return titles;
  }

  tables.forEach((table, tableIndex) => {
    const rows = $(table).find('tr').toArray().slice(1);
    logger.debug(`[WikiTable] Table ${tableIndex + 1} on ${source}: ${rows.length} rows`);

    rows.forEach((row, rowIndex) => {
      try {
        const cells = $(row).children('td, th');
        if (cells.length < 2) return;

        const cell = cells.eq(1);
        cell.find('br').replaceWith('\n');
        const lines = cell.text().replace(FOOTNOTE_PATTERN, '').split(/\r?\n/);

        for (const line of lines) {
          const normalized = normalizeTitle(line.trim());
          if (normalized) {
            titles.add(normalized);
          }
        }
      } catch (error) {
        logger.warn(
          `[WikiTable] Skipping row ${rowIndex + 2} of table ${tableIndex + 1} on ${source}: ${describeError(error)}`
        );
      }
    });
  });

  return titles;
}

export class WikiTableSource implements TitleSource {
  constructor(private readonly fetcher: TextFetcher) {}

  async fetchTitles(source: string): Promise<Set<string> | null> {
    logger.info(`[WikiTable] Fetching ${source}`);

    let html: string;
    try {
      html = await this.fetcher.getText(source);
    } catch (error) {
      if (error instanceof HttpError && error.isNotFound) {
        logger.warn(`[WikiTable] Page not found (404), skipping: ${source}`);
      } else {
        logger.error(`[WikiTable] Could not fetch ${source}: ${describeError(error)}`);
      }
      return null;
    }

    try {
      const titles = extractWikiTableTitles(html, source);
      logger.info(`[WikiTable] Found ${titles.size} titles on ${source}`);
      return titles;
    } catch (error) {
      logger.error(`[WikiTable] Could not parse ${source}: ${describeError(error)}`);
      return null;
    }
  }
}
