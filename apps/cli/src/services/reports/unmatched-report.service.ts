import * as fs from 'fs';
import * as path from 'path';
import { logger } from '../../utils/logger';

export interface UnmatchedReportWriter {
  /**
   * Writes one report and returns its file name. `position` is the 1-based
   * place of the source among the fetched sources.
   */
  writeUnmatchedReport(source: string, titles: readonly string[], position: number): Promise<string>;
}

export function csvEscape(val: string | number | boolean | undefined | null): string {
  if (val === undefined || val === null) return '';
  const s = String(val);
  if (s.includes(',') || s.includes('"') || s.includes('\n') || s.includes('\r')) {
    return `"${s.replace(/"/g, '""')}"`;
  }
  return s;
}

function sourcePath(source: string): string {
  try {
    return new URL(source).pathname;
  } catch {
    return source.split(/[?#]/)[0] ?? '';
  }
}

/**
 * Report file name for a source URL, built from its path segments with any
 * `wiki` segment dropped: ".../wiki/Nintendo_-_Game_Boy/Japan" gives
 * "Nintendo_-_Game_Boy_Japan_unmatched.csv". `position` (1-based) names the
 * file when the URL has no usable path.
 */
export function reportFileName(source: string, position: number): string {
  const parts = sourcePath(source)
    .split('/')
    .filter((part) => part && part.toLowerCase() !== 'wiki');

  const sanitized = parts
    .join('_')
    .replace(/[^\p{L}\p{N}_.-]+/gu, '_')
    .replace(/^_+|_+$/g, '');

  return `${sanitized || `url_${position}`}_unmatched.csv`;
}

export function buildReportCsv(source: string, titles: readonly string[]): string {
  const rows = [
    `Unmatched Recommended Title from ${source} (After Review/No Match Kept)`,
    ...[...titles].sort(),
  ];
  return rows.map((row) => `${csvEscape(row)}\n`).join('');
}

/** Writes `<name>_unmatched.csv` files into one directory */
export class CsvUnmatchedReportWriter implements UnmatchedReportWriter {
  constructor(private readonly outputDir: string) {}

  async writeUnmatchedReport(
    source: string,
    titles: readonly string[],
    position: number
  ): Promise<string> {
    const fileName = reportFileName(source, position);
    const filePath = path.join(this.outputDir, fileName);

    logger.info(`[Reports] Writing ${titles.length} unmatched titles from ${source} to '${fileName}'`);
    await fs.promises.mkdir(this.outputDir, { recursive: true });
    await fs.promises.writeFile(filePath, buildReportCsv(source, titles), 'utf-8');
    return fileName;
  }
}
