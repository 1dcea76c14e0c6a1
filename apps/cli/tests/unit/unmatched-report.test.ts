import * as fs from 'fs';
import * as path from 'path';
import { describe, it, expect, afterAll } from 'vitest';
import {
  CsvUnmatchedReportWriter,
  buildReportCsv,
  csvEscape,
  reportFileName,
} from '../../src/services/reports/unmatched-report.service';
import { makeTempDir } from '../helpers';

describe('reportFileName', () => {
  it('should join the path segments without the wiki segment', () => {
    expect(reportFileName('https://wiki.example.org/wiki/Nintendo_-_Game_Boy', 1)).toBe(
      'Nintendo_-_Game_Boy_unmatched.csv'
    );
    expect(reportFileName('https://wiki.example.org/WIKI/Nintendo_-_Game_Boy/Japan/', 2)).toBe(
      'Nintendo_-_Game_Boy_Japan_unmatched.csv'
    );
  });

  it('should replace characters outside words, dots and hyphens', () => {
    expect(reportFileName('https://wiki.example.org/wiki/Sega%20CD', 1)).toBe('Sega_20CD_unmatched.csv');
  });

  it('should fall back to the source position without a usable path', () => {
    expect(reportFileName('https://wiki.example.org/', 3)).toBe('url_3_unmatched.csv');
    expect(reportFileName('https://wiki.example.org/wiki/', 4)).toBe('url_4_unmatched.csv');
  });
});

describe('csvEscape', () => {
  it('should quote fields with separators, quotes or line breaks', () => {
    expect(csvEscape('plain title')).toBe('plain title');
    expect(csvEscape('a,b')).toBe('"a,b"');
    expect(csvEscape('say "hi"')).toBe('"say ""hi"""');
    expect(csvEscape(null)).toBe('');
  });
});

describe('buildReportCsv', () => {
  it('should write the header cell and one sorted title per row', () => {
    expect(buildReportCsv('https://wiki.example.org/wiki/A', ['zeta, the game', 'alpha'])).toBe(
      'Unmatched Recommended Title from https://wiki.example.org/wiki/A (After Review/No Match Kept)\n' +
        'alpha\n' +
        '"zeta, the game"\n'
    );
  });
});

describe('CsvUnmatchedReportWriter', () => {
  const tempDir = makeTempDir();

  afterAll(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should write the report beside the output catalog', async () => {
    const writer = new CsvUnmatchedReportWriter(tempDir);
    const fileName = await writer.writeUnmatchedReport(
      'https://wiki.example.org/wiki/Game_Boy',
      ['missing title'],
      1
    );

    expect(fileName).toBe('Game_Boy_unmatched.csv');
    expect(fs.readFileSync(path.join(tempDir, fileName), 'utf-8')).toBe(
      'Unmatched Recommended Title from https://wiki.example.org/wiki/Game_Boy (After Review/No Match Kept)\n' +
        'missing title\n'
    );
  });
});
