import { describe, it, expect } from 'vitest';
import {
  TitleSource,
  collectReferenceTitles,
  expandSourceUrls,
} from '../../src/services/sources/source-collector';

const BASE = 'https://wiki.example.org/wiki/Nintendo_-_Game_Boy';

class FakeTitleSource implements TitleSource {
  readonly fetched: string[] = [];

  constructor(private readonly pages: Record<string, string[] | null>) {}

  async fetchTitles(source: string): Promise<Set<string> | null> {
    this.fetched.push(source);
    const titles = this.pages[source];
    return titles ? new Set(titles) : null;
  }
}

describe('expandSourceUrls', () => {
  it('should return the given URLs sorted when no variant is requested', () => {
    expect(expandSourceUrls(['https://b.example.org', 'https://a.example.org'], { homebrew: false, japan: false })).toEqual([
      'https://a.example.org',
      'https://b.example.org',
    ]);
  });

  it('should add Homebrew and Japan pages without a doubled slash', () => {
    expect(expandSourceUrls([`${BASE}/`], { homebrew: true, japan: true })).toEqual([
      `${BASE}/`,
      `${BASE}/Homebrew`,
      `${BASE}/Japan`,
    ]);
  });

  it('should not add a variant to a URL that already ends with it', () => {
    expect(expandSourceUrls([`${BASE}/japan`], { homebrew: false, japan: true })).toEqual([`${BASE}/japan`]);
    expect(expandSourceUrls([`${BASE}/Japan`], { homebrew: true, japan: true })).toEqual([
      `${BASE}/Japan`,
      `${BASE}/Japan/Homebrew`,
    ]);
  });

  it('should de-duplicate URLs', () => {
    expect(expandSourceUrls([BASE, BASE, `${BASE}/Homebrew`], { homebrew: true, japan: false })).toEqual([
      BASE,
      `${BASE}/Homebrew`,
    ]);
  });
});

describe('collectReferenceTitles', () => {
  it('should merge titles and keep them per source', async () => {
    const source = new FakeTitleSource({
      [BASE]: ['super game', 'epic quest'],
      [`${BASE}/Japan`]: ['super game', 'dragon quest'],
    });

    const collection = await collectReferenceTitles([BASE, `${BASE}/Japan`], source);

    expect(collection.allTitles).toEqual(new Set(['super game', 'epic quest', 'dragon quest']));
    expect(collection.titlesBySource.get(`${BASE}/Japan`)).toEqual(new Set(['super game', 'dragon quest']));
    expect(collection.failedSources).toEqual([]);
  });

  it('should fetch a repeated source once', async () => {
    const source = new FakeTitleSource({ [BASE]: ['super game'] });
    await collectReferenceTitles([BASE, BASE], source);

    expect(source.fetched).toEqual([BASE]);
  });

  it('should exclude failed sources and record empty ones', async () => {
    const source = new FakeTitleSource({ [BASE]: [], [`${BASE}/Homebrew`]: null });
    const collection = await collectReferenceTitles([BASE, `${BASE}/Homebrew`], source);

    expect(collection.failedSources).toEqual([`${BASE}/Homebrew`]);
    expect([...collection.titlesBySource.keys()]).toEqual([BASE]);
    expect(collection.allTitles.size).toBe(0);
  });
});
