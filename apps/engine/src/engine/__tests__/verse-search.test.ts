import { describe, it, expect, beforeEach } from 'vitest';
import { SemanticMatcher } from '../matchers/semantic.js';
import { VerseSearcher, detectSection, fuzzyScore, getContext } from '../verse-search.js';
import { KeywordEmbedder, makeSong } from './helpers.js';

const song = makeSong('road', [
  '[Verse 1]',
  'Walking down the empty road',
  'Rain is falling on my face',
  '',
  '[Chorus]',
  'Sing it loud tonight',
  'Sing it loud tonight',
  '[Bridge]',
  'Nothing left to say'
].join('\n'));

describe('detectSection', () => {
  it.each([
    { line: '[Verse 2]', label: 'Verse' },
    { line: '[Strofa]', label: 'Verse' },
    { line: '[RIT.]', label: 'Chorus' },
    { line: '[Ritornello]', label: 'Chorus' },
    { line: '  [Pre-Chorus]', label: 'Pre-Chorus' },
    { line: '[Ponte]', label: 'Bridge' },
    { line: '[Finale]', label: 'Outro' },
    { line: '[Intro]', label: 'Intro' },
    { line: '[Hook]', label: 'Hook' }
  ])('labels $line as $label', ({ line, label }) => {
    expect(detectSection(line)).toBe(label);
  });

  it('treats other lines as content', () => {
    expect(detectSection('Sing [Chorus] again')).toBeUndefined();
    expect(detectSection('[Solo]')).toBeUndefined();
  });
});

describe('fuzzyScore', () => {
  it('averages the character ratio with word overlap', () => {
    // 24 / 32 characters match and every query word is present
    expect(fuzzyScore('sing it loud', 'Sing it loud tonight')).toBeCloseTo(0.875, 10);
  });

  it('is zero for unrelated text', () => {
    expect(fuzzyScore('abc', 'xyz')).toBe(0);
  });
});

describe('VerseSearcher', () => {
  let searcher: VerseSearcher;

  beforeEach(() => {
    searcher = new VerseSearcher(new SemanticMatcher({
      embedder: new KeywordEmbedder(['rain', 'sing', 'road']),
      defaultResultLimit: 5,
      minRelevanceScore: 0.3
    }));
  });

  describe('searchVerse', () => {
    it('finds the literal text of a line with a perfect exact score', async () => {
      const result = await searcher.searchVerse('Nothing left to say', [song], { mode: 'exact' });

      expect(result.matches).toHaveLength(1);
      expect(result.matches[0]).toMatchObject({
        matchedLine: 'Nothing left to say',
        lineNumber: 9,
        section: 'Bridge',
        score: 1,
        matchType: 'exact',
        contextBefore: ['Sing it loud tonight'],
        contextAfter: []
      });
    });

    it('collects context lines without headers or blanks', async () => {
      const result = await searcher.searchVerse('rain is falling', [song], { mode: 'exact' });
      const [match] = result.matches;

      expect(match.lineNumber).toBe(3);
      expect(match.section).toBe('Verse');
      expect(match.contextBefore).toEqual(['Walking down the empty road']);
      expect(match.contextAfter).toEqual([]);
    });

    it('reports search totals and respects the limit', async () => {
      const result = await searcher.searchVerse('sing it loud', [song, makeSong('empty', '')], { mode: 'exact', limit: 1 });

      expect(result.totalSongsSearched).toBe(2);
      expect(result.mode).toBe('exact');
      expect(result.matches.map(match => match.lineNumber)).toEqual([6]);
      expect(result.matches[0].contextAfter).toEqual(['Sing it loud tonight']);
    });

    it('keeps fuzzy matches above the minimum', async () => {
      const result = await searcher.searchVerse('sing it loud', [song], { mode: 'fuzzy', minSimilarity: 0.8 });

      expect(result.matches.map(match => match.lineNumber)).toEqual([6, 7]);
      expect(result.matches[0].score).toBeCloseTo(0.875, 10);
      expect(result.matches[0].matchType).toBe('fuzzy');
    });

    it('ranks lines by embedding similarity in semantic mode', async () => {
      const result = await searcher.searchVerse('rain on the road', [song], { minSimilarity: 0.5 });

      expect(result.mode).toBe('semantic');
      expect(result.matches.map(match => match.lineNumber)).toEqual([2, 3]);
      expect(result.matches[0].score).toBeCloseTo(1 / Math.SQRT2, 10);
    });

    it('skips a song whose lines fail to embed', async () => {
      const embedder = new KeywordEmbedder(['rain', 'sing', 'road']);
      embedder.failOnce.add('broken rain line');
      const flaky = new VerseSearcher(new SemanticMatcher({ embedder, defaultResultLimit: 5, minRelevanceScore: 0.3 }));

      const result = await flaky.searchVerse('rain', [
        makeSong('bad', 'broken rain line'),
        makeSong('good', 'rain again tonight')
      ], { minSimilarity: 0.1 });

      expect(result.matches.map(match => match.song.id)).toEqual(['good']);
      expect(result.matches[0].score).toBe(1);
      expect(result.totalSongsSearched).toBe(2);
    });
  });

  it('runs one search per query', async () => {
    const results = await searcher.searchMultipleVerses(['road', 'tonight'], [song], { mode: 'exact' });

    expect([...results.keys()]).toEqual(['road', 'tonight']);
    expect(results.get('tonight')?.matches).toHaveLength(2);
  });

  it('finds similar verses with a low threshold', async () => {
    const matches = await searcher.findSimilarVerses('road', [song]);
    expect(matches.map(match => match.matchedLine)).toEqual(['Walking down the empty road']);
  });

  it('extracts every content line with its section', () => {
    expect(searcher.extractAllVerses(song)).toEqual([
      { lineNumber: 2, text: 'Walking down the empty road', section: 'Verse' },
      { lineNumber: 3, text: 'Rain is falling on my face', section: 'Verse' },
      { lineNumber: 6, text: 'Sing it loud tonight', section: 'Chorus' },
      { lineNumber: 7, text: 'Sing it loud tonight', section: 'Chorus' },
      { lineNumber: 9, text: 'Nothing left to say', section: 'Bridge' }
    ]);
  });

  it('counts repeated lines', () => {
    expect(searcher.findRepeatedVerses(song)).toEqual(new Map([['sing it loud tonight', 2]]));
  });

  it('groups lines by their final three letters', () => {
    const other = makeSong('other', 'Hit the open road\nI set my heart ablaze\nA quiet lonely night');

    const groups = searcher.findRhymingVerses([song, other]);
    expect([...groups.keys()]).toEqual(['oad', 'ght']);
    expect(groups.get('oad')?.map(verse => verse.line)).toEqual(['Walking down the empty road', 'Hit the open road']);
    expect(groups.get('ght')).toHaveLength(3);

    expect([...searcher.findRhymingVerses([song, other], 3).keys()]).toEqual(['ght']);
  });

  it('summarizes verse statistics', () => {
    expect(searcher.getVerseStatistics(song)).toEqual({
      totalVerses: 5,
      averageLength: 22.4,
      maxLength: 27,
      minLength: 19,
      averageWords: 4.6,
      sections: { Verse: 2, Chorus: 2, Bridge: 1 },
      repeatedVerses: 1,
      uniqueVerses: 4
    });
  });

  it('reports zero statistics for a song without lyrics', () => {
    expect(searcher.getVerseStatistics(makeSong('empty', '')).totalVerses).toBe(0);
  });
});

describe('getContext', () => {
  it('marks the matched line between its context', () => {
    const match = {
      song,
      matchedLine: 'Rain is falling on my face',
      lineNumber: 3,
      section: 'Verse',
      score: 1,
      matchType: 'exact' as const,
      contextBefore: ['Walking down the empty road'],
      contextAfter: ['Sing it loud tonight']
    };

    expect(getContext(match)).toBe('  Walking down the empty road\n→ Rain is falling on my face\n  Sing it loud tonight');
    expect(getContext(match, 0)).toBe('→ Rain is falling on my face');
  });
});
