import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ZodError } from 'zod';
import { SemanticMatcher } from '../matchers/semantic.js';
import { LyricsSearchPipeline } from '../pipeline.js';
import { CatalogLyricsSource } from '../../songs/lyrics-source.js';
import { KeywordEmbedder } from './helpers.js';

describe('LyricsSearchPipeline', () => {
  let source: CatalogLyricsSource;
  let pipeline: LyricsSearchPipeline;

  beforeEach(() => {
    source = CatalogLyricsSource.fromRecords([
      { id: '1', title: 'Rain Song', artist: 'Artist A', lyrics: 'rain rain falling', releaseDate: '1998-05-01' },
      { id: '2', title: 'Sunny', artist: 'Band B', lyrics: 'sun and rain', releaseDate: '2012' },
      { id: '3', title: 'Night', artist: 'Artist C', lyrics: 'night only' }
    ]);
    pipeline = new LyricsSearchPipeline({
      source,
      matcher: new SemanticMatcher({
        embedder: new KeywordEmbedder(['rain', 'sun', 'night']),
        defaultResultLimit: 5,
        minRelevanceScore: 0.5
      }),
      maxResultLimit: 10
    });
  });

  it('ranks the candidates found for the query', async () => {
    const outcome = await pipeline.search({ text: 'rain' });

    expect(outcome.query).toBe('rain');
    expect(outcome.terms).toEqual(['rain']);
    expect(outcome.moodId).toBeUndefined();
    expect(outcome.candidates).toBe(2);
    expect(outcome.results.map(result => result.song.id)).toEqual(['1', '2']);
    expect(outcome.results[0].score).toBeCloseTo(1, 10);
  });

  it('applies the limit and the score minimum', async () => {
    expect((await pipeline.search({ text: 'rain', limit: 1 })).results.map(result => result.song.id)).toEqual(['1']);
    expect((await pipeline.search({ text: 'rain', minScore: 0.9 })).results.map(result => result.song.id)).toEqual(['1']);
  });

  it('filters by artist and year', async () => {
    const byArtist = await pipeline.search({ text: 'rain', filters: { excludeArtists: ['artist a'] } });
    expect(byArtist.results.map(result => result.song.id)).toEqual(['2']);

    const byYear = await pipeline.search({ text: 'rain', filters: { yearFrom: 2000 } });
    expect(byYear.results.map(result => result.song.id)).toEqual(['2']);
  });

  it('adds mood keywords to the ranking query', async () => {
    const outcome = await pipeline.search({ text: 'rain', filters: { mood: 'sad' } });

    expect(outcome.moodId).toBe('sad');
    expect(outcome.query).toBe('rain triste lacrime sad');
    expect(outcome.results.map(result => result.song.id)).toEqual(['1', '2']);
  });

  it('detects the mood from the text when asked to', async () => {
    const outcome = await pipeline.search({ text: 'tears cry pain', autoMood: true, extraTerms: ['rain'] });

    expect(outcome.moodId).toBe('sad');
    expect(outcome.terms).toEqual(['tears cry pain', 'rain']);
    expect(outcome.candidates).toBe(2);
  });

  it('searches at most five terms', async () => {
    const search = vi.spyOn(source, 'search');

    await pipeline.search({ text: 'rain', extraTerms: ['a', 'b', 'c', 'd', 'e'] });

    expect(search.mock.calls.map(([term]) => term)).toEqual(['rain', 'a', 'b', 'c', 'd']);
    expect(search.mock.calls[0][1]).toBe(20);
  });

  it('rejects empty text and limits above the maximum', async () => {
    await expect(pipeline.search({ text: '   ' })).rejects.toThrow(ZodError);
    await expect(pipeline.search({ text: 'rain', limit: 11 })).rejects.toThrow(ZodError);
  });
});
