/**
 * Song record supplied by a lyrics source
 */

import { SongRecordSchema, type SongRecord, type SongRecordInput } from '../schemas/search.js';
import { cleanLyrics } from '../utils/text.js';

export class Song {
  readonly id: string;
  title: string;
  artist: string;
  lyrics: string;
  url: string;
  thumbnailUrl: string;
  releaseDate?: string;

  // Memo of cleanLyrics, valid only while `lyrics` equals `source`
  private cleaned?: { source: string; value: string };

  constructor(record: SongRecordInput) {
    const parsed = SongRecordSchema.parse(record);
    this.id = parsed.id;
    this.title = parsed.title;
    this.artist = parsed.artist;
    this.lyrics = parsed.lyrics;
    this.url = parsed.url;
    this.thumbnailUrl = parsed.thumbnailUrl;
    this.releaseDate = parsed.releaseDate;
  }

  /**
   * Lyrics without section annotations or repeat markers, on one line
   */
  get cleanedLyrics(): string {
    if (!this.cleaned || this.cleaned.source !== this.lyrics) {
      this.cleaned = { source: this.lyrics, value: cleanLyrics(this.lyrics) };
    }
    return this.cleaned.value;
  }

  get hasLyrics(): boolean {
    return this.lyrics.length > 0;
  }

  /**
   * Four-digit year found in the release date, if any.
   * Accepts both "March 3, 1999" and "1999-03-03".
   */
  get releaseYear(): number | undefined {
    const match = this.releaseDate?.match(/\b(\d{4})\b/);
    return match ? Number(match[1]) : undefined;
  }

  withLyrics(lyrics: string): Song {
    return new Song({ ...this.toJSON(), lyrics });
  }

  toJSON(): SongRecord {
    return {
      id: this.id,
      title: this.title,
      artist: this.artist,
      lyrics: this.lyrics,
      url: this.url,
      thumbnailUrl: this.thumbnailUrl,
      releaseDate: this.releaseDate,
    };
  }

  static fromJSON(record: unknown): Song {
    return new Song(SongRecordSchema.parse(record));
  }
}
