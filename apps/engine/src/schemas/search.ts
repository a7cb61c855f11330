/**
 * Zod schemas for song records, catalogs and search requests
 */

import { z } from 'zod';

export const SongRecordSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  artist: z.string(),
  lyrics: z.string().optional().default(''),
  url: z.string().optional().default(''),
  thumbnailUrl: z.string().optional().default(''),
  releaseDate: z.string().nullish().transform(value => value ?? undefined),
});

export const CatalogSchema = z.union([
  z.array(SongRecordSchema),
  z.object({ songs: z.array(SongRecordSchema) }).transform(catalog => catalog.songs),
]);

export const SearchFiltersSchema = z.object({
  mood: z.string().min(1).optional(),
  minScore: z.number().min(0).max(1).optional(),
  yearFrom: z.number().int().optional(),
  yearTo: z.number().int().optional(),
  excludeArtists: z.array(z.string()).optional().default([]),
});

export function createSearchRequestSchema(maxResultLimit: number) {
  return z.object({
    text: z.string().trim().min(1, 'Query text is required'),
    limit: z.number().int().min(1).max(maxResultLimit).optional(),
    minScore: z.number().min(0).max(1).optional(),
    extraTerms: z.array(z.string().trim().min(1)).optional().default([]),
    autoMood: z.boolean().optional().default(false),
    filters: SearchFiltersSchema.optional(),
  });
}

export const SearchRequestSchema = createSearchRequestSchema(50);

export type SongRecord = z.infer<typeof SongRecordSchema>;
export type SongRecordInput = z.input<typeof SongRecordSchema>;
export type SearchFilters = z.infer<typeof SearchFiltersSchema>;
export type SearchFiltersInput = z.input<typeof SearchFiltersSchema>;
export type SearchRequest = z.infer<typeof SearchRequestSchema>;
export type SearchRequestInput = z.input<typeof SearchRequestSchema>;
