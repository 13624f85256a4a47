/**
 * Zod schemas for runtime validation of API responses
 *
 * These schemas validate data from the LRCLIB API to ensure
 * type safety at runtime and provide clear error messages for invalid data.
 */

import { z } from 'zod';

// Absent and null both decode to null
const optionalText = z
  .string()
  .nullish()
  .transform((value) => value ?? null);

function toDateOrNull(value: string | null | undefined): Date | null {
  if (!value) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

// ============================================================================
// Configuration Schemas
// ============================================================================

export const LrcLibConfigSchema = z.object({
  userAgent: z.string(),
  baseUrl: z.string().url().optional(),
  timeout: z.number().int().positive().optional(),
  headers: z.record(z.string()).optional(),
  debug: z.boolean().optional(),
});

// ============================================================================
// Request Schemas
// ============================================================================

export const TrackSignatureSchema = z.object({
  trackName: z.string().min(1, 'Track name is required'),
  artistName: z.string().min(1, 'Artist name is required'),
  albumName: z.string(),
  duration: z.number().finite().nonnegative(),
});

export const SearchParamsSchema = z
  .object({
    query: z.string().optional(),
    trackName: z.string().optional(),
    artistName: z.string().optional(),
    albumName: z.string().optional(),
  })
  .refine((params) => Boolean(params.query) || Boolean(params.trackName), {
    message: 'Either query or trackName is required to search lyrics',
  });

export const LyricsIdSchema = z.union([
  z.number().int().nonnegative(),
  z.string().regex(/^\d+$/, 'Lyrics ID must be numeric'),
]);

export const PublishLyricsInputSchema = z.object({
  plainLyrics: z.string().optional(),
  syncedLyrics: z.string().optional(),
});

// ============================================================================
// Response Schemas
// ============================================================================

export const LyricsMinimalSchema = z.object({
  id: z.number().int(),
  name: optionalText,
  trackName: z.string(),
  artistName: z.string(),
  albumName: z.string(),
  duration: z.number().nonnegative(),
  instrumental: z
    .boolean()
    .nullish()
    .transform((value) => value ?? false),
  plainLyrics: optionalText,
  syncedLyrics: optionalText,
});

export const LyricsSchema = LyricsMinimalSchema.extend({
  lang: optionalText,
  isrc: optionalText,
  spotifyId: optionalText,
  // Unparseable dates decode to null instead of failing the whole record
  releaseDate: z
    .string()
    .nullish()
    .catch(null)
    .transform(toDateOrNull),
});

export const SearchResultSchema = z.array(LyricsMinimalSchema);

export const CryptographicChallengeSchema = z.object({
  prefix: z.string().min(1),
  target: z.string().regex(/^(?:[0-9a-fA-F]{2})+$/, 'Target must be a hex string'),
});

export const ErrorResponseSchema = z.object({
  statusCode: z.number().optional(),
  error: z.string().optional(),
  message: z.string().optional(),
});
