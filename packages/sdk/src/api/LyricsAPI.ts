/**
 * Lyrics API
 *
 * Read operations against LRCLIB:
 * - Exact-match lookup by track signature (`/get`, `/get-cached`)
 * - Lookup by record ID (`/get/{id}`)
 * - Search (`/search`)
 */

import type {
  GetLyricsOptions,
  Lyrics,
  SearchParams,
  SearchResult,
  TrackSignature,
} from '../types';
import { NotFoundError } from '../types/errors';
import {
  LyricsIdSchema,
  LyricsSchema,
  SearchParamsSchema,
  SearchResultSchema,
  TrackSignatureSchema,
} from '../utils/validators';
import { validate } from '../utils/validation';
import { silentLogger, type Logger } from '../utils/logger';
import type { BaseClient } from './BaseClient';

export const LYRICS_ENDPOINTS = {
  get: '/get',
  getCached: '/get-cached',
  getById: (id: number | string) => `/get/${encodeURIComponent(String(id))}`,
  search: '/search',
} as const;

export class LyricsAPI {
  private httpClient: BaseClient;
  private readonly logger: Logger;

  constructor(httpClient: BaseClient, logger: Logger = silentLogger) {
    this.httpClient = httpClient;
    this.logger = logger.child('LyricsAPI');
  }

  /**
   * Exact-match lookup by track name, artist name, album name and duration
   *
   * @throws NotFoundError if the service has no matching record
   */
  async getLyrics(track: TrackSignature, options?: GetLyricsOptions): Promise<Lyrics> {
    const signature = validate(TrackSignatureSchema, track, 'TrackSignature');
    const endpoint = options?.cached ? LYRICS_ENDPOINTS.getCached : LYRICS_ENDPOINTS.get;

    this.logger.debug('Looking up lyrics', { ...signature, cached: options?.cached ?? false });

    const data = await this.httpClient.get(endpoint, {
      params: {
        track_name: signature.trackName,
        artist_name: signature.artistName,
        album_name: signature.albumName,
        duration: Math.round(signature.duration),
      },
    });

    return validate(LyricsSchema, data, 'Lyrics');
  }

  /**
   * Lookup by LRCLIB record ID
   *
   * @throws NotFoundError if no record has this ID
   */
  async getLyricsById(id: number | string): Promise<Lyrics> {
    const lyricsId = validate(LyricsIdSchema, id, 'Lyrics ID');

    this.logger.debug('Fetching lyrics by ID', { id: lyricsId });

    const data = await this.httpClient.get(LYRICS_ENDPOINTS.getById(lyricsId));
    return validate(LyricsSchema, data, 'Lyrics');
  }

  /**
   * Search by free-text query and/or track fields.
   * No matches is an empty result, never an error.
   */
  async searchLyrics(params: SearchParams): Promise<SearchResult> {
    const search = validate(SearchParamsSchema, params, 'SearchParams');

    let data: unknown;
    try {
      data = await this.httpClient.get(LYRICS_ENDPOINTS.search, {
        params: {
          q: search.query || undefined,
          track_name: search.trackName || undefined,
          artist_name: search.artistName || undefined,
          album_name: search.albumName || undefined,
        },
      });
    } catch (error) {
      if (error instanceof NotFoundError) {
        this.logger.debug('Search returned 404, treating as no matches');
        return [];
      }
      throw error;
    }

    const results = validate(SearchResultSchema, data, 'SearchResult');
    this.logger.debug('Search complete', { count: results.length });
    return results;
  }
}
