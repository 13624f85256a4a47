/**
 * Core type definitions for the LRCLIB SDK
 */

// ============================================================================
// Configuration
// ============================================================================

export interface LrcLibConfig {
  /** Sent as `User-Agent` on every request, e.g. `my-player/1.2 (https://example.com)` */
  userAgent: string;
  baseUrl?: string;
  /** Per-request timeout in milliseconds */
  timeout?: number;
  headers?: Record<string, string>;
  debug?: boolean;
}

// ============================================================================
// Request Types
// ============================================================================

/**
 * Full track metadata used for an exact-match lookup
 */
export interface TrackSignature {
  trackName: string;
  artistName: string;
  albumName: string;
  /** Track duration in seconds */
  duration: number;
}

export interface GetLyricsOptions {
  /**
   * Only look in the service's own database, skipping external sources.
   * Faster, but misses tracks the service has never seen.
   */
  cached?: boolean;
}

/**
 * Search parameters. Either `query` or `trackName` is required.
 */
export interface SearchParams {
  /** Free-text search over track, artist and album */
  query?: string;
  trackName?: string;
  artistName?: string;
  albumName?: string;
}

// ============================================================================
// Response Types
// ============================================================================

/**
 * Lyrics record as returned by search
 */
export interface LyricsMinimal {
  readonly id: number;
  readonly name: string | null;
  readonly trackName: string;
  readonly artistName: string;
  readonly albumName: string;
  /** Duration in seconds */
  readonly duration: number;
  readonly instrumental: boolean;
  readonly plainLyrics: string | null;
  /** LRC formatted lyrics, one `[mm:ss.xx] line` per row */
  readonly syncedLyrics: string | null;
}

/**
 * Lyrics record with full information, as returned by the lookup endpoints
 */
export interface Lyrics extends LyricsMinimal {
  readonly lang: string | null;
  readonly isrc: string | null;
  readonly spotifyId: string | null;
  readonly releaseDate: Date | null;
}

/**
 * Search results in the order ranked by the service
 */
export type SearchResult = readonly LyricsMinimal[];

/**
 * Body sent by the service alongside error statuses
 */
export interface ErrorResponse {
  statusCode?: number;
  error?: string;
  message?: string;
}

// ============================================================================
// Lyrics Types (re-exported from lyrics.ts)
// ============================================================================

export type { SyncedLyricsLine, LrcMetadata, ParsedSyncedLyrics } from './lyrics';

// ============================================================================
// Publish Types (re-exported from publish.ts)
// ============================================================================

export type {
  CryptographicChallenge,
  PublishLyricsInput,
  PublishOptions,
  PublishPayload,
} from './publish';

// ============================================================================
// Error Types (re-exported from errors.ts)
// ============================================================================

export {
  LrcLibError,
  NetworkError,
  NotFoundError,
  ServerError,
  RateLimitError,
  IncorrectPublishTokenError,
  ValidationError,
  ChallengeAbortedError,
} from './errors';
