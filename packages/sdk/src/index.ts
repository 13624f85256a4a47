/**
 * lrclib-sdk
 *
 * TypeScript client for the LRCLIB lyrics API
 *
 * @packageDocumentation
 */

// Main client
export { LrcLibClient, DEFAULT_BASE_URL, DEFAULT_TIMEOUT } from './client';

// Types
export type {
  // Configuration
  LrcLibConfig,

  // Requests
  TrackSignature,
  GetLyricsOptions,
  SearchParams,

  // Responses
  Lyrics,
  LyricsMinimal,
  SearchResult,
  ErrorResponse,

  // Synced lyrics
  SyncedLyricsLine,
  LrcMetadata,
  ParsedSyncedLyrics,

  // Publishing
  CryptographicChallenge,
  PublishLyricsInput,
  PublishOptions,
  PublishPayload,
} from './types';

// Errors
export {
  LrcLibError,
  NetworkError,
  NotFoundError,
  ServerError,
  RateLimitError,
  IncorrectPublishTokenError,
  ValidationError,
  ChallengeAbortedError,
} from './types';

// API Module
export {
  BaseClient,
  LyricsAPI,
  PublishAPI,
  LYRICS_ENDPOINTS,
  PUBLISH_ENDPOINTS,
  PUBLISH_TOKEN_HEADER,
  type QueryParams,
  type RequestInterceptor,
  type ResponseInterceptor,
  type RequestConfig,
  type HTTPClientConfig,
} from './api';

// Challenge Module
export {
  solveChallenge,
  findNonce,
  isNonceValid,
  parseTarget,
  type Solution,
  type FindNonceOptions,
  type SolveOptions,
} from './challenge';

// Lyrics Module
export {
  parseSyncedLyrics,
  parseRecordLyrics,
  isSyncedLyrics,
  toPlainLyrics,
  formatTimestamp,
  getActiveLineIndex,
  type ParseSyncedLyricsOptions,
} from './lyrics';

// Utilities
export { Logger, createLogger, silentLogger } from './utils/logger';
export type { LogLevel, LoggerConfig } from './utils/logger';
export { validate, validateSafe, isValidationError } from './utils/validation';

// Version
export const VERSION = '0.3.1';
