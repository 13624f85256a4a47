/**
 * Main LrcLibClient class
 *
 * Central entry point for the SDK:
 * - Lyrics lookup by track signature or ID
 * - Lyrics search
 * - Challenge request and lyrics publishing
 */

import type {
  CryptographicChallenge,
  GetLyricsOptions,
  LrcLibConfig,
  Lyrics,
  PublishLyricsInput,
  PublishOptions,
  SearchParams,
  SearchResult,
  TrackSignature,
} from './types';
import { LrcLibConfigSchema } from './utils/validators';
import { validate } from './utils/validation';
import { BaseClient } from './api/BaseClient';
import { LyricsAPI } from './api/LyricsAPI';
import { PublishAPI } from './api/PublishAPI';
import { createLogger, type Logger } from './utils/logger';

export const DEFAULT_BASE_URL = 'https://lrclib.net/api';

export const DEFAULT_TIMEOUT = 30000;

export class LrcLibClient {
  private config: Required<LrcLibConfig>;
  private lyricsAPI: LyricsAPI;
  private publishAPI: PublishAPI;
  private readonly logger: Logger;

  /**
   * Underlying HTTP client, for interceptors
   *
   * @example
   * ```typescript
   * client.http.addRequestInterceptor((config) => {
   *   console.log('Requesting', config.url)
   *   return config
   * })
   * ```
   */
  public readonly http: BaseClient;

  constructor(config: LrcLibConfig) {
    const validatedConfig = validate(LrcLibConfigSchema, config, 'LrcLibConfig');

    this.config = {
      userAgent: validatedConfig.userAgent,
      baseUrl: (validatedConfig.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, ''),
      timeout: validatedConfig.timeout ?? DEFAULT_TIMEOUT,
      headers: validatedConfig.headers ?? {},
      debug: validatedConfig.debug ?? false,
    };

    // Per client, so one client's `debug` never changes another's logging
    this.logger = createLogger({
      enabled: this.config.debug,
      level: this.config.debug ? 'debug' : 'info',
      namespace: 'LrcLib',
    });

    if (!this.config.userAgent) {
      const message = 'Missing user agent, please set it with the `userAgent` option';
      this.logger.warn(message);
      process.emitWarning(message, 'LrcLibWarning');
    }

    this.http = new BaseClient(
      {
        baseURL: this.config.baseUrl,
        timeout: this.config.timeout,
        headers: this.config.headers,
        userAgent: this.config.userAgent,
      },
      this.logger
    );
    this.lyricsAPI = new LyricsAPI(this.http, this.logger);
    this.publishAPI = new PublishAPI(this.http, this.logger);

    this.logger.info('Initialized', { baseUrl: this.config.baseUrl });
  }

  // ============================================================================
  // Lyrics
  // ============================================================================

  /**
   * Get lyrics by exact track signature
   *
   * @example
   * ```typescript
   * const lyrics = await client.getLyrics({
   *   trackName: 'Ocean Drive',
   *   artistName: 'Example Band',
   *   albumName: 'Night Roads',
   *   duration: 212,
   * })
   * console.log(lyrics.syncedLyrics ?? lyrics.plainLyrics)
   * ```
   *
   * @throws NotFoundError if the service has no match
   * @throws NetworkError on connection failure or timeout
   * @throws ServerError on any other non-2xx response
   */
  async getLyrics(track: TrackSignature, options?: GetLyricsOptions): Promise<Lyrics> {
    return this.lyricsAPI.getLyrics(track, options);
  }

  /**
   * Search lyrics. Resolves to an empty array when nothing matches.
   */
  async searchLyrics(params: SearchParams): Promise<SearchResult> {
    return this.lyricsAPI.searchLyrics(params);
  }

  /**
   * Get lyrics by LRCLIB record ID
   *
   * @throws NotFoundError if no record has this ID
   */
  async getLyricsById(id: number | string): Promise<Lyrics> {
    return this.lyricsAPI.getLyricsById(id);
  }

  // ============================================================================
  // Publishing
  // ============================================================================

  async requestChallenge(): Promise<CryptographicChallenge> {
    return this.publishAPI.requestChallenge();
  }

  /**
   * Publish lyrics. Without a publish token, one is obtained by solving a
   * fresh challenge, which can take several seconds.
   *
   * @throws IncorrectPublishTokenError if the token is rejected
   */
  async publishLyrics(
    track: TrackSignature,
    lyrics?: PublishLyricsInput,
    options?: PublishOptions
  ): Promise<void> {
    return this.publishAPI.publishLyrics(track, lyrics, options);
  }

  // ============================================================================
  // Configuration
  // ============================================================================

  getConfig(): Readonly<Required<LrcLibConfig>> {
    return { ...this.config, headers: { ...this.config.headers } };
  }
}
