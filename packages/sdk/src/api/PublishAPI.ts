/**
 * Publish API
 *
 * Write operations against LRCLIB. Publishing needs a publish token, which is
 * the solution to a proof-of-work challenge issued by the service.
 */

import type {
  CryptographicChallenge,
  PublishLyricsInput,
  PublishOptions,
  PublishPayload,
  TrackSignature,
} from '../types';
import { IncorrectPublishTokenError, ServerError } from '../types/errors';
import { solveChallenge } from '../challenge';
import {
  CryptographicChallengeSchema,
  PublishLyricsInputSchema,
  TrackSignatureSchema,
} from '../utils/validators';
import { validate } from '../utils/validation';
import { silentLogger, type Logger } from '../utils/logger';
import type { BaseClient } from './BaseClient';

export const PUBLISH_ENDPOINTS = {
  requestChallenge: '/request-challenge',
  publish: '/publish',
} as const;

export const PUBLISH_TOKEN_HEADER = 'X-Publish-Token';

export class PublishAPI {
  private httpClient: BaseClient;
  private readonly logger: Logger;

  constructor(httpClient: BaseClient, logger: Logger = silentLogger) {
    this.httpClient = httpClient;
    this.logger = logger.child('PublishAPI');
  }

  /**
   * Request a fresh challenge. Each challenge expires after five minutes.
   */
  async requestChallenge(): Promise<CryptographicChallenge> {
    const data = await this.httpClient.post(PUBLISH_ENDPOINTS.requestChallenge);
    return validate(CryptographicChallengeSchema, data, 'CryptographicChallenge');
  }

  /**
   * Request a challenge and solve it
   *
   * @returns Publish token in the form `prefix:nonce`
   */
  async obtainPublishToken(signal?: AbortSignal): Promise<string> {
    const challenge = await this.requestChallenge();
    const nonce = await solveChallenge(challenge.prefix, challenge.target, {
      signal,
      logger: this.logger,
    });
    return `${challenge.prefix}:${nonce}`;
  }

  /**
   * Publish lyrics for a track. With no lyrics, the track is marked instrumental.
   *
   * @throws IncorrectPublishTokenError if the service rejects the token
   */
  async publishLyrics(
    track: TrackSignature,
    lyrics: PublishLyricsInput = {},
    options?: PublishOptions
  ): Promise<void> {
    const signature = validate(TrackSignatureSchema, track, 'TrackSignature');
    const content = validate(PublishLyricsInputSchema, lyrics, 'PublishLyricsInput');

    const publishToken = options?.publishToken ?? (await this.obtainPublishToken(options?.signal));

    const payload: PublishPayload = {
      trackName: signature.trackName,
      artistName: signature.artistName,
      albumName: signature.albumName,
      duration: Math.round(signature.duration),
      plainLyrics: content.plainLyrics ?? null,
      syncedLyrics: content.syncedLyrics ?? null,
    };

    this.logger.debug('Publishing lyrics', {
      trackName: payload.trackName,
      artistName: payload.artistName,
      instrumental: payload.plainLyrics === null && payload.syncedLyrics === null,
    });

    try {
      await this.httpClient.post(PUBLISH_ENDPOINTS.publish, payload, {
        headers: { [PUBLISH_TOKEN_HEADER]: publishToken },
      });
    } catch (error) {
      if (error instanceof ServerError && error.statusCode === 400) {
        throw new IncorrectPublishTokenError(error.message, error.context);
      }
      throw error;
    }
  }
}
