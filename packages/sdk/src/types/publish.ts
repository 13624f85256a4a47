/**
 * Publishing types
 */

import type { TrackSignature } from './index';

/**
 * Proof-of-work challenge issued by `POST /request-challenge`.
 * Expires five minutes after issue.
 */
export interface CryptographicChallenge {
  readonly prefix: string;
  /** Hex encoded SHA-256 upper bound */
  readonly target: string;
}

/**
 * Lyrics to publish. When both are omitted the track is marked instrumental.
 */
export interface PublishLyricsInput {
  plainLyrics?: string;
  syncedLyrics?: string;
}

export interface PublishOptions {
  /** `prefix:nonce`; obtained by solving a fresh challenge when omitted */
  publishToken?: string;
  /** Cancels challenge solving */
  signal?: AbortSignal;
}

/**
 * JSON body of `POST /publish`
 */
export interface PublishPayload extends TrackSignature {
  plainLyrics: string | null;
  syncedLyrics: string | null;
}
