/**
 * Proof-of-work challenge solver
 *
 * LRCLIB guards `POST /publish` with a challenge: find a nonce such that
 * `sha256(prefix + nonce)`, read as a big-endian byte string, is strictly
 * less than the target. The publish token is then `prefix:nonce`.
 */

import { createHash } from 'crypto';
import { setImmediate as yieldToEventLoop } from 'timers/promises';
import { ChallengeAbortedError, ValidationError } from '../types/errors';
import { silentLogger, type Logger } from '../utils/logger';

const HEX_PATTERN = /^(?:[0-9a-fA-F]{2})+$/;

export interface Solution {
  prefix: string;
  targetHex: string;
  /** Null until a nonce is found */
  nonce: number | null;
}

export interface FindNonceOptions {
  start?: number;
  step?: number;
  /** Give up after this many candidates */
  maxAttempts?: number;
}

export interface SolveOptions {
  /** Candidates checked between event loop yields */
  batchSize?: number;
  signal?: AbortSignal;
  logger?: Logger;
}

/**
 * Decode a hex target, rejecting anything that is not whole bytes of hex
 */
export function parseTarget(targetHex: string): Buffer {
  if (!HEX_PATTERN.test(targetHex)) {
    throw new ValidationError(`Challenge target is not a hex string: ${targetHex}`, undefined, {
      targetHex,
    });
  }
  return Buffer.from(targetHex, 'hex');
}

export function isNonceValid(prefix: string, nonce: number | string, target: Buffer): boolean {
  const hash = createHash('sha256').update(`${prefix}${nonce}`).digest();
  return Buffer.compare(hash, target) < 0;
}

/**
 * Scan nonces `start, start + step, ...` synchronously
 */
export function findNonce(prefix: string, target: Buffer, options?: FindNonceOptions): Solution {
  const step = options?.step ?? 1;
  const maxAttempts = options?.maxAttempts ?? Number.POSITIVE_INFINITY;
  const solution: Solution = { prefix, targetHex: target.toString('hex'), nonce: null };

  let nonce = options?.start ?? 0;
  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    if (isNonceValid(prefix, nonce, target)) {
      solution.nonce = nonce;
      break;
    }
    nonce += step;
  }

  return solution;
}

/**
 * Solve a challenge without blocking the event loop for longer than one batch
 *
 * @returns The nonce as a decimal string
 * @throws ValidationError if the target is not hex
 * @throws ChallengeAbortedError if the signal aborts first
 */
export async function solveChallenge(
  prefix: string,
  targetHex: string,
  options?: SolveOptions
): Promise<string> {
  const target = parseTarget(targetHex);
  const batchSize = options?.batchSize ?? 10000;
  const signal = options?.signal;
  const logger = (options?.logger ?? silentLogger).child('ChallengeSolver');
  const startedAt = Date.now();

  logger.debug('Solving challenge', { prefix, targetHex });

  let start = 0;
  for (;;) {
    if (signal?.aborted) {
      throw new ChallengeAbortedError('Challenge solving was aborted', {
        prefix,
        checked: start,
      });
    }

    const { nonce } = findNonce(prefix, target, { start, maxAttempts: batchSize });
    if (nonce !== null) {
      logger.debug('Found nonce', { nonce, elapsedMs: Date.now() - startedAt });
      return String(nonce);
    }

    start += batchSize;
    await yieldToEventLoop();
  }
}
