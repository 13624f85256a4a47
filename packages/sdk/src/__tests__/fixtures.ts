/**
 * Shared test fixtures: stubbed fetch and sample LRCLIB payloads
 */

import { vi, type Mock } from 'vitest';

export type FetchMock = Mock<typeof fetch>;

/**
 * Replace global fetch with a mock. Undo with `vi.unstubAllGlobals()`.
 */
export function mockFetch(): FetchMock {
  const fetchMock = vi.fn<typeof fetch>();
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

export function jsonResponse(
  body: unknown,
  init?: { status?: number; statusText?: string; headers?: Record<string, string> }
): Response {
  return new Response(JSON.stringify(body), {
    status: init?.status ?? 200,
    statusText: init?.statusText,
    headers: { 'content-type': 'application/json', ...init?.headers },
  });
}

export function textResponse(body: string | null, status = 200, statusText?: string): Response {
  return new Response(body, { status, statusText, headers: { 'content-type': 'text/plain' } });
}

/**
 * JSON response whose body stream sends `chunks`, then errors with `failure`
 * or, without one, stays open forever
 */
export function streamingResponse(chunks: string[], failure?: Error): Response {
  const encoder = new TextEncoder();
  const body = new ReadableStream<Uint8Array>({
    start(controller) {
      chunks.forEach((chunk) => controller.enqueue(encoder.encode(chunk)));
      if (failure) {
        controller.error(failure);
      }
    },
  });
  return new Response(body, { status: 200, headers: { 'content-type': 'application/json' } });
}

/**
 * URL and init of the n-th fetch call
 */
export function fetchCall(fetchMock: FetchMock, index = 0): { url: string; init: RequestInit } {
  const call = fetchMock.mock.calls[index];
  if (!call) {
    throw new Error(`fetch was not called ${index + 1} time(s)`);
  }
  const [input, init] = call;
  return { url: typeof input === 'string' ? input : input.toString(), init: init ?? {} };
}

export const sampleTrack = {
  trackName: 'Ocean Drive',
  artistName: 'Example Band',
  albumName: 'Night Roads',
  duration: 212,
};

export const sampleSyncedLyrics = '[00:12.00] First line\n[00:15.50] Second line\n[00:20.10] ';

export const sampleLyricsPayload = {
  id: 101,
  name: 'Ocean Drive',
  trackName: 'Ocean Drive',
  artistName: 'Example Band',
  albumName: 'Night Roads',
  duration: 212,
  instrumental: false,
  plainLyrics: 'First line\nSecond line',
  syncedLyrics: sampleSyncedLyrics,
  lang: 'en',
  isrc: 'TEST00000001',
  spotifyId: 'test-spotify-id',
  releaseDate: '2023-08-10T00:00:00Z',
};

export const sampleSearchPayload = [
  {
    id: 101,
    name: 'Ocean Drive',
    trackName: 'Ocean Drive',
    artistName: 'Example Band',
    albumName: 'Night Roads',
    duration: 212,
    instrumental: false,
    plainLyrics: 'First line\nSecond line',
    syncedLyrics: sampleSyncedLyrics,
  },
  {
    id: 202,
    name: 'Ocean Drive (Live)',
    trackName: 'Ocean Drive (Live)',
    artistName: 'Example Band',
    albumName: 'Live at the Pier',
    duration: 230,
    instrumental: false,
    plainLyrics: 'First line\nSecond line',
    syncedLyrics: null,
  },
];
