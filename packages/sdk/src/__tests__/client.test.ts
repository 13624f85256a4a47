/**
 * Tests for LrcLibClient
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { LrcLibClient, DEFAULT_BASE_URL } from '../client';
import { NetworkError, NotFoundError, ValidationError } from '../types/errors';
import { parseSyncedLyrics } from '../lyrics';
import {
  fetchCall,
  jsonResponse,
  mockFetch,
  sampleLyricsPayload,
  sampleSearchPayload,
  sampleTrack,
  textResponse,
  type FetchMock,
} from './fixtures';

describe('LrcLibClient', () => {
  let client: LrcLibClient;
  let fetchMock: FetchMock;

  beforeEach(() => {
    fetchMock = mockFetch();
    client = new LrcLibClient({ userAgent: 'test-agent/1.0' });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  describe('constructor', () => {
    it('should apply defaults', () => {
      expect(client.getConfig()).toEqual({
        userAgent: 'test-agent/1.0',
        baseUrl: DEFAULT_BASE_URL,
        timeout: 30000,
        headers: {},
        debug: false,
      });
    });

    it('should strip a trailing slash from the base URL', () => {
      const mirror = new LrcLibClient({
        userAgent: 'test-agent/1.0',
        baseUrl: 'https://mirror.example.com/api/',
      });

      expect(mirror.getConfig().baseUrl).toBe('https://mirror.example.com/api');
      expect(mirror.http.getConfig().baseURL).toBe('https://mirror.example.com/api');
    });

    it('should throw ValidationError on invalid config', () => {
      expect(() => new LrcLibClient({ userAgent: 'test-agent/1.0', timeout: -5 })).toThrow(
        ValidationError
      );
    });

    it('should warn when the user agent is empty', () => {
      const emitWarning = vi.spyOn(process, 'emitWarning').mockImplementation(() => {});

      new LrcLibClient({ userAgent: '' });

      expect(emitWarning).toHaveBeenCalledWith(
        'Missing user agent, please set it with the `userAgent` option',
        'LrcLibWarning'
      );
    });

    it('should enable debug logging when asked', () => {
      const info = vi.spyOn(console, 'info').mockImplementation(() => {});

      new LrcLibClient({ userAgent: 'test-agent/1.0', debug: true });

      expect(info).toHaveBeenCalledWith(expect.stringMatching(/\[LrcLib\]$/), 'Initialized', {
        baseUrl: DEFAULT_BASE_URL,
      });
    });

    it('should keep debug logging per client', async () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => {});
      vi.spyOn(console, 'info').mockImplementation(() => {});
      const verbose = new LrcLibClient({ userAgent: 'test-agent/1.0', debug: true });
      new LrcLibClient({ userAgent: 'test-agent/1.0', debug: false });
      fetchMock.mockResolvedValueOnce(jsonResponse(sampleLyricsPayload));

      await verbose.getLyricsById(101);

      expect(log).toHaveBeenCalledWith(
        expect.stringMatching(/\[LrcLib:HTTPClient\]$/),
        'GET https://lrclib.net/api/get/101',
        ''
      );
    });

    it('should not log without debug', async () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => {});
      fetchMock.mockResolvedValueOnce(jsonResponse(sampleLyricsPayload));

      await client.getLyricsById(101);

      expect(log).not.toHaveBeenCalled();
    });
  });

  describe('requests', () => {
    it('should send the user agent and configured headers', async () => {
      const withHeaders = new LrcLibClient({
        userAgent: 'test-agent/1.0',
        headers: { 'X-Client': 'tests' },
      });
      fetchMock.mockResolvedValueOnce(jsonResponse(sampleLyricsPayload));

      await withHeaders.getLyricsById(101);

      expect(fetchCall(fetchMock).init.headers).toEqual({
        'X-Client': 'tests',
        'User-Agent': 'test-agent/1.0',
      });
    });

    it('should expose interceptors through http', async () => {
      const seen: string[] = [];
      client.http.addRequestInterceptor((config) => {
        seen.push(config.url);
        return config;
      });
      fetchMock.mockResolvedValueOnce(jsonResponse([]));

      await client.searchLyrics({ query: 'ocean' });

      expect(seen).toEqual(['/search']);
    });
  });

  describe('lyrics workflow', () => {
    it('should return line-oriented synced lyrics for a known track', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse(sampleLyricsPayload));

      const lyrics = await client.getLyrics(sampleTrack);

      expect(fetchCall(fetchMock).url).toBe(
        'https://lrclib.net/api/get?track_name=Ocean+Drive&artist_name=Example+Band&album_name=Night+Roads&duration=212'
      );
      expect(lyrics.syncedLyrics).not.toBeNull();
      const { lines } = parseSyncedLyrics(lyrics.syncedLyrics ?? '');
      expect(lines.map((line) => line.text)).toEqual(['First line', 'Second line', '']);
    });

    it('should fetch by an ID taken from a search', async () => {
      fetchMock
        .mockResolvedValueOnce(jsonResponse(sampleSearchPayload))
        .mockResolvedValueOnce(jsonResponse({ ...sampleLyricsPayload, id: 202 }));

      const results = await client.searchLyrics({ trackName: 'Ocean Drive' });
      const lyrics = await client.getLyricsById(results[1].id);

      expect(fetchCall(fetchMock, 1).url).toBe('https://lrclib.net/api/get/202');
      expect(lyrics.id).toBe(202);
    });

    it('should return an empty search result when nothing matches', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse([]));

      await expect(client.searchLyrics({ query: 'zz-no-such-track-zz' })).resolves.toEqual([]);
    });

    it('should surface NotFoundError for an unknown track', async () => {
      fetchMock.mockResolvedValueOnce(textResponse(null, 404, 'Not Found'));

      await expect(client.getLyrics(sampleTrack)).rejects.toThrow(NotFoundError);
    });

    it('should surface NetworkError without connectivity', async () => {
      fetchMock.mockRejectedValue(new TypeError('fetch failed'));

      await expect(client.getLyrics(sampleTrack)).rejects.toThrow(NetworkError);
      await expect(client.searchLyrics({ query: 'ocean' })).rejects.toThrow(NetworkError);
      await expect(client.getLyricsById(1)).rejects.toThrow(NetworkError);
    });
  });

  describe('publishing', () => {
    it('should request a challenge', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ prefix: 'test-prefix', target: 'ff'.repeat(32) }));

      await expect(client.requestChallenge()).resolves.toEqual({
        prefix: 'test-prefix',
        target: 'ff'.repeat(32),
      });
    });

    it('should publish with a given token', async () => {
      fetchMock.mockResolvedValueOnce(textResponse(null, 201));

      await expect(
        client.publishLyrics(sampleTrack, { plainLyrics: 'First line' }, { publishToken: 'test-prefix:9' })
      ).resolves.toBeUndefined();
      expect(fetchCall(fetchMock).url).toBe('https://lrclib.net/api/publish');
    });
  });
});
