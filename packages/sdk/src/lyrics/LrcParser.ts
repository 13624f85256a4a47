/**
 * Synced lyrics helpers
 *
 * LRCLIB's `syncedLyrics` field holds LRC text: each row starts with one or
 * more `[mm:ss.xx]` time tags, and header rows such as `[ar:Artist]` or
 * `[offset:+250]` carry metadata.
 */

import type { LrcMetadata, LyricsMinimal, ParsedSyncedLyrics, SyncedLyricsLine } from '../types';

// Minutes are unbounded; the fraction may use 1 to 3 digits
const LEADING_TIME_TAG = /^\[(\d+):([0-5]\d)(?:[.:](\d{1,3}))?\]/;
const ID_TAG = /^\[([a-z#]+):([^\]]*)\]$/i;
const SIGNED_INTEGER = /^[+-]?\d+$/;

export interface ParseSyncedLyricsOptions {
  /** Track length in milliseconds; gives the last line a duration */
  trackDurationMs?: number;
}

interface RawLine {
  times: number[];
  text: string;
}

function toMilliseconds(minutes: string, seconds: string, fraction = ''): number {
  const whole = Number(minutes) * 60_000 + Number(seconds) * 1000;
  return fraction ? whole + Math.round(Number(`0.${fraction}`) * 1000) : whole;
}

/**
 * Split one row into its leading time tags and the remaining text
 */
function readRow(row: string): RawLine {
  const times: number[] = [];
  let rest = row.trimStart();

  for (let tag = LEADING_TIME_TAG.exec(rest); tag; tag = LEADING_TIME_TAG.exec(rest)) {
    times.push(toMilliseconds(tag[1], tag[2], tag[3]));
    rest = rest.slice(tag[0].length).trimStart();
  }

  return { times, text: rest.trimEnd() };
}

function readMetadata(row: string, metadata: LrcMetadata): void {
  const tag = ID_TAG.exec(row.trim());
  if (!tag) return;

  const key = tag[1].toLowerCase();
  const value = tag[2].trim();
  if (key === 'offset') {
    if (SIGNED_INTEGER.test(value)) {
      metadata.offset = Number(value);
    }
    return;
  }
  metadata[key] = value;
}

/**
 * Parse LRC text into timed lines sorted by time.
 *
 * A positive `[offset:]` makes lyrics show earlier, so it is subtracted from
 * every timestamp. Shifted timestamps never go below zero.
 */
export function parseSyncedLyrics(
  content: string,
  options?: ParseSyncedLyricsOptions
): ParsedSyncedLyrics {
  const metadata: LrcMetadata = {};
  const timed: SyncedLyricsLine[] = [];

  for (const row of content.split(/\r?\n/)) {
    const { times, text } = readRow(row);
    if (times.length === 0) {
      readMetadata(row, metadata);
      continue;
    }
    times.forEach((timestamp) => timed.push({ timestamp, text }));
  }

  const offset = metadata.offset ?? 0;
  const sorted = timed
    .map((line) => ({ ...line, timestamp: Math.max(0, line.timestamp - offset) }))
    .sort((a, b) => a.timestamp - b.timestamp);

  const end = options?.trackDurationMs;
  const lines = sorted.map((line, index): SyncedLyricsLine => {
    const next = index + 1 < sorted.length ? sorted[index + 1].timestamp : end;
    return next === undefined
      ? line
      : { ...line, duration: Math.max(0, next - line.timestamp) };
  });

  return {
    lines,
    metadata,
    plainText: lines.map((line) => line.text).join('\n'),
  };
}

/**
 * Parse the synced lyrics of an LRCLIB record, timing the last line against
 * the track duration.
 *
 * @returns null when the record has no synced lyrics
 */
export function parseRecordLyrics(
  record: Pick<LyricsMinimal, 'syncedLyrics' | 'plainLyrics' | 'duration'>
): ParsedSyncedLyrics | null {
  if (!record.syncedLyrics) return null;

  const parsed = parseSyncedLyrics(record.syncedLyrics, {
    trackDurationMs: Math.round(record.duration * 1000),
  });
  return record.plainLyrics ? { ...parsed, plainText: record.plainLyrics } : parsed;
}

export function isSyncedLyrics(content: string): boolean {
  return content.split(/\r?\n/).some((row) => LEADING_TIME_TAG.test(row.trimStart()));
}

/**
 * Drop time tags and metadata rows, keeping lines in time order
 */
export function toPlainLyrics(content: string): string {
  return parseSyncedLyrics(content).plainText;
}

/**
 * Format milliseconds as an LRC time tag, truncated to centiseconds
 */
export function formatTimestamp(milliseconds: number): string {
  const centiseconds = Math.floor(Math.max(0, milliseconds) / 10);
  const minutes = Math.floor(centiseconds / 6000);
  const seconds = Math.floor(centiseconds / 100) % 60;
  const pad = (value: number): string => String(value).padStart(2, '0');

  return `[${pad(minutes)}:${pad(seconds)}.${pad(centiseconds % 100)}]`;
}

/**
 * Index of the line showing at `positionMs`, or -1 before the first line.
 * `lines` must be sorted by timestamp, as `parseSyncedLyrics` returns them.
 */
export function getActiveLineIndex(lines: readonly SyncedLyricsLine[], positionMs: number): number {
  let low = 0;
  let high = lines.length - 1;
  let active = -1;

  while (low <= high) {
    const mid = (low + high) >> 1;
    if (lines[mid].timestamp <= positionMs) {
      active = mid;
      low = mid + 1;
    } else {
      high = mid - 1;
    }
  }

  return active;
}
