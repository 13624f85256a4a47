/**
 * Synced lyrics types
 */

/**
 * Individual lyrics line with timestamp
 */
export interface SyncedLyricsLine {
  /** Timestamp in milliseconds */
  timestamp: number;
  /** Line text, empty for instrumental breaks */
  text: string;
  /** Time until the next line in milliseconds (absent on the last line) */
  duration?: number;
}

/**
 * LRC metadata tags
 */
export interface LrcMetadata {
  /** Artist name */
  ar?: string;
  /** Album name */
  al?: string;
  /** Track title */
  ti?: string;
  /** Length in format mm:ss */
  length?: string;
  /** Offset in milliseconds */
  offset?: number;
  /** Additional metadata */
  [key: string]: string | number | undefined;
}

export interface ParsedSyncedLyrics {
  /** Lines sorted by timestamp */
  lines: SyncedLyricsLine[];
  metadata: LrcMetadata;
  /** Lyrics text without timestamps */
  plainText: string;
}
