/**
 * Lyrics module exports
 */

export {
  parseSyncedLyrics,
  parseRecordLyrics,
  isSyncedLyrics,
  toPlainLyrics,
  formatTimestamp,
  getActiveLineIndex,
  type ParseSyncedLyricsOptions,
} from './LrcParser';
