/**
 * API modules
 */

export { BaseClient } from './BaseClient';
export type {
  QueryParams,
  RequestInterceptor,
  ResponseInterceptor,
  RequestConfig,
  HTTPClientConfig,
} from './BaseClient';

export { LyricsAPI, LYRICS_ENDPOINTS } from './LyricsAPI';
export { PublishAPI, PUBLISH_ENDPOINTS, PUBLISH_TOKEN_HEADER } from './PublishAPI';
