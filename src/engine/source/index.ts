/**
 * Torrent Source Module
 *
 * @module engine/source
 */

export {
  QBittorrentSource,
  buildBaseUrl,
  extractSessionCookie,
  type QBittorrentSourceOptions,
} from './qbittorrent.js';

export { toPayload, toSnapshot, type MapResult } from './mapper.js';
