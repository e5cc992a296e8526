/**
 * qBittorrent WebUI API v2 client.
 *
 * Implements the TorrentSource interface: lists torrents as payload
 * snapshots and repoints save locations. Authentication uses the WebUI
 * session cookie; an expired session (HTTP 403) triggers one re-login.
 *
 * @module engine/source/qbittorrent
 */

import {
  RepointError,
  SourceUnavailableError,
  type ClientConfig,
  type SourceSnapshot,
  type TorrentSource,
} from '../types.js';
import type { TierRoots } from '../relocation/paths.js';
import { Logger, createSilentLogger } from '../logger.js';
import { toSnapshot } from './mapper.js';

// =============================================================================
// Types
// =============================================================================

export interface QBittorrentSourceOptions {
  logger?: Logger;
}

// =============================================================================
// Constants
// =============================================================================

const LOGIN_PATH = '/api/v2/auth/login';
const TORRENTS_INFO_PATH = '/api/v2/torrents/info?filter=all';
const SET_LOCATION_PATH = '/api/v2/torrents/setLocation';

/** Body qBittorrent returns on successful login */
const LOGIN_OK = 'Ok.';

// =============================================================================
// Helpers
// =============================================================================

/**
 * Build the WebUI base URL. A host that already carries a scheme is used
 * as given.
 */
export function buildBaseUrl(host: string, port: number): string {
  if (/^https?:\/\//i.test(host)) {
    return host.replace(/\/+$/, '');
  }
  return `http://${host}:${port}`;
}

/**
 * Extract the `SID=...` pair from a set-cookie header
 */
export function extractSessionCookie(setCookie: string | null): string | null {
  if (!setCookie) return null;
  const match = /(?:^|[\s,;])SID=([^;,\s]+)/.exec(setCookie);
  return match ? `SID=${match[1]}` : null;
}

// =============================================================================
// QBittorrentSource Class
// =============================================================================

/**
 * TorrentSource backed by the qBittorrent WebUI
 *
 * @example
 * ```typescript
 * const source = new QBittorrentSource(config.client, { cache: '/cache', master: '/data' });
 * await source.login();
 * const { payloads } = await source.listPayloads();
 * ```
 */
export class QBittorrentSource implements TorrentSource {
  private readonly baseUrl: string;
  private readonly config: ClientConfig;
  private readonly roots: TierRoots;
  private readonly logger: Logger;

  /** Session cookie; stays null when the WebUI skips authentication */
  private cookie: string | null = null;
  private loggedIn = false;

  constructor(config: ClientConfig, roots: TierRoots, options: QBittorrentSourceOptions = {}) {
    this.config = config;
    this.roots = roots;
    this.baseUrl = buildBaseUrl(config.host, config.port);
    this.logger = options.logger ?? createSilentLogger();
  }

  /**
   * Authenticate and store the session cookie.
   *
   * @throws {SourceUnavailableError} On network failure or rejected credentials
   */
  async login(): Promise<void> {
    const body = new URLSearchParams({
      username: this.config.username,
      password: this.config.password,
    });

    let response: Response;
    try {
      response = await this.send(LOGIN_PATH, { method: 'POST', body }, false);
    } catch (err) {
      throw new SourceUnavailableError(`Cannot reach qBittorrent: ${(err as Error).message}`);
    }

    const text = (await response.text()).trim();
    if (!response.ok || text !== LOGIN_OK) {
      throw new SourceUnavailableError(
        `qBittorrent login failed (HTTP ${response.status}${text ? `: ${text}` : ''})`
      );
    }

    // Authentication disabled for the local subnet: no cookie is issued
    this.cookie = extractSessionCookie(response.headers.get('set-cookie'));
    this.loggedIn = true;
    this.logger.info('connected to qBittorrent', { url: this.baseUrl });
  }

  /**
   * Fetch all torrents as a payload snapshot.
   *
   * @throws {SourceUnavailableError} When the listing cannot be obtained
   */
  async listPayloads(): Promise<SourceSnapshot> {
    let response: Response;
    try {
      response = await this.request(TORRENTS_INFO_PATH, { method: 'GET' });
    } catch (err) {
      if (err instanceof SourceUnavailableError) throw err;
      throw new SourceUnavailableError(`Cannot list torrents: ${(err as Error).message}`);
    }

    if (!response.ok) {
      throw new SourceUnavailableError(`Cannot list torrents: HTTP ${response.status}`);
    }

    let entries: unknown;
    try {
      entries = await response.json();
    } catch (err) {
      throw new SourceUnavailableError(`Invalid torrent listing: ${(err as Error).message}`);
    }

    if (!Array.isArray(entries)) {
      throw new SourceUnavailableError('Invalid torrent listing: expected an array');
    }

    const snapshot = toSnapshot(entries, this.roots);
    for (const rejected of snapshot.rejected) {
      this.logger.warn('rejected torrent entry', { id: rejected.id, reason: rejected.reason });
    }
    return snapshot;
  }

  /**
   * Repoint a torrent's save location. Only HTTP 200 counts as success.
   *
   * @throws {RepointError} On any other outcome
   */
  async setSaveLocation(id: string, location: string): Promise<void> {
    const body = new URLSearchParams({ hashes: id, location });

    let response: Response;
    try {
      response = await this.request(SET_LOCATION_PATH, { method: 'POST', body });
    } catch (err) {
      throw new RepointError(`Repoint of ${id} failed: ${(err as Error).message}`, location);
    }

    if (response.status !== 200) {
      const text = (await response.text()).trim();
      throw new RepointError(
        `Repoint of ${id} rejected (HTTP ${response.status}${text ? `: ${text}` : ''})`,
        location,
        response.status
      );
    }
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  /**
   * Authenticated request; logs in first if needed and once more on 403
   */
  private async request(path: string, init: RequestInit): Promise<Response> {
    if (!this.loggedIn) {
      await this.login();
    }

    const response = await this.send(path, init, true);
    if (response.status !== 403) {
      return response;
    }

    this.logger.info('qBittorrent session expired, logging in again');
    await this.login();
    return this.send(path, init, true);
  }

  /**
   * Make an HTTP request with a timeout.
   */
  private async send(path: string, init: RequestInit, authenticated: boolean): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeoutMs);

    const headers: Record<string, string> = { Referer: this.baseUrl };
    if (authenticated && this.cookie) {
      headers.Cookie = this.cookie;
    }

    try {
      return await fetch(`${this.baseUrl}${path}`, {
        ...init,
        headers,
        signal: controller.signal,
      });
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new Error(`Request timed out after ${this.config.timeoutMs}ms`);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
