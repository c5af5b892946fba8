/**
 * Lichess public API client
 */

import { z } from 'zod';

import { TransportError, UnknownUserError } from '../errors.js';
import type { LichessUser } from '../types.js';

import { BaseHttpClient, type HttpClientConfig } from './base.js';

/**
 * Default configuration for the Lichess client
 */
export const DEFAULT_LICHESS_CONFIG: HttpClientConfig = {
  baseUrl: 'https://lichess.org',
  timeoutMs: 30000,
};

const userSchema = z.object({
  id: z.string(),
  username: z.string(),
  disabled: z.boolean().optional(),
  closed: z.boolean().optional(),
});

const exportedGameSchema = z.object({
  id: z.string(),
  pgn: z.string().optional(),
});

/**
 * Client for the Lichess HTTP API
 */
export class LichessClient extends BaseHttpClient {
  constructor(config: Partial<HttpClientConfig> = {}) {
    super({
      ...DEFAULT_LICHESS_CONFIG,
      ...config,
    });
  }

  /**
   * Look up a user account
   *
   * @throws UnknownUserError if the account does not exist or is closed
   * @throws TransportError on network failure or an unexpected status
   */
  async getUser(username: string): Promise<LichessUser> {
    const url = this.buildUrl(`/api/user/${encodeURIComponent(username)}`);
    const response = await this.get(url, 'application/json');
    if (response.status === 404) {
      throw new UnknownUserError(username);
    }

    const body = await this.readText(response, url);
    const parsed = userSchema.safeParse(parseJson(body, url));
    if (!parsed.success) {
      throw new UnknownUserError(username);
    }
    if (parsed.data.disabled || parsed.data.closed) {
      throw new UnknownUserError(username, 'closed');
    }
    return parsed.data;
  }

  /**
   * Export games through the structured (NDJSON) API
   *
   * @returns The PGN of each exported game, in server order
   */
  async exportGamesNdjson(username: string, query: URLSearchParams): Promise<string[]> {
    const params = new URLSearchParams(query);
    params.set('pgnInJson', 'true');
    const url = this.buildUrl(`/api/games/user/${encodeURIComponent(username)}`, params);

    const response = await this.get(url, 'application/x-ndjson');
    if (response.status === 404) {
      throw new UnknownUserError(username);
    }

    const body = await this.readText(response, url);
    const games: string[] = [];
    for (const line of body.split('\n')) {
      if (!line.trim()) continue;
      const parsed = exportedGameSchema.safeParse(parseJson(line, url));
      if (!parsed.success) {
        throw new TransportError(`Unexpected game record from ${url}`, response.status, url);
      }
      if (parsed.data.pgn?.trim()) {
        games.push(parsed.data.pgn);
      }
    }
    return games;
  }

  /**
   * Export games as one bulk PGN text
   */
  async exportGamesPgn(username: string, query: URLSearchParams): Promise<string> {
    const url = this.buildUrl(`/api/games/user/${encodeURIComponent(username)}`, query);

    const response = await this.get(url, 'application/x-chess-pgn');
    if (response.status === 404) {
      throw new UnknownUserError(username);
    }
    return this.readText(response, url);
  }
}

function parseJson(text: string, url: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    throw new TransportError(`Malformed JSON from ${url}`, undefined, url);
  }
}
