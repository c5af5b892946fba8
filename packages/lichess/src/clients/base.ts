/**
 * Base HTTP client with request plumbing shared by API clients
 */

import { RateLimitError, TransportError } from '../errors.js';

/**
 * The subset of a fetch Response the clients read
 */
export interface FetchResponse {
  ok: boolean;
  status: number;
  statusText: string;
  text(): Promise<string>;
}

export interface FetchInit {
  headers: Record<string, string>;
  signal?: AbortSignal;
}

export type FetchLike = (url: string, init: FetchInit) => Promise<FetchResponse>;

/**
 * Configuration for HTTP client connections
 */
export interface HttpClientConfig {
  /** Base URL without a trailing slash */
  baseUrl: string;
  /** Personal API token sent as a bearer token */
  token?: string;
  /** Timeout in milliseconds for each request */
  timeoutMs?: number;
  userAgent?: string;
  /** Replaces the global fetch, used by tests */
  fetch?: FetchLike;
}

const DEFAULT_USER_AGENT = 'slipfinder/0.1.0';

/**
 * Base class for HTTP API clients
 */
export abstract class BaseHttpClient {
  protected readonly config: Required<Omit<HttpClientConfig, 'token' | 'fetch'>> & { token?: string };
  private readonly fetchFn: FetchLike;

  constructor(config: HttpClientConfig) {
    this.config = {
      baseUrl: config.baseUrl.replace(/\/+$/, ''),
      timeoutMs: config.timeoutMs ?? 30000,
      userAgent: config.userAgent ?? DEFAULT_USER_AGENT,
    };
    if (config.token) {
      this.config.token = config.token;
    }
    this.fetchFn = config.fetch ?? ((url, init) => fetch(url, init));
  }

  /**
   * Absolute URL for an API path
   */
  protected buildUrl(path: string, query?: URLSearchParams): string {
    const search = query?.toString();
    return `${this.config.baseUrl}${path}${search ? `?${search}` : ''}`;
  }

  /**
   * Issue a GET request
   *
   * Network failures become TransportError and 429 becomes RateLimitError;
   * every other status is returned for the caller to interpret.
   */
  protected async get(url: string, accept: string): Promise<FetchResponse> {
    const headers: Record<string, string> = {
      Accept: accept,
      'User-Agent': this.config.userAgent,
    };
    if (this.config.token) {
      headers['Authorization'] = `Bearer ${this.config.token}`;
    }

    let response: FetchResponse;
    try {
      response = await this.fetchFn(url, { headers, signal: AbortSignal.timeout(this.config.timeoutMs) });
    } catch (err) {
      throw new TransportError(
        `Request to ${url} failed: ${err instanceof Error ? err.message : String(err)}`,
        undefined,
        url,
      );
    }

    if (response.status === 429) {
      throw new RateLimitError(url);
    }
    return response;
  }

  /**
   * Read the body of a successful response, mapping other statuses to TransportError
   */
  protected async readText(response: FetchResponse, url: string): Promise<string> {
    if (!response.ok) {
      throw new TransportError(`Lichess API error: ${response.status} ${response.statusText}`.trim(), response.status, url);
    }
    try {
      return await response.text();
    } catch (err) {
      throw new TransportError(
        `Failed to read response from ${url}: ${err instanceof Error ? err.message : String(err)}`,
        response.status,
        url,
      );
    }
  }

  public get baseUrl(): string {
    return this.config.baseUrl;
  }
}
