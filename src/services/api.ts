/**
 * Spotify API Client
 * Every call goes through one retrying executor; list endpoints are walked
 * page by page until the API stops returning a `next` link.
 */

import { ofetch } from 'ofetch';
import { retry, describeError, DEFAULT_RETRY_CONFIG } from './retry.js';
import type { BearerSession } from './session.js';
import type { Logger } from '../lib/logger.js';
import type {
  ApiRequest,
  HttpMethod,
  Paging,
  QueryParams,
} from '../types/api.js';

export const API_BASE = 'https://api.spotify.com/v1/';

// Progress lines while paginating, at most this often
export const PROGRESS_INTERVAL_MS = 15 * 1000;

export interface ApiClientOptions {
  logger: Logger;
  /** Attempts per request (default: 3) */
  tries?: number;
  /** Fixed pause between attempts (default: 2000) */
  retryDelayMs?: number;
  progressIntervalMs?: number;
  baseUrl?: string;
  /** Clock for progress throttling */
  now?: () => number;
}

/**
 * Resolve a path against the API base and append query parameters
 * in insertion order.
 */
export function buildUrl(path: string, query?: QueryParams, baseUrl: string = API_BASE): string {
  let url = path.startsWith(baseUrl) ? path : baseUrl + path.replace(/^\/+/, '');

  const entries = Object.entries(query ?? {});
  if (entries.length > 0) {
    const search = new URLSearchParams(entries.map<[string, string]>(([key, value]) => [key, String(value)]));
    url += (url.includes('?') ? '&' : '?') + search.toString();
  }

  return url;
}

/**
 * What the importer needs from the client
 */
export interface SpotifyApi {
  get<T>(path: string, query?: QueryParams): Promise<T>;
  post<T>(path: string, body?: unknown, query?: QueryParams): Promise<T>;
  list<T>(path: string, query?: QueryParams): Promise<T[]>;
}

export class SpotifyApiClient implements SpotifyApi {
  private session: BearerSession;
  private logger: Logger;
  private tries: number;
  private retryDelayMs: number;
  private progressIntervalMs: number;
  private baseUrl: string;
  private now: () => number;

  constructor(session: BearerSession, options: ApiClientOptions) {
    this.session = session;
    this.logger = options.logger;
    this.tries = options.tries ?? DEFAULT_RETRY_CONFIG.tries;
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_CONFIG.delayMs;
    this.progressIntervalMs = options.progressIntervalMs ?? PROGRESS_INTERVAL_MS;
    this.baseUrl = options.baseUrl ?? API_BASE;
    this.now = options.now ?? Date.now;
  }

  async get<T>(path: string, query?: QueryParams): Promise<T> {
    return this.execute<T>({ path, query, method: 'GET' });
  }

  async post<T>(path: string, body?: unknown, query?: QueryParams): Promise<T> {
    return this.execute<T>({ path, query, method: 'POST', body });
  }

  /**
   * Fetch every page of a list endpoint and join the items in page order.
   * A failed page fails the whole call; nothing partial is returned.
   */
  async list<T>(path: string, query?: QueryParams): Promise<T[]> {
    let lastLogTime = this.now();
    let page = await this.get<Paging<T>>(path, query);
    const items: T[] = [...page.items];

    while (page.next) {
      if (this.now() > lastLogTime + this.progressIntervalMs) {
        lastLogTime = this.now();
        this.logger.info(`Loaded ${items.length}/${page.total} items`);
      }

      // `next` already carries the original query
      page = await this.send<Paging<T>>(page.next, 'GET');
      items.push(...page.items);
    }

    return items;
  }

  /**
   * Issue one request with retry
   * @throws RetriesExhaustedError when every attempt failed
   */
  async execute<T>(request: ApiRequest): Promise<T> {
    const url = buildUrl(request.path, request.query, this.baseUrl);
    return this.send<T>(url, request.method, request.body);
  }

  private async send<T>(url: string, method: HttpMethod, body?: unknown): Promise<T> {
    const headers = this.session.authorize(
      method === 'POST' ? { 'Content-Type': 'application/json' } : {}
    );
    const payload = method === 'POST' && body !== undefined ? JSON.stringify(body) : undefined;
    const startTime = this.now();

    const result = await retry(
      async ({ attempt }) => {
        this.logger.debug('API request', { method, url, attempt });
        return ofetch<T>(url, {
          method,
          headers,
          body: payload,
          // the executor owns retrying
          retry: 0,
        });
      },
      {
        tries: this.tries,
        delayMs: this.retryDelayMs,
        target: url,
        onRetry: (error, attempt) => {
          this.logger.info(`Couldn't load URL: ${url} (${describeError(error)}), trying again...`, {
            method,
            attempt,
          });
        },
      }
    );

    this.logger.debug('API request completed', { method, url, duration: this.now() - startTime });
    return result;
  }
}
