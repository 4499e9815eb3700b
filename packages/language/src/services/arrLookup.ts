/**
 * Radarr / Sonarr Lookup Clients
 * 
 * Both services expose the same v3 lookup API:
 *   GET /api/v3/movie/lookup?term=...   (Radarr)
 *   GET /api/v3/series/lookup?term=...  (Sonarr)
 * authenticated with an `X-Api-Key` header. Each result may carry an
 * `originalLanguage` object with the language's English name.
 * 
 * Requests are bounded by header and body timeouts and never retried.
 */

import { LookupError, errorMessage } from '@streamplan/core';
import { request, type Dispatcher } from 'undici';
import { z } from 'zod';
import type { LanguageLookupService } from '../types.js';

export interface ArrLookupConfig {
  url: string;
  apiKey: string;
  timeoutMs?: number;
  /** Custom undici dispatcher (proxy agent, mock agent) */
  dispatcher?: Dispatcher;
}

const DEFAULT_TIMEOUT_MS = 10000;

const lookupResponseSchema = z.array(
  z.object({
    title: z.string().optional(),
    originalLanguage: z.object({ name: z.string() }).passthrough().nullish(),
  }).passthrough()
);

abstract class ArrLookupService implements LanguageLookupService {
  abstract readonly source: string;
  protected abstract readonly lookupPath: string;
  private config: ArrLookupConfig;

  constructor(config: ArrLookupConfig) {
    this.config = config;
  }

  isConfigured(): boolean {
    return this.config.url.trim().length > 0 && this.config.apiKey.trim().length > 0;
  }

  private buildUrl(term: string): URL {
    const base = this.config.url.replace(/\/+$/, '');
    const url = new URL(`${base}${this.lookupPath}`);
    url.searchParams.set('term', term);
    return url;
  }

  async lookupOriginalLanguage(term: string): Promise<string | null> {
    if (!this.isConfigured()) {
      throw new LookupError(this.source, 'URL and API key are required');
    }

    let url: URL;
    try {
      url = this.buildUrl(term);
    } catch (error) {
      throw new LookupError(this.source, `invalid URL ${this.config.url}: ${errorMessage(error)}`);
    }

    const timeout = this.config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    let payload: unknown;
    try {
      const { statusCode, body } = await request(url, {
        method: 'GET',
        headers: {
          'X-Api-Key': this.config.apiKey,
          Accept: 'application/json',
        },
        headersTimeout: timeout,
        bodyTimeout: timeout,
        ...(this.config.dispatcher ? { dispatcher: this.config.dispatcher } : {}),
      });

      if (statusCode < 200 || statusCode >= 300) {
        await body.dump();
        throw new LookupError(this.source, `HTTP ${statusCode}`, { statusCode });
      }
      payload = await body.json();
    } catch (error) {
      if (error instanceof LookupError) throw error;
      throw new LookupError(this.source, errorMessage(error));
    }

    const parsed = lookupResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new LookupError(this.source, 'unexpected response shape');
    }

    const [first] = parsed.data;
    return first?.originalLanguage?.name ?? null;
  }
}

export class RadarrLookupService extends ArrLookupService {
  readonly source = 'radarr';
  protected readonly lookupPath = '/api/v3/movie/lookup';
}

export class SonarrLookupService extends ArrLookupService {
  readonly source = 'sonarr';
  protected readonly lookupPath = '/api/v3/series/lookup';
}
