import fetch, { type Response } from 'node-fetch';
import { z } from 'zod';
import { extractSourceDomain, type SearchProvider, type SearchResult } from './search-provider';
import { BRAVE_RESPONSE_SCHEMA, type BraveResponse } from '../schemas/brave-responses';
import { ConfigError, RateLimitError, handleUnknownError } from '../errors/index';
import { APIResponseError } from '../errors/validation-errors';
import { debug } from '../output/logger';

export interface BraveSearchConfig {
  apiKey: string;
  maxResults?: number;
  timeoutMs?: number;
  endpoint?: string;
}

export const BraveSearchDefaultConfig = {
  endpoint: 'https://api.search.brave.com/res/v1/web/search',
  maxResults: 5,
  timeoutMs: 12_000,
};

// Brave returns highlighted fragments wrapped in <strong> tags
function stripMarkup(text: string): string {
  return text.replace(/<[^>]+>/g, '').replace(/\s+/g, ' ').trim();
}

export class BraveSearchProvider implements SearchProvider {
  private readonly apiKey: string;
  private readonly maxResults: number;
  private readonly timeoutMs: number;
  private readonly endpoint: string;

  constructor(config: BraveSearchConfig) {
    if (!config.apiKey.trim()) {
      throw new ConfigError('BRAVE_API_KEY is required for web search');
    }
    this.apiKey = config.apiKey;
    this.maxResults = config.maxResults ?? BraveSearchDefaultConfig.maxResults;
    this.timeoutMs = config.timeoutMs ?? BraveSearchDefaultConfig.timeoutMs;
    this.endpoint = config.endpoint ?? BraveSearchDefaultConfig.endpoint;
  }

  async search(query: string): Promise<SearchResult[]> {
    if (!query.trim()) throw new Error('Search query cannot be empty.');

    const params = new URLSearchParams({
      q: query,
      count: String(Math.min(this.maxResults, 20)),
    });

    debug(`Brave search: "${query.slice(0, 80)}"`);

    let res: Response;
    try {
      res = await fetch(`${this.endpoint}?${params.toString()}`, {
        headers: {
          Accept: 'application/json',
          'X-Subscription-Token': this.apiKey,
        },
        timeout: this.timeoutMs,
      });
    } catch (e: unknown) {
      const err = handleUnknownError(e, 'Brave search request');
      throw new Error(`Brave search request failed: ${err.message}`);
    }

    if (res.status === 429) {
      throw new RateLimitError(`Brave search rate limit exceeded (HTTP ${res.status})`, res.status);
    }
    if (!res.ok) {
      throw new Error(`Brave search API error (HTTP ${res.status} ${res.statusText})`);
    }

    const raw: unknown = await res.json();
    let parsed: BraveResponse;
    try {
      parsed = BRAVE_RESPONSE_SCHEMA.parse(raw);
    } catch (e: unknown) {
      if (e instanceof z.ZodError) {
        throw new APIResponseError(`Invalid Brave search response structure: ${e.message}`, raw, e);
      }
      throw handleUnknownError(e, 'Brave response validation');
    }

    const results: SearchResult[] = [];
    for (const r of parsed.web.results) {
      if (!r.url) continue;
      results.push({
        url: r.url,
        title: stripMarkup(r.title),
        snippet: stripMarkup(r.description),
        sourceDomain: extractSourceDomain(r.url),
      });
    }

    debug(`Brave search returned ${results.length} result(s)`);
    return results.slice(0, this.maxResults);
  }
}
