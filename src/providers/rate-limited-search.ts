import { setTimeout as delay } from 'timers/promises';
import type { SearchProvider, SearchResult } from './search-provider';
import { handleUnknownError, isRateLimitError } from '../errors/index';
import { SEARCH_BACKOFF_BASE_MS, SEARCH_PAUSE_MS, SEARCH_RETRIES } from '../config/constants';
import { debug, warn } from '../output/logger';

export interface RateLimitedSearchConfig {
  pauseMs?: number;
  retries?: number;
  backoffBaseMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = async (ms: number): Promise<void> => {
  await delay(ms);
};

/**
 * Paces calls to an evidence source and absorbs its failures.
 *
 * Every attempt waits `pauseMs` first. A rate-limit rejection waits
 * `backoffBaseMs * 2^attempt` and retries up to `retries` times; any other
 * failure, or running out of retries, yields an empty result.
 */
export class RateLimitedSearchProvider implements SearchProvider {
  private readonly pauseMs: number;
  private readonly retries: number;
  private readonly backoffBaseMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly inner: SearchProvider, config: RateLimitedSearchConfig = {}) {
    this.pauseMs = config.pauseMs ?? SEARCH_PAUSE_MS;
    this.retries = config.retries ?? SEARCH_RETRIES;
    this.backoffBaseMs = config.backoffBaseMs ?? SEARCH_BACKOFF_BASE_MS;
    this.sleep = config.sleep ?? defaultSleep;
  }

  async search(query: string): Promise<SearchResult[]> {
    for (let attempt = 0; attempt <= this.retries; attempt++) {
      await this.sleep(this.pauseMs);
      try {
        return await this.inner.search(query);
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Web search');
        if (!isRateLimitError(err)) {
          warn(`Search failed for "${query.slice(0, 60)}": ${err.message}`);
          return [];
        }
        if (attempt === this.retries) break;
        const backoff = this.backoffBaseMs * 2 ** attempt;
        debug(`Rate limited, waiting ${backoff}ms before retry ${attempt + 1}/${this.retries}`);
        await this.sleep(backoff);
      }
    }
    warn(`Search rate limit persisted after ${this.retries} retries: "${query.slice(0, 60)}"`);
    return [];
  }
}
