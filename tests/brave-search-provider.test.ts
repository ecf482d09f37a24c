import { beforeEach, describe, it, expect, vi } from 'vitest';
import { BraveSearchProvider } from '../src/providers/brave-search-provider';
import { extractSourceDomain } from '../src/providers/search-provider';
import { ConfigError, RateLimitError } from '../src/errors/index';
import { APIResponseError } from '../src/errors/validation-errors';

const { mockFetch } = vi.hoisted(() => ({ mockFetch: vi.fn() }));

vi.mock('node-fetch', () => ({ default: mockFetch }));

function jsonResponse(body: unknown, status = 200, statusText = 'OK') {
  return {
    status,
    statusText,
    ok: status >= 200 && status < 300,
    json: async () => body,
  };
}

describe('BraveSearchProvider', () => {
  beforeEach(() => {
    mockFetch.mockReset();
  });

  it('requires an API key', () => {
    expect(() => new BraveSearchProvider({ apiKey: '  ' })).toThrow(ConfigError);
  });

  it('sends the query with the subscription token', async () => {
    mockFetch.mockResolvedValue(jsonResponse({ web: { results: [] } }));
    const provider = new BraveSearchProvider({ apiKey: 'test-secret' });

    await provider.search('Acme revenue');

    expect(mockFetch).toHaveBeenCalledWith(
      'https://api.search.brave.com/res/v1/web/search?q=Acme+revenue&count=5',
      {
        headers: { Accept: 'application/json', 'X-Subscription-Token': 'test-secret' },
        timeout: 12000,
      }
    );
  });

  it('maps web results and strips highlight markup', async () => {
    mockFetch.mockResolvedValue(
      jsonResponse({
        web: {
          results: [
            {
              title: '<strong>Acme</strong> raises Series A',
              url: 'https://www.TechCrunch.com/2024/acme',
              description: 'Acme <strong>revenue</strong>  grew 300%',
            },
            { title: 'No link', description: 'dropped' },
          ],
        },
      })
    );
    const results = await new BraveSearchProvider({ apiKey: 'test-secret' }).search('Acme');

    expect(results).toEqual([
      {
        url: 'https://www.TechCrunch.com/2024/acme',
        title: 'Acme raises Series A',
        snippet: 'Acme revenue grew 300%',
        sourceDomain: 'techcrunch.com',
      },
    ]);
  });

  it('treats a response without web results as empty', async () => {
    mockFetch.mockResolvedValue(jsonResponse({ query: { original: 'Acme' } }));
    await expect(new BraveSearchProvider({ apiKey: 'test-secret' }).search('Acme')).resolves.toEqual([]);
  });

  it('caps results at maxResults', async () => {
    const results = Array.from({ length: 4 }, (_, i) => ({
      title: `Result ${i}`,
      url: `https://example.com/${i}`,
      description: `Snippet ${i}`,
    }));
    mockFetch.mockResolvedValue(jsonResponse({ web: { results } }));
    const found = await new BraveSearchProvider({ apiKey: 'test-secret', maxResults: 2 }).search('Acme');

    expect(found.map((r) => r.url)).toEqual(['https://example.com/0', 'https://example.com/1']);
    expect(mockFetch.mock.calls[0]?.[0]).toBe('https://api.search.brave.com/res/v1/web/search?q=Acme&count=2');
  });

  it('raises a rate limit error on HTTP 429', async () => {
    mockFetch.mockResolvedValue(jsonResponse({}, 429, 'Too Many Requests'));
    const promise = new BraveSearchProvider({ apiKey: 'test-secret' }).search('Acme');
    await expect(promise).rejects.toBeInstanceOf(RateLimitError);
  });

  it('reports other HTTP failures', async () => {
    mockFetch.mockResolvedValue(jsonResponse({}, 503, 'Service Unavailable'));
    await expect(new BraveSearchProvider({ apiKey: 'test-secret' }).search('Acme')).rejects.toThrow(
      'Brave search API error (HTTP 503 Service Unavailable)'
    );
  });

  it('wraps network failures', async () => {
    mockFetch.mockRejectedValue(new Error('ECONNRESET'));
    await expect(new BraveSearchProvider({ apiKey: 'test-secret' }).search('Acme')).rejects.toThrow(
      'Brave search request failed: ECONNRESET'
    );
  });

  it('rejects malformed response bodies', async () => {
    mockFetch.mockResolvedValue(jsonResponse({ web: { results: 'nope' } }));
    await expect(new BraveSearchProvider({ apiKey: 'test-secret' }).search('Acme')).rejects.toBeInstanceOf(
      APIResponseError
    );
  });

  it('rejects an empty query without calling the API', async () => {
    await expect(new BraveSearchProvider({ apiKey: 'test-secret' }).search('   ')).rejects.toThrow(
      'Search query cannot be empty.'
    );
    expect(mockFetch).not.toHaveBeenCalled();
  });
});

describe('extractSourceDomain', () => {
  it('lower-cases the host and drops www', () => {
    expect(extractSourceDomain('https://WWW.Reuters.com/tech/x')).toBe('reuters.com');
  });

  it('returns an empty string for invalid URLs', () => {
    expect(extractSourceDomain('not a url')).toBe('');
  });
});
