import { describe, it, expect } from 'vitest';
import { generateSearchQueries } from '../src/verification/query-generator';
import { makeClaim } from './utils';

const SITE_QUERY = '"Acme" site:techcrunch.com OR site:crunchbase.com';

describe('Search query generation', () => {
  it('orders base, category and site queries for a revenue claim', () => {
    const queries = generateSearchQueries(makeClaim(), 'Acme');
    expect(queries).toEqual([
      'Acme Revenue grew 300% in 2023',
      'Acme revenue funding',
      'Acme annual revenue',
      SITE_QUERY,
    ]);
  });

  it('adds market research queries when a market size claim has figures', () => {
    const claim = makeClaim({ text: 'The market is worth $50 billion', category: 'market_size' });
    expect(generateSearchQueries(claim, 'Acme')).toEqual([
      'Acme The market is worth $50 billion',
      'The market is worth $50 billion market size research report',
      'TAM SAM SOM $50 billion',
      SITE_QUERY,
    ]);
  });

  it('skips market research queries when no figure is present', () => {
    const claim = makeClaim({ text: 'A huge untapped market', category: 'market_size' });
    expect(generateSearchQueries(claim, 'Acme')).toEqual(['Acme A huge untapped market', SITE_QUERY]);
  });

  it('uses only base and site queries for categories without templates', () => {
    const claim = makeClaim({ text: 'Proprietary ML models', category: 'technology' });
    expect(generateSearchQueries(claim, 'Acme')).toEqual(['Acme Proprietary ML models', SITE_QUERY]);
  });

  it('truncates the claim text in the base query', () => {
    const text = 'x'.repeat(150);
    const claim = makeClaim({ text, category: 'other' });
    const [base] = generateSearchQueries(claim, 'Acme');
    expect(base).toBe(`Acme ${'x'.repeat(100)}`);
  });

  it('builds team queries from the company name', () => {
    const claim = makeClaim({ text: 'Founders previously exited two startups', category: 'team_background' });
    expect(generateSearchQueries(claim, 'Acme').slice(1, 3)).toEqual([
      'Acme founders background LinkedIn',
      'Acme team leadership',
    ]);
  });
});
