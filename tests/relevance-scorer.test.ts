import { describe, it, expect } from 'vitest';
import {
  hasNumberMatch,
  isCredibleSource,
  scoreRelevance,
  wordOverlap,
  wordSet,
} from '../src/verification/relevance-scorer';

describe('Relevance scorer', () => {
  describe('wordSet', () => {
    it('case-folds and trims punctuation from token ends', () => {
      expect([...wordSet('Revenue, grew (300%).')]).toEqual(['revenue', 'grew', '300%']);
    });

    it('keeps a leading currency sign', () => {
      expect([...wordSet('Raised $5M, fast')]).toEqual(['raised', '$5m', 'fast']);
    });

    it('drops tokens that are only punctuation', () => {
      expect([...wordSet('Growth - strong !')]).toEqual(['growth', 'strong']);
    });
  });

  describe('components', () => {
    it('measures overlap as a share of claim words', () => {
      expect(wordOverlap('Acme serves 500 customers', 'Acme serves many customers')).toBeCloseTo(0.75);
    });

    it('returns zero overlap for an empty claim', () => {
      expect(wordOverlap('', 'anything at all')).toBe(0);
    });

    it('matches digit runs across both texts', () => {
      expect(hasNumberMatch('ARR of $12M in 2024', 'Filed 2024 results')).toBe(true);
      expect(hasNumberMatch('ARR of $12M', 'ARR of twelve million')).toBe(false);
    });

    it('recognizes business-press domains including subdomains', () => {
      expect(isCredibleSource('reuters.com')).toBe(true);
      expect(isCredibleSource('news.Bloomberg.com')).toBe(true);
      expect(isCredibleSource('example.org')).toBe(false);
    });
  });

  describe('scoreRelevance', () => {
    it('scores an exact restatement on a credible domain as 1.0', () => {
      const score = scoreRelevance(
        { snippet: 'Revenue grew 300% in 2023 according to filings', sourceDomain: 'techcrunch.com' },
        { text: 'Revenue grew 300% in 2023' }
      );
      expect(score).toBe(1);
    });

    it('combines overlap and number match without a credible source', () => {
      // overlap: in, 2023 of 5 claim words -> 0.4 * 0.6; shared number 2023 -> 0.2
      const score = scoreRelevance(
        { snippet: 'In 2023, the firm raised funding', sourceDomain: 'example.com' },
        { text: 'Revenue reached $5M in 2023' }
      );
      expect(score).toBeCloseTo(0.44);
    });

    it('gives only the source bonus to an empty claim', () => {
      expect(scoreRelevance({ snippet: 'anything', sourceDomain: 'forbes.com' }, { text: '' })).toBeCloseTo(0.2);
    });

    it('never decreases when a credible source is added', () => {
      const claim = { text: 'Acme signed 40 enterprise customers' };
      const snippet = 'Acme announced new enterprise customers this quarter';
      const plain = scoreRelevance({ snippet, sourceDomain: 'blog.example.com' }, claim);
      const credible = scoreRelevance({ snippet, sourceDomain: 'crunchbase.com' }, claim);
      expect(credible).toBeCloseTo(plain + 0.2);
    });

    it('stays within [0, 1]', () => {
      const score = scoreRelevance(
        { snippet: 'Acme 2023 Acme 2023', sourceDomain: 'forbes.com' },
        { text: 'Acme 2023' }
      );
      expect(score).toBe(1);
    });
  });
});
