import { describe, it, expect } from 'vitest';
import { parseClaimCategory, parseVerificationStatus } from '../src/verification/types';

describe('parseClaimCategory', () => {
  it('normalizes case and whitespace', () => {
    expect(parseClaimCategory(' Market_Size ')).toBe('market_size');
  });

  it('falls back to other', () => {
    expect(parseClaimCategory('valuation')).toBe('other');
    expect(parseClaimCategory(42)).toBe('other');
    expect(parseClaimCategory(undefined)).toBe('other');
  });
});

describe('parseVerificationStatus', () => {
  it('accepts known statuses', () => {
    expect(parseVerificationStatus('CONTRADICTED')).toBe('contradicted');
  });

  it('falls back to unable_to_verify', () => {
    expect(parseVerificationStatus('likely true')).toBe('unable_to_verify');
    expect(parseVerificationStatus(null)).toBe('unable_to_verify');
  });
});
