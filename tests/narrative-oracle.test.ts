import { describe, it, expect } from 'vitest';
import { LLMNarrativeOracle, ORACLE_DEFAULTS, parseOracleJudgement } from '../src/verification/narrative-oracle';
import { SchemaValidationError } from '../src/errors/validation-errors';
import { VERIFICATION_INSTRUCTIONS, buildVerificationContent } from '../src/prompts/verification-prompt';
import { VerificationStatus, type EvidenceItem } from '../src/verification/types';
import { FakeLLMProvider, makeClaim } from './utils';

const EVIDENCE: EvidenceItem = {
  url: 'https://techcrunch.com/a',
  sourceDomain: 'techcrunch.com',
  snippet: 'Acme revenue tripled last year',
  relevance: 0.7,
  supports: true,
  retrievedAt: '2024-01-01T00:00:00.000Z',
};

describe('parseOracleJudgement', () => {
  it('normalizes a well-formed reply', () => {
    const judgement = parseOracleJudgement({
      status: ' Verified ',
      summary: ' Confirmed by two outlets. ',
      confidence: '0.7',
      red_flags: [' Figure is from 2022 ', ''],
    });
    expect(judgement).toEqual({
      status: VerificationStatus.Verified,
      summary: 'Confirmed by two outlets.',
      confidence: 0.7,
      redFlags: ['Figure is from 2022'],
    });
  });

  it('fills defaults for missing fields', () => {
    expect(parseOracleJudgement({})).toEqual({
      status: VerificationStatus.UnableToVerify,
      summary: ORACLE_DEFAULTS.summary,
      confidence: 0.5,
      redFlags: [],
    });
  });

  it('maps unknown statuses to unable_to_verify', () => {
    expect(parseOracleJudgement({ status: 'probably' }).status).toBe(VerificationStatus.UnableToVerify);
  });

  it('clamps confidence', () => {
    expect(parseOracleJudgement({ confidence: 3 }).confidence).toBe(1);
    expect(parseOracleJudgement({ confidence: -0.4 }).confidence).toBe(0);
  });

  it('rejects a non-numeric confidence', () => {
    expect(() => parseOracleJudgement({ confidence: 'high' })).toThrow(
      'Schema Validation Error (oracle_judgement): confidence is not a number: high'
    );
  });

  it('rejects a reply that is not an object', () => {
    expect(() => parseOracleJudgement('verified')).toThrow(SchemaValidationError);
  });
});

describe('buildVerificationContent', () => {
  it('lists company, claim and numbered sources', () => {
    const content = buildVerificationContent({ companyName: 'Acme', claim: makeClaim(), evidence: [EVIDENCE] });
    expect(content).toBe(
      [
        'COMPANY: Acme',
        'CLAIM: Revenue grew 300% in 2023',
        'CATEGORY: revenue',
        '',
        'EVIDENCE FOUND:',
        'Source 1: techcrunch.com',
        'URL: https://techcrunch.com/a',
        'Content: Acme revenue tripled last year',
      ].join('\n')
    );
  });
});

describe('LLMNarrativeOracle', () => {
  it('sends the claim and evidence with the verification schema', async () => {
    const provider = new FakeLLMProvider({
      submit_verification: () => ({
        status: 'partially_verified',
        summary: 'Growth is confirmed but smaller.',
        confidence: 0.6,
        red_flags: ['Growth overstated'],
      }),
    });
    const oracle = new LLMNarrativeOracle(provider);
    const prompt = { companyName: 'Acme', claim: makeClaim(), evidence: [EVIDENCE] };

    const judgement = await oracle.completeStructured(prompt);

    expect(judgement).toEqual({
      status: VerificationStatus.PartiallyVerified,
      summary: 'Growth is confirmed but smaller.',
      confidence: 0.6,
      redFlags: ['Growth overstated'],
    });
    const [call] = provider.calls;
    expect(call?.content).toBe(buildVerificationContent(prompt));
    expect(call?.promptText).toBe(VERIFICATION_INSTRUCTIONS);
    expect(call?.schema.name).toBe('submit_verification');
    expect(call?.schema.schema['type']).toBe('object');
    expect(call?.schema.schema).not.toHaveProperty('$schema');
  });

  it('propagates provider failures', async () => {
    const oracle = new LLMNarrativeOracle(new FakeLLMProvider({}));
    await expect(
      oracle.completeStructured({ companyName: 'Acme', claim: makeClaim(), evidence: [EVIDENCE] })
    ).rejects.toThrow('no fake response for submit_verification');
  });
});
