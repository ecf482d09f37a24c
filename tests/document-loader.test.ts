import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  UNKNOWN_COMPANY,
  formatPagesForExtraction,
  guessCompanyName,
  loadDocument,
  splitPages,
} from '../src/boundaries/document-loader';
import { ProcessingError, ValidationError } from '../src/errors/index';

const FIXTURES = path.join(__dirname, 'fixtures');

describe('guessCompanyName', () => {
  it('prefers a front-matter title', () => {
    expect(guessCompanyName('---\ntitle: "Acme Robotics"\n---\n# Something else')).toBe('Acme Robotics');
  });

  it('skips boilerplate lines', () => {
    expect(guessCompanyName('CONFIDENTIAL\n\n# Acme\nWe build robots')).toBe('Acme');
  });

  it('looks past a page break', () => {
    expect(guessCompanyName('Pitch Deck 2024\fAcme Labs')).toBe('Acme Labs');
  });

  it('falls back when no short line exists', () => {
    expect(guessCompanyName('')).toBe(UNKNOWN_COMPANY);
    expect(guessCompanyName('x'.repeat(60))).toBe(UNKNOWN_COMPANY);
  });
});

describe('page handling', () => {
  it('splits on form feeds and drops blank pages', () => {
    expect(splitPages('Page one\f\f  Page two  \f')).toEqual(['Page one', 'Page two']);
  });

  it('drops front matter from the pages', () => {
    expect(splitPages('---\ntitle: Acme\n---\nBody text')).toEqual(['Body text']);
  });

  it('tags pages for extraction', () => {
    expect(formatPagesForExtraction(['A', 'B'])).toBe('=== PAGE 1 ===\nA\n\n=== PAGE 2 ===\nB');
  });
});

describe('loadDocument', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(os.tmpdir(), 'deckproof-doc-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('loads pages and the company name', async () => {
    writeFileSync(path.join(dir, 'deck.md'), '# Acme\nRevenue grew\fTeam slide\n');
    const doc = await loadDocument('deck.md', dir);

    expect(doc).toEqual({
      path: path.join(dir, 'deck.md'),
      name: 'deck.md',
      pages: ['# Acme\nRevenue grew', 'Team slide'],
      companyName: 'Acme',
    });
  });

  it('reads a PDF deck page by page', async () => {
    const doc = await loadDocument(path.join(FIXTURES, 'acme-deck.pdf'));

    expect(doc).toEqual({
      path: path.join(FIXTURES, 'acme-deck.pdf'),
      name: 'acme-deck.pdf',
      pages: ['Acme Robotics\nRevenue grew 300% in 2023', 'Team slide'],
      companyName: 'Acme Robotics',
    });
  });

  it('rejects unsupported file types', async () => {
    await expect(loadDocument('deck.pptx', dir)).rejects.toThrow(ValidationError);
  });

  it('reports a missing document', async () => {
    await expect(loadDocument('missing.txt', dir)).rejects.toThrow(ProcessingError);
  });
});
