/**
 * Configuration constants
 */

export const APP_VERSION = '0.3.0';
export const DEFAULT_CONFIG_FILENAME = '.deckproof.ini';
export const PDF_EXT = '.pdf';
export const ALLOWED_DOCUMENT_EXTS = new Set([PDF_EXT, '.md', '.txt', '.markdown']);

// Verification pipeline defaults
export const VERIFICATION_BUDGET = 5;
export const RELEVANCE_THRESHOLD = 0.3;
export const MAX_EVIDENCE_PER_VERDICT = 5;
export const QUERIES_PER_CLAIM = 1;
export const VERIFICATION_CONCURRENCY = 1;

// Search pacing
export const SEARCH_PAUSE_MS = 1500;
export const SEARCH_RETRIES = 2;
export const SEARCH_BACKOFF_BASE_MS = 3000;
export const SEARCH_TIMEOUT_MS = 12_000;
export const MAX_SEARCH_RESULTS = 5;

// Analysis defaults
export const MAX_CLAIMS = 15;
export const MAX_QUESTIONS = 10;
export const MAX_EXTRACTED_CLAIMS = 12;
export const EXTRACTION_TEXT_LIMIT = 10_000;

export const DEFAULT_INVESTOR = {
  name: 'Investor',
  focusAreas: 'B2B SaaS, FinTech, AI/ML',
  stage: 'Series A',
} as const;
