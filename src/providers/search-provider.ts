/*
 * Search provider interface for claim verification.
 * Implementations query external search APIs and return page snippets.
 */
export interface SearchResult {
  url: string;
  title: string;
  snippet: string;
  /** Lower-cased host without a leading `www.` */
  sourceDomain: string;
}

export interface SearchProvider {
  search(query: string): Promise<SearchResult[]>;
}

export function extractSourceDomain(url: string): string {
  try {
    return new URL(url).hostname.toLowerCase().replace(/^www\./, '');
  } catch {
    return '';
  }
}
