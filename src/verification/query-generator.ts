import { ClaimCategory, type Claim } from './types';

const BASE_QUERY_TEXT_LIMIT = 100;
const MONEY_OR_NUMBER = /\$?\d[\d,]*(?:\.\d+)?(?:\s*(?:billion|million|B|M))?/g;

type CategoryQueryBuilder = (claim: Claim, company: string) => string[];

const CATEGORY_QUERIES: Partial<Record<ClaimCategory, CategoryQueryBuilder>> = {
  [ClaimCategory.MarketSize]: (claim) => {
    const numbers = claim.text.match(MONEY_OR_NUMBER);
    if (!numbers) return [];
    return [
      `${claim.text} market size research report`,
      `TAM SAM SOM ${numbers.join(' ')}`,
    ];
  },
  [ClaimCategory.Revenue]: (_claim, company) => [
    `${company} revenue funding`,
    `${company} annual revenue`,
  ],
  [ClaimCategory.TeamBackground]: (_claim, company) => [
    `${company} founders background LinkedIn`,
    `${company} team leadership`,
  ],
  [ClaimCategory.CustomerClaims]: (_claim, company) => [
    `${company} customers clients`,
    `${company} case studies testimonials`,
  ],
  [ClaimCategory.Partnerships]: (_claim, company) => [
    `${company} partnerships announcements`,
  ],
  [ClaimCategory.FundingHistory]: (_claim, company) => [
    `${company} funding Crunchbase`,
    `${company} investment rounds`,
  ],
  [ClaimCategory.GrowthMetrics]: (_claim, company) => [
    `${company} growth metrics users`,
  ],
};

/**
 * Ordered search queries for a claim: the company-scoped claim text first,
 * category-specific queries next, a business-press site query last.
 */
export function generateSearchQueries(claim: Claim, companyName: string): string[] {
  const queries = [`${companyName} ${claim.text.slice(0, BASE_QUERY_TEXT_LIMIT)}`];
  const builder = CATEGORY_QUERIES[claim.category];
  if (builder) {
    queries.push(...builder(claim, companyName));
  }
  queries.push(`"${companyName}" site:techcrunch.com OR site:crunchbase.com`);
  return queries;
}
