import { CLAIM_CATEGORIES } from '../verification/types';

export function buildExtractionInstructions(maxClaims: number): string {
  return `Extract the factual, verifiable claims from this startup pitch deck.

Focus on claims an investor would want checked:
- market size figures (TAM, SAM, SOM)
- revenue, ARR, MRR and growth rates
- user, customer and retention metrics
- team credentials and prior exits
- named customers, partnerships and funding history
- competitive and technology claims backed by specifics

Skip slogans, opinions and forward-looking aspirations without a checkable fact.

Return a JSON object {"claims": [...]} with at most ${maxClaims} entries. Each entry has:
- "text": the claim, quoted or closely paraphrased
- "category": one of ${CLAIM_CATEGORIES.join(', ')}
- "confidence": 0-1, how clearly this is a concrete verifiable assertion
- "page": the page number the claim appears on, when known
- "context": one sentence of surrounding context`;
}
