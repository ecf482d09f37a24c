export const CONTRADICTION_SIGNALS = [
  'however',
  'but actually',
  'disputed',
  'false',
  'incorrect',
  'misleading',
  'exaggerated',
] as const;

// Keyword heuristic: any contradiction signal marks the snippet as not supporting
export function supportsClaim(snippet: string): boolean {
  const lower = snippet.toLowerCase();
  return !CONTRADICTION_SIGNALS.some((signal) => lower.includes(signal));
}
