import { handleUnknownError } from '../errors/index';

const PREFIX = '[deckproof]';
const PREVIEW_CHARS = 500;

export interface ProviderDebugOptions {
  debug?: boolean;
  showPrompt?: boolean;
  showPromptTrunc?: boolean;
  debugJson?: boolean;
}

// Provider diagnostics go to stderr so JSON reports on stdout stay clean
export function logRequest(
  options: ProviderDebugOptions,
  provider: string,
  meta: Record<string, unknown>,
  systemPrompt: string,
  content: string
): void {
  if (!options.debug) return;
  console.error(`${PREFIX} Sending request to ${provider}:`, meta);

  if (options.showPrompt) {
    console.error(`${PREFIX} System prompt (full):`);
    console.error(systemPrompt);
    console.error(`${PREFIX} User content (full):`);
    console.error(content);
  } else if (options.showPromptTrunc) {
    console.error(`${PREFIX} System prompt (first ${PREVIEW_CHARS} chars):`);
    console.error(systemPrompt.slice(0, PREVIEW_CHARS));
    if (systemPrompt.length > PREVIEW_CHARS) console.error('... [truncated]');
    console.error(`${PREFIX} User content preview (first ${PREVIEW_CHARS} chars):`);
    console.error(content.slice(0, PREVIEW_CHARS));
    if (content.length > PREVIEW_CHARS) console.error('... [truncated]');
  }
}

export function logResponse(
  options: ProviderDebugOptions,
  meta: Record<string, unknown>,
  rawResponse: unknown
): void {
  if (!options.debug) return;
  console.error(`${PREFIX} LLM response meta:`, meta);
  if (!options.debugJson) return;
  try {
    console.error(`${PREFIX} Full JSON response:`);
    console.error(typeof rawResponse === 'string' ? rawResponse : JSON.stringify(rawResponse, null, 2));
  } catch (e: unknown) {
    const err = handleUnknownError(e, 'JSON stringify for debug');
    console.error(`${PREFIX} Warning: ${err.message}`);
  }
}
