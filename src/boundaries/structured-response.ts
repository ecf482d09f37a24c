import { RawResponseError } from '../errors/validation-errors';
import { handleUnknownError } from '../errors/index';

const FENCE = /```(?:json)?\s*([\s\S]*?)```/i;

type ParseAttempt = { ok: true; value: unknown } | { ok: false; error: unknown };

function tryParse(text: string): ParseAttempt {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (e: unknown) {
    return { ok: false, error: e };
  }
}

// First balanced span starting at `open`; brackets inside JSON strings are ignored
function sliceBalanced(text: string, open: '{' | '[', close: '}' | ']'): string | undefined {
  const start = text.indexOf(open);
  if (start === -1) return undefined;

  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') {
      inString = true;
    } else if (ch === open) {
      depth++;
    } else if (ch === close) {
      depth--;
      if (depth === 0) return text.slice(start, i + 1);
    }
  }
  return undefined;
}

/**
 * Recovers a JSON value from raw model text.
 *
 * Accepts bare JSON, JSON inside a markdown code fence, or JSON surrounded
 * by prose (the first balanced `{...}` or `[...]` span is used). Throws
 * RawResponseError when nothing parseable is present.
 */
export function parseStructuredResponse(text: string): unknown {
  const trimmed = text.trim();
  if (!trimmed) {
    throw new RawResponseError('empty model response', text);
  }

  const fenced = FENCE.exec(trimmed);
  const body = fenced?.[1]?.trim() ?? trimmed;

  const direct = tryParse(body);
  if (direct.ok) return direct.value;

  const objectStart = body.indexOf('{');
  const arrayStart = body.indexOf('[');
  const preferArray = arrayStart !== -1 && (objectStart === -1 || arrayStart < objectStart);
  const candidate = preferArray
    ? sliceBalanced(body, '[', ']')
    : sliceBalanced(body, '{', '}');

  if (candidate === undefined) {
    throw new RawResponseError('no JSON object found in model response', text);
  }

  const scanned = tryParse(candidate);
  if (scanned.ok) return scanned.value;
  const err = handleUnknownError(scanned.error, 'JSON parsing');
  throw new RawResponseError(`invalid JSON in model response: ${err.message}`, text, scanned.error);
}
