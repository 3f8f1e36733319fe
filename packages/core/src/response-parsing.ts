import { stripCodeFence } from '@tollgate/shared';

export type ExtractResult =
  | { ok: true; value: unknown }
  | { ok: false; error: string };

const FENCED_BLOCK = /```(?:json)?[ \t]*\r?\n?([\s\S]*?)```/g;

function tryParse(text: string): ExtractResult {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (err) {
    return { ok: false, error: err instanceof Error ? err.message : String(err) };
  }
}

/** From the first `{` or `[` to the last matching closer. */
function outermostSpan(text: string): string | null {
  const brace = text.indexOf('{');
  const bracket = text.indexOf('[');
  if (brace === -1 && bracket === -1) return null;

  const openAt = brace === -1 ? bracket : bracket === -1 ? brace : Math.min(brace, bracket);
  const closer = text[openAt] === '{' ? '}' : ']';
  const closeAt = text.lastIndexOf(closer);
  return closeAt > openAt ? text.slice(openAt, closeAt + 1) : null;
}

/**
 * Finds a JSON payload in model output. Tries, in order: the whole text with
 * any wrapping fence removed, each fenced block, then the outermost
 * object/array span in the surrounding prose.
 */
export function extractJson(raw: string): ExtractResult {
  const whole = tryParse(stripCodeFence(raw));
  if (whole.ok) return whole;

  for (const match of raw.matchAll(FENCED_BLOCK)) {
    const block = tryParse(match[1].trim());
    if (block.ok) return block;
  }

  const span = outermostSpan(raw);
  if (span === null) {
    return { ok: false, error: 'No JSON object or array found in the response' };
  }
  const spanned = tryParse(span);
  return spanned.ok ? spanned : { ok: false, error: `Invalid JSON: ${spanned.error}` };
}

export type KeywordResult =
  | { ok: true; value: boolean }
  | { ok: false; error: string };

/**
 * Reads a YES/NO verdict. Whichever keyword appears last wins, so reasoning
 * that mentions both before concluding is read correctly.
 */
export function extractYesNo(raw: string): KeywordResult {
  let verdict: boolean | undefined;
  for (const match of raw.matchAll(/\b(YES|NO)\b/g)) {
    verdict = match[1] === 'YES';
  }
  if (verdict === undefined) {
    return { ok: false, error: 'Expected the answer to end with YES or NO' };
  }
  return { ok: true, value: verdict };
}
