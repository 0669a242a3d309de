/**
 * Lenient JSON for model-emitted metadata.
 *
 * Accepts trailing commas, a single pair of outer quotes or backticks, and
 * prose around one object or array. Never throws.
 */

import { JsonValueSchema, type JsonValue } from '../types.js';

export type LenientJsonResult = { ok: true; value: JsonValue } | { ok: false; error: string };

/** Remove commas that directly precede `}` or `]`, outside string literals. */
export function removeTrailingCommas(text: string): string {
  let out = '';
  let inString = false;
  let escaped = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);

    if (inString) {
      out += ch;
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }

    if (ch === '"') {
      inString = true;
      out += ch;
      continue;
    }

    if (ch === ',') {
      let j = i + 1;
      while (j < text.length && /\s/.test(text.charAt(j))) j++;
      const next = text.charAt(j);
      if (next === '}' || next === ']') continue;
    }

    out += ch;
  }

  return out;
}

function stripOuterQuotes(text: string): string {
  for (const q of ["'", '`']) {
    if (text.length >= 2 && text.startsWith(q) && text.endsWith(q)) {
      return text.slice(1, -1).trim();
    }
  }
  return text;
}

/** The span from the first `{`/`[` to the last matching closer, when prose surrounds it. */
function structuredSpan(text: string): string | null {
  const start = text.search(/[{[]/);
  if (start < 0) return null;
  const closer = text.charAt(start) === '{' ? '}' : ']';
  const end = text.lastIndexOf(closer);
  if (end <= start) return null;
  return text.slice(start, end + 1);
}

export function parseLenientJson(input: string): LenientJsonResult {
  const text = stripOuterQuotes(input.trim());
  if (text === '') return { ok: false, error: 'empty input' };

  const candidates = [text];
  const span = structuredSpan(text);
  if (span !== null && span !== text) candidates.push(span);

  let error = 'not JSON';
  for (const candidate of candidates) {
    try {
      const raw: unknown = JSON.parse(removeTrailingCommas(candidate));
      const checked = JsonValueSchema.safeParse(raw);
      if (checked.success) return { ok: true, value: checked.data };
      error = checked.error.message;
    } catch (e) {
      error = e instanceof Error ? e.message : String(e);
    }
  }

  return { ok: false, error };
}
