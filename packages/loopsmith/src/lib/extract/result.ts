/**
 * Typed accessors over an ExtractionResult.
 */

import type { ExtractionResult, JsonValue } from '../types.js';

export function fieldText(result: ExtractionResult, name: string): string | null {
  const parsed = result.fields[name]?.parsed;
  return parsed?.kind === 'text' ? parsed.text : null;
}

export function fieldCode(result: ExtractionResult, name: string): string | null {
  const parsed = result.fields[name]?.parsed;
  return parsed?.kind === 'code' ? parsed.code : null;
}

export function fieldJson(result: ExtractionResult, name: string): JsonValue | null {
  const parsed = result.fields[name]?.parsed;
  return parsed?.kind === 'json' ? parsed.value : null;
}

export function fieldDecision(result: ExtractionResult, name: string): string | null {
  const parsed = result.fields[name]?.parsed;
  return parsed?.kind === 'decision' ? parsed.decision : null;
}

/** One line per field, for logs and the `extract` command. */
export function summarizeResult(result: ExtractionResult): string[] {
  return Object.entries(result.fields).map(([name, value]) => {
    if (!value.present) return `${name}: absent`;
    if (value.parsed === null) return `${name}: invalid`;
    return `${name}: ${value.parsed.kind}`;
  });
}
