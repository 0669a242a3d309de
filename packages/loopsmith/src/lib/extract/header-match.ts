/**
 * Greedy header match: bind a heading to a schema field by its label,
 * leaving any trailing words on the same line as the field's inline value.
 *
 * `"Target: SOURCE"` → field `Target`, inline value `SOURCE`.
 */

import type { FieldSpec } from '../types.js';

export interface HeaderMatch {
  field: FieldSpec;
  /** Length of the matched label; longest wins. */
  score: number;
  /** Text following the label, separators removed. */
  value: string;
}

// Markers, numbering and emoji in front of a label ("## 1. 🎯 **Content**")
const LEADING_SYMBOLS = /^[\s\p{P}\p{S}\p{N}\p{M}\p{Cf}]+/u;
// Separators between label and inline value ("**:", " -", " =>")
const LABEL_SEPARATORS = /^[\s*_`:=>|\-–—]+/u;

const patternCache = new Map<string, RegExp>();

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Case-insensitive prefix pattern; spaces, hyphens and underscores interchangeable. */
function labelPattern(name: string): RegExp {
  const cached = patternCache.get(name);
  if (cached) return cached;
  const words = name
    .trim()
    .split(/[\s_-]+/)
    .filter((w) => w.length > 0)
    .map(escapeRegExp);
  const pattern = new RegExp(`^${words.join('[\\s_-]*')}(?![\\p{L}\\p{N}])`, 'iu');
  patternCache.set(name, pattern);
  return pattern;
}

/** Strip leading markers from heading text. */
export function stripLeadingSymbols(text: string): string {
  return text.replace(LEADING_SYMBOLS, '');
}

/** Score one field against a heading; null when the label is not a prefix. */
export function scoreHeader(headingText: string, field: FieldSpec): number | null {
  const match = labelPattern(field.name).exec(stripLeadingSymbols(headingText));
  return match ? match[0].length : null;
}

/** Find the field whose label is the longest prefix of the heading. Ties keep schema order. */
export function matchHeader(headingText: string, fields: readonly FieldSpec[]): HeaderMatch | null {
  const stripped = stripLeadingSymbols(headingText);
  let best: HeaderMatch | null = null;

  for (const field of fields) {
    const score = scoreHeader(stripped, field);
    if (score === null) continue;
    if (!best || score > best.score) {
      best = {
        field,
        score,
        value: stripped.slice(score).replace(LABEL_SEPARATORS, '').trim(),
      };
    }
  }

  return best;
}
